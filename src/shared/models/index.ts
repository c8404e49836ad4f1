// Shared data models

/**
 * Metadata extracted from the kit PDF by the pattern extractor
 */
export interface PatternInfo {
  title: string;
  description: string;
  notes: string;
  width: number;
  height: number;
  nColors: number;
}

export interface PatternInfoExtractor {
  extract(batchFolderPath: string): Promise<PatternInfo>;
}

export interface DesignRecord {
  albumId: number;
  designId: number;
  nPage: string; // zero-padded to 5 digits
  nGlobalPage: number;
  title: string;
  description: string;
  notes: string;
  width: number;
  height: number;
  nColors: number;
  pinId: string | null; // null when the pin API answered without an id
}

export interface AlbumRecord {
  albumId: string; // 4-digit, e.g. "0007"
  caption: string;
  boardId?: string;
}

export interface Recipient {
  email: string;
  firstName?: string;
  recordKey?: Record<string, unknown>;
  correlationId?: string;
  verified?: boolean;
  unsubscribed?: boolean;
}

export interface Theme {
  code: string;
  humanName: string;
  keywords: string[];
  hashtags: string[];
}

export interface PinPayload {
  board_id: string;
  title: string;
  description: string;
  alt_text: string;
  link: string;
  media_source: {
    source_type: 'image_url';
    url: string;
  };
}

export interface EmailContent {
  subject: string;
  textBody: string;
  htmlBody?: string;
}

export interface BatchFolder {
  folderPath: string;
  albumId: number;
  chartPath: string;
  photoPath: string;
  pdfPaths: Record<string, string>; // variant -> source pdf
}

export type SequenceKind = 'DesignID' | 'NPage' | 'NGlobalPage';

export interface ProgressEvent {
  source: string;
  message: string;
  at: Date;
}
