// Social pin publishing: board lookup, theme detection and pin text
import type { PatternInfo, PinPayload, Theme } from '../../shared/models';
import { parseBoardCsvFromFile, toAlbumKey, toBoardIndex } from '../../shared/utils/csv-parser';
import type { BoardCsvRow } from '../../shared/utils/csv-parser';
import { config } from '../../shared/utils/environment';
import { ConfigurationError } from '../../shared/utils/error-handling';
import { PinterestClient, readResponseId } from '../../shared/utils/pinterest-client';
import { buildImageUrl, buildPatternUrl, getLinkSettings } from '../../shared/utils/tracking-links';
import type { LinkSettings } from '../../shared/utils/tracking-links';
import themeData from './themes.json';

export const DEFAULT_THEME: Theme = themeData.fallback;
export const THEMES: readonly Theme[] = themeData.themes;
export const GENERIC_HASHTAGS: readonly string[] = themeData.genericHashtags;

export const MAX_TITLE_LENGTH = 100;
export const MAX_ALT_TEXT_LENGTH = 500;
export const MAX_DESCRIPTION_LENGTH = 500;

export interface PinSubject extends PatternInfo {
  albumId: number;
  designId: number;
  nPage: string;
}

export interface PinResult {
  pinId: string | null;
  boardId: string;
  payload: PinPayload;
}

/**
 * Album -> board index read from the board CSV. Loaded on first use, then
 * frozen; concurrent first lookups share one load.
 */
export class BoardIndexCache {
  private loading: Promise<ReadonlyMap<string, string>> | null = null;

  constructor(
    private readonly csvPath: string = config.boardsCsvPath,
    private readonly loader: (csvPath: string) => Promise<BoardCsvRow[]> = parseBoardCsvFromFile
  ) {}

  async get(albumId: number | string): Promise<string | undefined> {
    const index = await this.load();
    return index.get(toAlbumKey(albumId));
  }

  private load(): Promise<ReadonlyMap<string, string>> {
    if (!this.loading) {
      this.loading = this.loader(this.csvPath).then(rows => {
        const index = toBoardIndex(rows);
        console.log('Board index loaded', { csvPath: this.csvPath, boards: index.size });
        return index;
      }, (error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }
}

/**
 * Board for an album: the CSV entry, else the configured default board
 */
export async function resolveBoard(
  albumId: number,
  boards: BoardIndexCache,
  defaultBoardId: string = config.defaultBoardId
): Promise<string> {
  const boardId = await boards.get(albumId);
  if (boardId) {
    return boardId;
  }

  if (defaultBoardId.trim() !== '') {
    return defaultBoardId.trim();
  }

  throw new ConfigurationError(
    `Board for album ${toAlbumKey(albumId)} not found in board CSV and no default board is configured`,
    { setting: 'PINTEREST_BOARD_ID', albumId }
  );
}

/**
 * Theme with the most keyword hits; earlier themes win ties, no hits means the default
 */
export function detectTheme(pattern: PatternInfo, themes: readonly Theme[] = THEMES): Theme {
  const text = `${pattern.title} ${pattern.description} ${pattern.notes}`.toLowerCase();

  let bestTheme = DEFAULT_THEME;
  let bestScore = 0;

  for (const theme of themes) {
    const score = theme.keywords
      .filter(keyword => keyword.trim() !== '')
      .filter(keyword => text.includes(keyword.toLowerCase()))
      .length;

    if (score > bestScore) {
      bestScore = score;
      bestTheme = theme;
    }
  }

  return bestTheme;
}

/**
 * Upper-cases the first letter of each sentence and lower-cases the rest
 */
export function toSentenceCase(input: string): string {
  let newSentence = true;
  let result = '';

  for (const char of input) {
    const isLetter = char.toLowerCase() !== char.toUpperCase();
    if (newSentence && isLetter) {
      result += char.toUpperCase();
      newSentence = false;
    } else {
      result += char.toLowerCase();
    }

    if (char === '.' || char === '!' || char === '?') {
      newSentence = true;
    }
  }

  return result;
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.substring(0, maxLength) : text;
}

export function buildPinTitle(pattern: PatternInfo, theme: Theme): string {
  const titleBase = pattern.title.trim() || 'Cross stitch pattern';
  return truncate(`${titleBase} – ${toSentenceCase(theme.humanName)}, printable PDF pattern`, MAX_TITLE_LENGTH);
}

export function buildAltText(pattern: PatternInfo, theme: Theme): string {
  const parts = ['Counted cross stitch pattern', pattern.title.trim() || theme.humanName];

  const technical: string[] = [];
  if (pattern.width > 0 && pattern.height > 0) {
    technical.push(`${pattern.width} by ${pattern.height} stitches`);
  }
  if (pattern.nColors > 0) {
    technical.push(`${pattern.nColors} colours`);
  }
  if (technical.length > 0) {
    parts.push(technical.join(', '));
  }

  return truncate(parts.join(', '), MAX_ALT_TEXT_LENGTH);
}

/**
 * Generic then theme hashtags, first spelling kept, duplicates dropped case-insensitively
 */
export function collectHashtags(theme: Theme): string[] {
  const seen = new Set<string>();
  const hashtags: string[] = [];

  for (const tag of [...GENERIC_HASHTAGS, ...theme.hashtags]) {
    const trimmed = tag.trim();
    if (trimmed === '' || seen.has(trimmed.toLowerCase())) {
      continue;
    }
    seen.add(trimmed.toLowerCase());
    hashtags.push(trimmed);
  }

  return hashtags;
}

export function buildPinDescription(pattern: PatternInfo, theme: Theme, albumId: number, patternUrl: string): string {
  let text = '';

  const title = pattern.title.trim();
  if (title !== '') {
    text += `${title} – `;
  }
  text += `${theme.humanName}. `;

  if (pattern.width > 0 && pattern.height > 0 && pattern.nColors > 0) {
    text += `Detailed counted cross stitch chart (${pattern.width} × ${pattern.height} stitches, ${pattern.nColors} colours). `;
  } else {
    text += 'Beautiful counted cross stitch design. ';
  }

  if (pattern.description.trim() !== '') {
    text += `${pattern.description.trim()} `;
  }
  if (pattern.notes.trim() !== '') {
    text += `${pattern.notes.trim()} `;
  }

  text += `From album ${toAlbumKey(albumId)}. Download printable PDF and see more details at ${patternUrl}. `;
  text += 'Perfect for embroidery lovers and cross stitch fans. ';

  const hashtags = collectHashtags(theme);
  if (hashtags.length > 0) {
    text += `\n${hashtags.join(' ')}`;
  }

  return truncate(text, MAX_DESCRIPTION_LENGTH);
}

export function buildPinPayload(
  subject: PinSubject,
  boardId: string,
  settings: LinkSettings = getLinkSettings()
): PinPayload {
  const theme = detectTheme(subject);
  const patternUrl = buildPatternUrl(subject.title, subject.albumId, subject.nPage, settings);

  return {
    board_id: boardId,
    title: buildPinTitle(subject, theme),
    description: buildPinDescription(subject, theme, subject.albumId, patternUrl),
    alt_text: buildAltText(subject, theme),
    link: patternUrl,
    media_source: {
      source_type: 'image_url',
      url: buildImageUrl(subject.albumId, subject.designId, config.photoFileName, settings)
    }
  };
}

export class SocialPinPublisher {
  constructor(
    private readonly client: PinterestClient,
    private readonly boards: BoardIndexCache = new BoardIndexCache(),
    private readonly defaultBoardId: string = config.defaultBoardId
  ) {}

  async assertReady(): Promise<void> {
    await this.client.assertAuthorized();
  }

  async resolveBoard(albumId: number): Promise<string> {
    return resolveBoard(albumId, this.boards, this.defaultBoardId);
  }

  /**
   * Creates the pin; a 2xx answer without an id counts as created with id null
   */
  async createPin(subject: PinSubject, settings?: LinkSettings): Promise<PinResult> {
    const boardId = await this.resolveBoard(subject.albumId);
    const payload = buildPinPayload(subject, boardId, settings);

    const response = await this.client.request('POST', '/pins', payload);
    const pinId = readResponseId(response.data);

    if (pinId === null) {
      console.warn('Pin created but the response carried no id', { status: response.status, designId: subject.designId });
    } else {
      console.log('Pin created', { pinId, boardId, designId: subject.designId });
    }

    return { pinId, boardId, payload };
  }
}
