// File handling utilities
import { promises as fs } from 'fs';
import { basename, extname, join } from 'path';
import type { BatchFolder, PatternInfo, PatternInfoExtractor } from '../models';
import { config } from './environment';
import { NotFoundError, errorMessage } from './error-handling';
import { parseAlbumId, validatePatternInfo } from './validation';

export const PATTERN_INFO_FILE = 'pattern.json';

/**
 * Writes content to a file
 */
export async function writeFileContent(filePath: string, content: string): Promise<void> {
  await fs.writeFile(filePath, content, 'utf8');
}

/**
 * Reads content from a file
 */
export async function readFileContent(filePath: string): Promise<string> {
  return fs.readFile(filePath, 'utf8');
}

/**
 * Checks if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves every input of a batch folder, listing all missing files at once
 */
export async function loadBatchFolder(
  folderPath: string,
  variants: string[] = config.pdfVariants,
  photoFileName: string = config.photoFileName
): Promise<BatchFolder> {
  let entries: string[];
  try {
    entries = await fs.readdir(folderPath);
  } catch (error) {
    throw new NotFoundError(`Batch folder ${folderPath} cannot be read: ${errorMessage(error)}`, [folderPath]);
  }

  const present = new Set(entries.map(entry => entry.toLowerCase()));
  const missing: string[] = [];

  const pdfPaths: Record<string, string> = {};
  for (const variant of variants) {
    const fileName = `${variant}.pdf`;
    if (present.has(fileName)) {
      pdfPaths[variant] = join(folderPath, fileName);
    } else {
      missing.push(fileName);
    }
  }

  if (!present.has(photoFileName.toLowerCase())) {
    missing.push(photoFileName);
  }

  const charts = entries.filter(entry => extname(entry).toLowerCase() === '.scc');
  if (charts.length !== 1) {
    missing.push(charts.length === 0 ? '*.scc' : 'exactly one *.scc');
  }

  const albumFiles = entries.filter(entry => extname(entry).toLowerCase() === '.txt');
  const albumId = albumFiles.length === 1 ? parseAlbumId(basename(albumFiles[0], extname(albumFiles[0]))) : null;
  if (albumId === null) {
    missing.push('<albumId>.txt');
  }

  if (missing.length > 0 || albumId === null) {
    throw new NotFoundError(`Batch folder ${folderPath} is missing: ${missing.join(', ')}`, missing);
  }

  return {
    folderPath,
    albumId,
    chartPath: join(folderPath, charts[0]),
    photoPath: join(folderPath, photoFileName),
    pdfPaths
  };
}

/**
 * Reads pattern metadata from pattern.json beside the kit PDFs
 */
export class JsonPatternInfoExtractor implements PatternInfoExtractor {
  constructor(private readonly fileName: string = PATTERN_INFO_FILE) {}

  async extract(batchFolderPath: string): Promise<PatternInfo> {
    const filePath = join(batchFolderPath, this.fileName);

    let raw: unknown;
    try {
      raw = JSON.parse(await readFileContent(filePath));
    } catch (error) {
      throw new NotFoundError(`Pattern info ${filePath} cannot be read: ${errorMessage(error)}`, [this.fileName]);
    }

    const result = validatePatternInfo(raw);
    if (!result.isValid) {
      throw new NotFoundError(`Pattern info ${filePath} is invalid: ${result.errors.join('; ')}`, [this.fileName]);
    }

    return result.pattern;
  }
}
