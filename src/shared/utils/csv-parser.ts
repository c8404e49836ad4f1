// CSV parsing utilities for the album board index
import csv from 'csv-parser';
import { createReadStream, existsSync } from 'fs';
import { Readable } from 'stream';

export const BOARD_CSV_HEADER = 'AlbumID,AlbumCaption,BoardID';

export interface BoardCsvRow {
  albumId: string;
  caption: string;
  boardId: string;
}

/**
 * Normalizes an album id to its 4-digit key ("7" -> "0007")
 */
export function toAlbumKey(albumId: string | number): string {
  const raw = albumId.toString().trim();
  return /^\d+$/.test(raw) ? raw.padStart(4, '0') : raw;
}

/**
 * Formats one board CSV line, quoting the caption
 */
export function formatBoardCsvLine(albumId: string, caption: string, boardId: string): string {
  const escaped = caption.replace(/"/g, '""');
  return `${albumId},"${escaped}",${boardId}`;
}

/**
 * Builds the whole board CSV document
 */
export function buildBoardCsv(rows: BoardCsvRow[]): string {
  const lines = [BOARD_CSV_HEADER, ...rows.map(row => formatBoardCsvLine(row.albumId, row.caption, row.boardId))];
  return lines.join('\n') + '\n';
}

/**
 * The first line is the header whatever it says. Album id is the first
 * column, board id the last, and everything between is the caption.
 */
function parseBoardRows(source: Readable): Promise<BoardCsvRow[]> {
  return new Promise((resolve, reject) => {
    const rows: BoardCsvRow[] = [];
    const fail = (error: Error) => reject(new Error(`CSV parsing failed: ${error.message}`));

    source
      .on('error', fail)
      .pipe(csv({ headers: false, skipLines: 1 }))
      .on('data', (row: Record<string, string>) => {
        const cells = Object.values(row);
        if (cells.length < 2) {
          return;
        }

        const albumId = cells[0].trim();
        const boardId = cells[cells.length - 1].trim();
        if (albumId === '' || boardId === '') {
          return;
        }

        rows.push({ albumId, caption: cells.slice(1, -1).join(',').trim(), boardId });
      })
      .on('end', () => resolve(rows))
      .on('error', fail);
  });
}

/**
 * Parses board CSV content into rows
 */
export async function parseBoardCsvFromString(content: string): Promise<BoardCsvRow[]> {
  return parseBoardRows(Readable.from([content]));
}

/**
 * Parses a board CSV file into rows; a missing file has no rows
 */
export async function parseBoardCsvFromFile(filePath: string): Promise<BoardCsvRow[]> {
  if (!existsSync(filePath)) {
    console.warn('Board CSV not found, board index is empty', { filePath });
    return [];
  }
  return parseBoardRows(createReadStream(filePath, { encoding: 'utf8' }));
}

/**
 * Maps album key -> board id; the first row for an album wins
 */
export function toBoardIndex(rows: BoardCsvRow[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const row of rows) {
    const key = toAlbumKey(row.albumId);
    if (!index.has(key)) {
      index.set(key, row.boardId);
    }
  }
  return index;
}
