// Board maintenance: one board per album, SEO renames
import { buildBoardCsv, parseBoardCsvFromFile } from '../../shared/utils/csv-parser';
import type { BoardCsvRow } from '../../shared/utils/csv-parser';
import { config } from '../../shared/utils/environment';
import { NotFoundError, PublishError } from '../../shared/utils/error-handling';
import { fileExists, writeFileContent } from '../../shared/utils/file-handler';
import { PinterestClient, readResponseId } from '../../shared/utils/pinterest-client';
import type { ProgressChannel } from '../../shared/utils/progress-tracker';
import { fetchAlbums } from '../item-catalog';

const SOURCE = 'boards';
const SEO_SUFFIX = 'Cross Stitch Free';
export const MAX_BOARD_NAME_LENGTH = 48;
export const MAX_BOARD_DESCRIPTION_LENGTH = 500;

export interface BoardMaintenanceOptions {
  csvPath?: string;
  signal?: AbortSignal;
}

/**
 * Cuts at the last space before the limit, or hard at the limit when there is none
 */
export function trimToWordBoundary(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  const lastSpace = text.lastIndexOf(' ', maxLength);
  return lastSpace > 0 ? text.substring(0, lastSpace) : text.substring(0, maxLength);
}

export function buildSeoBoardName(caption: string): string {
  const base = caption.trim() || SEO_SUFFIX;
  const name = base.toLowerCase().includes(SEO_SUFFIX.toLowerCase()) ? base : `${base} ${SEO_SUFFIX}`;
  return trimToWordBoundary(name, MAX_BOARD_NAME_LENGTH);
}

export function buildSeoBoardDescription(caption: string, siteBaseUrl: string = config.siteBaseUrl): string {
  const safeCaption = caption.trim() || 'beautiful counted cross stitch designs';
  const site = siteBaseUrl.trim() || 'our site';

  const description =
    `Cross stitch patterns from album ${safeCaption}. ` +
    `Discover printable cross stitch charts and downloadable PDF patterns at ${site}. ` +
    'Perfect for both beginners and experienced stitchers who love detailed embroidery designs.';

  return description.substring(0, MAX_BOARD_DESCRIPTION_LENGTH);
}

/**
 * Creates a board for every album and writes the album -> board CSV
 */
export async function createBoardsAndCsv(
  client: PinterestClient,
  progress: ProgressChannel,
  options: BoardMaintenanceOptions = {}
): Promise<BoardCsvRow[]> {
  const csvPath = options.csvPath ?? config.boardsCsvPath;

  progress.emit(SOURCE, 'Loading albums from the item store...');
  const albums = await fetchAlbums();
  progress.emit(SOURCE, `Found ${albums.length} albums.`);

  if (albums.length === 0) {
    progress.emit(SOURCE, "No albums found with EntityType = 'ALBUM'. Nothing to do.");
    return [];
  }

  const rows: BoardCsvRow[] = [];
  for (const album of albums) {
    options.signal?.throwIfAborted();

    const name = album.caption.trim() === '' ? `Album ${album.albumId}` : album.caption;
    const response = await client.request('POST', '/boards', {
      name,
      description: `Cross-stitch patterns from album ${album.albumId}: ${album.caption}`
    });

    const boardId = readResponseId(response.data);
    if (boardId === null) {
      throw new PublishError(`Board created for album ${album.albumId} but the response has no id`, response.status, response.body);
    }

    progress.emit(SOURCE, `Created board '${name}' (ID=${boardId}) for album ${album.albumId}.`);
    rows.push({ albumId: album.albumId, caption: album.caption, boardId });
  }

  await writeFileContent(csvPath, buildBoardCsv(rows));
  progress.emit(SOURCE, `CSV file written to: ${csvPath}`);

  return rows;
}

/**
 * PATCHes every board listed in the CSV with an SEO name and description
 */
export async function renameBoardsFromCsv(
  client: PinterestClient,
  progress: ProgressChannel,
  options: BoardMaintenanceOptions = {}
): Promise<number> {
  const csvPath = options.csvPath ?? config.boardsCsvPath;
  if (!(await fileExists(csvPath))) {
    throw new NotFoundError(`CSV file with board mapping not found: ${csvPath}`, [csvPath]);
  }

  progress.emit(SOURCE, `Reading CSV: ${csvPath}`);
  const rows = await parseBoardCsvFromFile(csvPath);
  if (rows.length === 0) {
    progress.emit(SOURCE, 'CSV file contains no data lines.');
    return 0;
  }

  let renamed = 0;
  for (const row of rows) {
    options.signal?.throwIfAborted();

    const name = buildSeoBoardName(row.caption);
    progress.emit(SOURCE, `Renaming board ${row.boardId}: '${row.caption}' => '${name}'`);

    await client.request('PATCH', `/boards/${encodeURIComponent(row.boardId)}`, {
      name,
      description: buildSeoBoardDescription(row.caption)
    });
    renamed++;
  }

  progress.emit(SOURCE, 'Board renaming completed.');
  return renamed;
}
