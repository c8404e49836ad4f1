// Item store key conventions
import { toAlbumKey } from './csv-parser';

export const DESIGN_ENTITY = 'DESIGN';
export const ALBUM_ENTITY = 'ALBUM';
export const ALBUM_KEY_PREFIX = 'ALB#';
export const USER_KEY_PREFIX = 'USR#';

/**
 * Partition key shared by an album item and its designs, e.g. ALB#0007
 */
export function albumPartitionKey(albumId: number | string): string {
  return `${ALBUM_KEY_PREFIX}${toAlbumKey(albumId)}`;
}

/**
 * Partition key of a user record kept in the item table
 */
export function userPartitionKey(email: string): string {
  return `${USER_KEY_PREFIX}${email}`;
}

export function formatNPage(value: number): string {
  return value.toString().padStart(5, '0');
}

/**
 * Numeric value of a padded page ("00042" -> 42, "" -> 0); null when not numeric
 */
export function parseNPage(value: string): number | null {
  const trimmed = value.trim().replace(/^0+/, '');
  if (trimmed === '') {
    return 0;
  }
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}
