// Data validation utilities
import type { PatternInfo } from '../models';

/**
 * Validates email format using RFC 5322 compliant regex
 */
export function isValidEmailFormat(email: string): boolean {
  if (!email) {
    return false;
  }

  const emailRegex = /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

  return emailRegex.test(email.trim());
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validates raw extractor output and collects every problem found
 */
export function validatePatternInfo(raw: unknown): { isValid: true; pattern: PatternInfo } | { isValid: false; errors: string[] } {
  if (!isRecord(raw)) {
    return { isValid: false, errors: ['Pattern info must be an object'] };
  }

  const errors: string[] = [];
  const title = raw.title;
  const description = raw.description ?? '';
  const notes = raw.notes ?? '';
  const { width, height, nColors } = raw;

  if (typeof title !== 'string' || title.trim() === '') {
    errors.push('title is required');
  }
  if (typeof description !== 'string') {
    errors.push('description must be a string');
  }
  if (typeof notes !== 'string') {
    errors.push('notes must be a string');
  }
  if (!isNonNegativeInteger(width)) {
    errors.push('width must be a non-negative integer');
  }
  if (!isNonNegativeInteger(height)) {
    errors.push('height must be a non-negative integer');
  }
  if (!isNonNegativeInteger(nColors)) {
    errors.push('nColors must be a non-negative integer');
  }

  if (
    errors.length > 0 ||
    typeof title !== 'string' ||
    typeof description !== 'string' ||
    typeof notes !== 'string' ||
    !isNonNegativeInteger(width) ||
    !isNonNegativeInteger(height) ||
    !isNonNegativeInteger(nColors)
  ) {
    return { isValid: false, errors };
  }

  return {
    isValid: true,
    pattern: { title: title.trim(), description: description.trim(), notes: notes.trim(), width, height, nColors }
  };
}

/**
 * Parses an album id such as "0007" or "7"; null when it is not a positive number
 */
export function parseAlbumId(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const albumId = parseInt(trimmed, 10);
  return albumId > 0 ? albumId : null;
}
