// Site, image and tracking link utilities
import { config } from './environment';

export interface LinkSettings {
  siteBaseUrl: string;
  imageBaseUrl: string;
  photoPrefix: string;
  albumUrlTemplate: string;
}

/**
 * Link settings derived from the environment configuration
 */
export function getLinkSettings(): LinkSettings {
  const imageBaseUrl = config.publicBaseUrl
    ? config.publicBaseUrl
    : `https://${config.bucketName}.s3.amazonaws.com`;

  return {
    siteBaseUrl: trimTrailingSlash(config.siteBaseUrl),
    imageBaseUrl: trimTrailingSlash(imageBaseUrl),
    photoPrefix: config.photoPrefix,
    albumUrlTemplate: config.albumUrlTemplate
  };
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function pad(value: number, width: number = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * Campaign date in UTC, yyyy-MM-dd
 */
export function formatCampaignDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Email id for a send day in UTC, yyMMdd
 */
export function formatEmailId(date: Date): string {
  return `${pad(date.getUTCFullYear() % 100)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/**
 * Checks whether the query string already names a parameter (case-insensitive)
 */
export function hasQueryParameter(url: string, name: string): boolean {
  const queryIndex = url.indexOf('?');
  if (queryIndex < 0 || name === '') {
    return false;
  }

  let query = url.substring(queryIndex + 1);
  const hashIndex = query.indexOf('#');
  if (hashIndex >= 0) {
    query = query.substring(0, hashIndex);
  }

  const wanted = name.toLowerCase();
  return query
    .split('&')
    .filter(part => part !== '')
    .some(part => {
      const eqIndex = part.indexOf('=');
      const paramName = eqIndex >= 0 ? part.substring(0, eqIndex) : part;
      return paramName.toLowerCase() === wanted;
    });
}

/**
 * Appends encoded `name=value` pairs, keeping any fragment at the end
 */
export function appendQueryParameters(url: string, parameters: string[]): string {
  if (url === '' || parameters.length === 0) {
    return url;
  }

  let fragment = '';
  let baseUrl = url;
  const hashIndex = url.indexOf('#');
  if (hashIndex >= 0) {
    fragment = url.substring(hashIndex);
    baseUrl = url.substring(0, hashIndex);
  }

  const separator = baseUrl.includes('?') ? '&' : '?';
  return `${baseUrl}${separator}${parameters.join('&')}${fragment}`;
}

/**
 * Adds cid, eid and utm parameters, each only when the url does not carry it yet
 */
export function buildTrackingUrl(url: string, cid?: string, eid?: string, now: Date = new Date()): string {
  if (url.trim() === '') {
    return url;
  }

  const candidates: Array<[string, string | undefined]> = [
    ['cid', cid],
    ['eid', eid],
    ['utm_source', 'newsletter'],
    ['utm_medium', 'email'],
    ['utm_campaign', formatCampaignDate(now)]
  ];

  const parameters = candidates
    .filter((entry): entry is [string, string] => {
      const value = entry[1];
      return value !== undefined && value.trim() !== '' && !hasQueryParameter(url, entry[0]);
    })
    .map(([name, value]) => `${name}=${encodeURIComponent(value)}`);

  return appendQueryParameters(url, parameters);
}

/**
 * Unsubscribe link carrying the signed token
 */
export function buildUnsubscribeUrl(baseUrl: string, token: string): string {
  return `${baseUrl}?token=${encodeURIComponent(token)}`;
}

/**
 * Public page of a design; the site numbers pages from zero
 */
export function buildPatternUrl(
  title: string,
  albumId: number,
  nPage: string,
  settings: LinkSettings = getLinkSettings()
): string {
  const caption = (title.trim() || 'Cross-stitch-pattern').replace(/ /g, '-');
  const page = parseInt(nPage, 10);
  const pageIndex = Number.isNaN(page) ? 0 : Math.max(page - 1, 0);

  return `${settings.siteBaseUrl}/${caption}-${albumId}-${pageIndex}-Free-Design.aspx`;
}

/**
 * Public URL of the uploaded preview photo
 */
export function buildImageUrl(
  albumId: number,
  designId: number,
  photoFileName: string = config.photoFileName,
  settings: LinkSettings = getLinkSettings()
): string {
  return `${settings.imageBaseUrl}/${settings.photoPrefix}/${albumId}/${designId}/${photoFileName}`;
}

/**
 * Title-cased alphanumeric words of a caption joined by dashes
 */
export function buildAlbumCaptionSlug(caption: string | undefined, albumId: string): string {
  const words = (caption ?? '').match(/[\p{L}\p{N}]+/gu) ?? [];
  if (words.length === 0) {
    return `Album-${albumId}`;
  }

  return words
    .map(word => {
      const lower = word.toLowerCase();
      return lower.charAt(0).toUpperCase() + lower.substring(1);
    })
    .join('-');
}

/**
 * Album page, from the configured template or the default pattern
 */
export function buildAlbumUrl(
  albumId: string,
  caption?: string,
  settings: LinkSettings = getLinkSettings()
): string {
  const slug = buildAlbumCaptionSlug(caption, albumId);

  if (settings.albumUrlTemplate.trim() !== '') {
    return settings.albumUrlTemplate
      .replace(/\{AlbumId\}/g, albumId)
      .replace(/\{CaptionSlug\}/g, slug);
  }

  return `${settings.siteBaseUrl}/Free-${slug}-Charts.aspx`;
}
