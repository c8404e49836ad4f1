// Campaign email content: greetings, announcement bodies, album suggestions
import type { AlbumRecord, DesignRecord, EmailContent } from '../../shared/models';
import { escapeHtml } from '../../shared/utils/notifications';
import { buildAlbumUrl, buildImageUrl, buildPatternUrl, buildTrackingUrl, getLinkSettings } from '../../shared/utils/tracking-links';
import type { LinkSettings } from '../../shared/utils/tracking-links';

const FALLBACK_NAME = 'friend';
const FALLBACK_ALT_TEXT = 'New cross stitch pattern';
const IMAGE_STYLE = 'max-width:280px; max-height:280px; width:auto; height:auto; border:0;';

export const UPLOAD_NOTICE_SUBJECT = 'Upload Successful';

/**
 * Everything about a published design that the announcement links to
 */
export interface AnnouncementDesign {
  albumId: number;
  designId: number;
  title: string;
  patternUrl: string;
  imageUrl: string;
  pinId: string | null;
}

export function toAnnouncementDesign(
  record: Pick<DesignRecord, 'albumId' | 'designId' | 'nPage' | 'title' | 'pinId'>,
  photoFileName: string,
  links: LinkSettings = getLinkSettings()
): AnnouncementDesign {
  return {
    albumId: record.albumId,
    designId: record.designId,
    title: record.title,
    patternUrl: buildPatternUrl(record.title, record.albumId, record.nPage, links),
    imageUrl: buildImageUrl(record.albumId, record.designId, photoFileName, links),
    pinId: record.pinId
  };
}

export interface TextAnnouncement {
  subject: string;
  body: string;
}

/**
 * Per-recipient values that end up in links and the greeting
 */
export interface PersonalDetails {
  firstName?: string;
  cid?: string;
  eid?: string;
  unsubscribeUrl: string;
}

function displayName(firstName: string | undefined): string {
  return firstName && firstName.trim() !== '' ? firstName.trim() : FALLBACK_NAME;
}

export function personalizeText(template: string, firstName?: string): string {
  if (template.trim() === '') {
    return '';
  }
  return template.split('<username>').join(displayName(firstName));
}

/**
 * HTML variant; also replaces the escaped placeholder and escapes the name
 */
export function personalizeHtml(template: string, firstName?: string): string {
  if (template.trim() === '') {
    return '';
  }
  const encodedName = escapeHtml(displayName(firstName));
  return template.split('&lt;username&gt;').join(encodedName).split('<username>').join(encodedName);
}

export function buildGreetingText(firstName?: string): string {
  return firstName && firstName.trim() !== '' ? `Hi ${firstName.trim()},\r\n\r\n` : 'Hi,\r\n\r\n';
}

export function buildGreetingHtml(firstName?: string): string {
  return firstName && firstName.trim() !== '' ? `<p>Hi ${escapeHtml(firstName.trim())},</p>` : '<p>Hi,</p>';
}

/**
 * Blank-line separated paragraphs become <p>, single newlines <br/>
 */
export function convertPlainTextToHtml(text: string): string {
  if (text.trim() === '') {
    return '';
  }

  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n\n')
    .map(paragraph => escapeHtml(paragraph).replace(/\n/g, '<br/>'))
    .filter(paragraph => paragraph.trim() !== '')
    .map(paragraph => `<p>${paragraph}</p>`)
    .join('');
}

export function buildUnsubscribeFooterText(unsubscribeUrl: string): string {
  return `\r\nUnsubscribe: ${unsubscribeUrl}`;
}

export function buildUnsubscribeFooterHtml(unsubscribeUrl: string): string {
  return `<p style="font-size:12px; color:#666;">If you prefer not to receive these emails, <a href="${unsubscribeUrl}">unsubscribe</a>.</p>`;
}

/**
 * Picks up to `count` random albums other than the current one; when nothing
 * else exists the current album may be suggested
 */
export function selectAlbumSuggestions(
  albums: AlbumRecord[],
  currentAlbumId: number,
  count: number,
  random: () => number = Math.random
): AlbumRecord[] {
  const current = currentAlbumId.toString().padStart(4, '0');
  let pool = albums.filter(album => album.albumId.toLowerCase() !== current);
  if (pool.length === 0) {
    pool = [...albums];
  }

  if (count <= 0 || pool.length === 0) {
    return [];
  }
  if (pool.length <= count) {
    return pool;
  }

  // Fisher-Yates
  for (let i = pool.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

function suggestionEntries(
  albums: AlbumRecord[],
  cid: string | undefined,
  eid: string | undefined,
  now: Date,
  settings: LinkSettings
): Array<{ caption: string; url: string }> {
  return albums.map((album, index) => ({
    caption: album.caption.trim() === '' ? `Featured album ${index + 1}` : album.caption,
    url: buildTrackingUrl(buildAlbumUrl(album.albumId, album.caption, settings), cid, eid, now)
  }));
}

export function buildAlbumSuggestionsHtml(
  albums: AlbumRecord[],
  cid?: string,
  eid?: string,
  now: Date = new Date(),
  settings: LinkSettings = getLinkSettings()
): string {
  if (albums.length === 0) {
    return '';
  }

  const items = suggestionEntries(albums, cid, eid, now, settings)
    .map(entry => `<li><a href="${escapeHtml(entry.url)}">${escapeHtml(entry.caption)}</a></li>`)
    .join('');
  return `<p>Explore more albums:</p><ul>${items}</ul>`;
}

export function buildAlbumSuggestionsText(
  albums: AlbumRecord[],
  cid?: string,
  eid?: string,
  now: Date = new Date(),
  settings: LinkSettings = getLinkSettings()
): string {
  if (albums.length === 0) {
    return '';
  }

  const lines = suggestionEntries(albums, cid, eid, now, settings).map(entry => `- ${entry.caption}: ${entry.url}\n`);
  return `\nExplore more albums:\n${lines.join('')}`;
}

/**
 * Origin of the pattern page, used as the "visit the site" link
 */
export function siteUrlOf(patternUrl: string): string {
  try {
    return new URL(patternUrl).origin;
  } catch (error) {
    console.warn('Pattern URL is not absolute, linking it as the site', { patternUrl, error: String(error) });
    return patternUrl;
  }
}

export function buildAltText(title: string): string {
  return title.trim() === '' ? FALLBACK_ALT_TEXT : title;
}

export function buildAnnouncementTextBody(
  title: string,
  patternUrl: string,
  siteUrl: string,
  facebookUrl: string
): string {
  const name = title.trim() === '' ? 'new design' : title.trim();
  let text =
    `I just wanted to send a quick note! The PDF cross-stitch pattern for ${name} is finished and has been uploaded to the site. ` +
    'I always love seeing what everyone creates.\r\n\r\n' +
    'You can download the pattern right here:\r\n' +
    `${patternUrl}\r\n\r\n` +
    'Happy Stitching,\r\n' +
    `Visit ${siteUrl} to explore more patterns and see what I'm uploading next.`;

  if (facebookUrl !== '') {
    text += `\r\nJoin me on Facebook: ${facebookUrl} - I'd love to connect.`;
  }
  return text;
}

export function buildAnnouncementHtmlBody(
  title: string,
  patternUrl: string,
  imageUrl: string,
  siteUrl: string,
  facebookUrl: string
): string {
  const name = title.trim() === '' ? 'new design' : title.trim();
  let html =
    `<p>I just wanted to send a quick note! The PDF cross-stitch pattern for ${escapeHtml(name)} is finished and has been uploaded to the site. ` +
    'I always love seeing what everyone creates.</p>' +
    '<p>You can download the pattern right here:</p>' +
    `<p><a href="${patternUrl}"><img src="${imageUrl}" alt="${escapeHtml(buildAltText(title))}" style="${IMAGE_STYLE}"></a></p>` +
    `<p><a href="${patternUrl}">Download the pattern here</a></p>` +
    '<p>Happy Stitching,</p>' +
    `<p>Visit <a href="${siteUrl}">${siteUrl}</a> to explore more patterns and see what I'm uploading next.</p>`;

  if (facebookUrl !== '') {
    html += `<p>Join me on Facebook: <a href="${facebookUrl}">${facebookUrl}</a>. I'd love to connect.</p>`;
  }
  return html;
}

export interface AnnouncementSettings {
  subject: string;
  facebookUrl: string;
  albums: AlbumRecord[];
  now?: Date;
  links?: LinkSettings;
}

/**
 * Full announcement for one recipient: greeting, tracked links, suggestions, footer
 */
export function buildAnnouncementEmail(
  design: AnnouncementDesign,
  personal: PersonalDetails,
  settings: AnnouncementSettings
): EmailContent {
  const now = settings.now ?? new Date();
  const links = settings.links ?? getLinkSettings();
  const patternUrl = buildTrackingUrl(design.patternUrl, personal.cid, personal.eid, now);
  const siteUrl = buildTrackingUrl(siteUrlOf(design.patternUrl), personal.cid, personal.eid, now);

  const textBody =
    buildGreetingText(personal.firstName) +
    buildAnnouncementTextBody(design.title, patternUrl, siteUrl, settings.facebookUrl) +
    buildAlbumSuggestionsText(settings.albums, personal.cid, personal.eid, now, links) +
    buildUnsubscribeFooterText(personal.unsubscribeUrl);

  const htmlBody =
    buildGreetingHtml(personal.firstName) +
    buildAnnouncementHtmlBody(design.title, patternUrl, design.imageUrl, siteUrl, settings.facebookUrl) +
    buildAlbumSuggestionsHtml(settings.albums, personal.cid, personal.eid, now, links) +
    buildUnsubscribeFooterHtml(personal.unsubscribeUrl);

  return { subject: settings.subject, textBody, htmlBody };
}

/**
 * Free-text announcement with the <username> placeholder filled in
 */
export function buildTextAnnouncementEmail(announcement: TextAnnouncement, personal: PersonalDetails): EmailContent {
  const text = personalizeText(announcement.body, personal.firstName);
  const html = personalizeHtml(convertPlainTextToHtml(announcement.body), personal.firstName);

  return {
    subject: announcement.subject,
    textBody: `${text}\r\n${buildUnsubscribeFooterText(personal.unsubscribeUrl)}`,
    htmlBody: html === '' ? undefined : html + buildUnsubscribeFooterHtml(personal.unsubscribeUrl)
  };
}

/**
 * Admin notice that a design went live
 */
export function buildUploadNotice(
  design: AnnouncementDesign,
  albums: AlbumRecord[],
  unsubscribeUrl: string,
  now: Date = new Date(),
  links: LinkSettings = getLinkSettings()
): EmailContent {
  const patternUrl = buildTrackingUrl(design.patternUrl, undefined, undefined, now);
  const pinId = design.pinId ?? '';

  const textBody =
    `The upload for album ${design.albumId} design ${design.designId} (${design.title}) pinId ${pinId} was successful.` +
    buildAlbumSuggestionsText(albums, undefined, undefined, now, links) +
    buildUnsubscribeFooterText(unsubscribeUrl);

  const htmlBody =
    `<p>The upload for album ${design.albumId} design ${design.designId} was successful.</p>` +
    `<p><a href="${patternUrl}"><img src="${design.imageUrl}" alt="${escapeHtml(buildAltText(design.title))}" style="${IMAGE_STYLE}"/></a></p>` +
    `<p>Pin ID: ${escapeHtml(pinId)}</p>` +
    buildAlbumSuggestionsHtml(albums, undefined, undefined, now, links) +
    buildUnsubscribeFooterHtml(unsubscribeUrl);

  return { subject: UPLOAD_NOTICE_SUBJECT, textBody, htmlBody };
}
