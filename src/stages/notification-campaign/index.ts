// Notification campaign: admin copy first, then the subscriber batch
import type { AlbumRecord, EmailContent, Recipient } from '../../shared/models';
import { config, requireSetting } from '../../shared/utils/environment';
import { ConfigurationError, SendError, errorMessage } from '../../shared/utils/error-handling';
import { buildUnsubscribeHeaders, sendEmail } from '../../shared/utils/notifications';
import type { OutgoingEmail } from '../../shared/utils/notifications';
import {
  calculateSendProgress,
  formatDuration,
  formatSendProgress,
  isProgressDue
} from '../../shared/utils/progress-tracker';
import type { ProgressChannel } from '../../shared/utils/progress-tracker';
import { getUnsubscribeSecretWithFallback } from '../../shared/utils/secrets-manager';
import { buildUnsubscribeUrl, formatEmailId, getLinkSettings } from '../../shared/utils/tracking-links';
import { generateToken } from '../../shared/utils/unsubscribe-tokens';
import { fetchAlbums } from '../item-catalog';
import {
  buildAnnouncementEmail,
  buildTextAnnouncementEmail,
  buildUploadNotice,
  selectAlbumSuggestions
} from './content';
import type { AnnouncementDesign, AnnouncementSettings, TextAnnouncement } from './content';
import { countEligibleRecipients, fetchRecipients, updateLastEmailDate } from './recipients';

export * from './content';
export * from './recipients';

const SOURCE = 'campaign';
export const ADMIN_CORRELATION_ID = 'admin';

export interface CampaignOptions {
  label?: string;
  sender?: string;
  adminEmail?: string;
  subject?: string;
  facebookUrl?: string;
  progressInterval?: number;
  minSendIntervalMs?: number;
  albumSuggestionCount?: number;
  signal?: AbortSignal;
  now?: () => Date;
}

/**
 * Builds one recipient's email once its unsubscribe link is known
 */
export type ContentBuilder = (recipient: Recipient, unsubscribeUrl: string) => EmailContent;

export interface BatchSummary {
  label: string;
  sent: number;
  listSize: number;
  target: number;
  timestampFailures: number;
  cancelled: boolean;
  elapsedMs: number;
}

export interface CampaignSummary {
  uploadNoticeSent: boolean;
  adminCopySent: boolean;
  batch: BatchSummary;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Unsubscribe base: the configured URL, else `<site>/unsubscribe`
 */
export function resolveUnsubscribeBaseUrl(): string {
  const configured = config.unsubscribeBaseUrl.trim().replace(/\/+$/, '');
  return configured !== '' ? configured : `${getLinkSettings().siteBaseUrl}/unsubscribe`;
}

/**
 * Unsubscribe link carrying the HMAC token of the address
 */
export async function buildUnsubscribeUrlFor(email: string): Promise<string> {
  const secret = await getUnsubscribeSecretWithFallback();
  return buildUnsubscribeUrl(resolveUnsubscribeBaseUrl(), generateToken(email, secret));
}

/**
 * Random album suggestions; a failed lookup only costs the suggestions
 */
export async function loadAlbumSuggestions(currentAlbumId: number, count: number): Promise<AlbumRecord[]> {
  try {
    return selectAlbumSuggestions(await fetchAlbums(), currentAlbumId, count);
  } catch (error) {
    console.warn('Album suggestions unavailable, sending without them', { error: errorMessage(error) });
    return [];
  }
}

export class NotificationCampaign {
  private readonly label: string;
  private readonly sender: string;
  private readonly adminEmail: string;
  private readonly subject: string;
  private readonly facebookUrl: string;
  private readonly progressInterval: number;
  private readonly minSendIntervalMs: number;
  private readonly albumSuggestionCount: number;
  private readonly signal?: AbortSignal;
  private readonly now: () => Date;

  constructor(private readonly progress: ProgressChannel, options: CampaignOptions = {}) {
    this.label = options.label ?? '[Campaign]';
    this.sender = options.sender ?? config.senderEmail;
    this.adminEmail = (options.adminEmail ?? config.adminEmail).trim();
    this.subject = options.subject ?? config.campaignSubject;
    this.facebookUrl = options.facebookUrl ?? config.facebookUrl;
    this.progressInterval = options.progressInterval ?? config.progressInterval;
    this.minSendIntervalMs = options.minSendIntervalMs ?? config.minSendIntervalMs;
    this.albumSuggestionCount = options.albumSuggestionCount ?? config.albumSuggestionCount;
    this.signal = options.signal;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fails when a campaign could not compose its first email
   */
  async assertReady(): Promise<void> {
    requireSetting('SENDER_EMAIL', this.sender);
    await getUnsubscribeSecretWithFallback();
  }

  /**
   * Email for one address with one-click unsubscribe headers
   */
  async compose(email: string, build: ContentBuilder, recipient: Recipient): Promise<OutgoingEmail> {
    const sender = requireSetting('SENDER_EMAIL', this.sender);
    const unsubscribeUrl = await buildUnsubscribeUrlFor(email);
    const content = build(recipient, unsubscribeUrl);

    return {
      sender,
      recipients: [email],
      subject: content.subject,
      textBody: content.textBody,
      htmlBody: content.htmlBody,
      headers: buildUnsubscribeHeaders(unsubscribeUrl, sender)
    };
  }

  /**
   * Sends to the configured admin; false when no admin is configured
   */
  async sendToAdmin(build: ContentBuilder, description: string): Promise<boolean> {
    if (this.adminEmail === '') {
      return false;
    }

    const admin: Recipient = { email: this.adminEmail, firstName: 'admin', correlationId: ADMIN_CORRELATION_ID };
    const message = await this.compose(this.adminEmail, build, admin);
    try {
      await sendEmail(message);
    } catch (error) {
      throw new SendError(this.adminEmail, 0, error);
    }

    this.progress.emit(SOURCE, `${this.label} Sent ${description} to admin.`);
    return true;
  }

  /**
   * Drops the admin address from a recipient list, ignoring case
   */
  excludeAdmin(recipients: Recipient[]): Recipient[] {
    if (this.adminEmail === '') {
      return recipients;
    }
    const admin = this.adminEmail.toLowerCase();
    return recipients.filter(recipient => recipient.email.toLowerCase() !== admin);
  }

  /**
   * Sends sequentially. A failed send stops the batch with SendError; a failed
   * LastEmailDate update is reported and the batch goes on.
   */
  async sendBatch(recipients: Recipient[], build: ContentBuilder, eligibleCount: number = 0): Promise<BatchSummary> {
    const label = this.label;
    const started = Date.now();
    const summary: BatchSummary = {
      label,
      sent: 0,
      listSize: recipients.length,
      target: Math.max(eligibleCount, recipients.length),
      timestampFailures: 0,
      cancelled: false,
      elapsedMs: 0
    };

    if (recipients.length === 0) {
      this.progress.emit(SOURCE, `${label} No recipients found.`);
      return summary;
    }

    let lastSendAt = 0;
    for (const recipient of recipients) {
      if (this.signal?.aborted) {
        summary.cancelled = true;
        this.progress.emit(SOURCE, `${label} Cancelled after ${summary.sent} email(s).`);
        break;
      }

      const wait = lastSendAt > 0 ? this.minSendIntervalMs - (Date.now() - lastSendAt) : 0;
      if (wait > 0) {
        await sleep(wait);
      }
      lastSendAt = Date.now();

      const message = await this.compose(recipient.email, build, recipient);
      try {
        await sendEmail(message);
      } catch (error) {
        console.error('Campaign send failed', { label, email: recipient.email, sent: summary.sent, error: errorMessage(error) });
        throw new SendError(recipient.email, summary.sent, error);
      }
      summary.sent++;

      try {
        await updateLastEmailDate(recipient, this.now());
      } catch (error) {
        summary.timestampFailures++;
        console.warn('LastEmailDate update failed', { email: recipient.email, error: errorMessage(error) });
        this.progress.emit(SOURCE, `${label} Failed to update LastEmailDate for ${recipient.email}: ${errorMessage(error)}`);
      }

      if (isProgressDue(summary.sent, recipients.length, this.progressInterval)) {
        const snapshot = calculateSendProgress(summary.sent, eligibleCount, recipients.length, Date.now() - started);
        this.progress.emit(SOURCE, formatSendProgress(label, snapshot));
      }
    }

    summary.elapsedMs = Date.now() - started;
    this.progress.emit(SOURCE, `${label} Finished sending ${summary.sent} email(s) in ${formatDuration(summary.elapsedMs)}.`);
    return summary;
  }

  private announcementBuilder(design: AnnouncementDesign, albums: AlbumRecord[], now: Date): ContentBuilder {
    const eid = formatEmailId(now);
    const settings: AnnouncementSettings = { subject: this.subject, facebookUrl: this.facebookUrl, albums, now };

    return (recipient, unsubscribeUrl) => buildAnnouncementEmail(design, {
      firstName: recipient.firstName,
      cid: recipient.correlationId,
      eid,
      unsubscribeUrl
    }, settings);
  }

  /**
   * Upload notice, admin copy of the announcement, then every eligible subscriber
   */
  async runDesignCampaign(design: AnnouncementDesign): Promise<CampaignSummary> {
    requireSetting('SENDER_EMAIL', this.sender);

    const albums = await loadAlbumSuggestions(design.albumId, this.albumSuggestionCount);
    const now = this.now();

    const uploadNoticeSent = await this.sendToAdmin(
      (_admin, unsubscribeUrl) => buildUploadNotice(design, albums, unsubscribeUrl, now),
      'upload notice'
    );

    const announce = this.announcementBuilder(design, albums, now);
    const adminCopySent = await this.sendToAdmin(announce, 'announcement');
    const recipients = this.excludeAdmin(await fetchRecipients(true, true));
    const eligibleCount = await countEligibleRecipients();
    const batch = await this.sendBatch(recipients, announce, eligibleCount);

    return { uploadNoticeSent, adminCopySent, batch };
  }

  /**
   * The subscriber announcement, sent to the admin only
   */
  async sendAdminPreview(design: AnnouncementDesign): Promise<void> {
    requireSetting('SENDER_EMAIL', this.sender);
    requireSetting('ADMIN_EMAIL', this.adminEmail);

    const albums = await loadAlbumSuggestions(design.albumId, this.albumSuggestionCount);
    await this.sendToAdmin(this.announcementBuilder(design, albums, this.now()), 'subscriber announcement preview');
  }

  /**
   * Free-text announcement to the admin and every eligible subscriber
   */
  async runTextCampaign(announcement: TextAnnouncement): Promise<CampaignSummary> {
    requireSetting('SENDER_EMAIL', this.sender);
    if (announcement.subject.trim() === '' || announcement.body.trim() === '') {
      throw new ConfigurationError('Text announcement subject and body must not be empty', { setting: 'announcement' });
    }

    const build: ContentBuilder = (recipient, unsubscribeUrl) => buildTextAnnouncementEmail(announcement, {
      firstName: recipient.correlationId === ADMIN_CORRELATION_ID ? undefined : recipient.firstName,
      unsubscribeUrl
    });

    const adminCopySent = await this.sendToAdmin(build, 'text announcement');
    const recipients = this.excludeAdmin(await fetchRecipients(true, true));
    const eligibleCount = recipients.length === 0 ? 0 : await countEligibleRecipients();
    const batch = await this.sendBatch(recipients, build, eligibleCount);

    return { uploadNoticeSent: false, adminCopySent, batch };
  }
}
