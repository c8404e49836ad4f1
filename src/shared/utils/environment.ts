// Environment configuration
import { ConfigurationError } from './error-handling';

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value.split(',').map(item => item.trim()).filter(item => item !== '');
  return items.length > 0 ? items : fallback;
}

export interface AwsRegions {
  primary: string;
  ses: string;
  ec2: string;
}

/**
 * SES and EC2 may live apart from the data; both default to AWS_REGION
 */
export function readRegions(env: NodeJS.ProcessEnv = process.env): AwsRegions {
  const primary = env.AWS_REGION || 'us-east-1';
  return {
    primary,
    ses: env.SES_REGION || primary,
    ec2: env.EC2_REGION || primary
  };
}

export const config = {
  regions: readRegions(),

  // S3 Configuration
  bucketName: process.env.S3_BUCKET_NAME || 'cross-stitch-designs',
  chartPrefix: process.env.S3_CHART_PREFIX || 'charts',
  pdfPrefix: process.env.S3_PDF_PREFIX || 'pdfs',
  photoPrefix: process.env.S3_PHOTO_PREFIX || 'photos',
  publicBaseUrl: process.env.S3_PUBLIC_BASE_URL || '',

  // DynamoDB Configuration
  itemsTable: process.env.DYNAMO_TABLE_NAME || 'CrossStitchItems',
  usersTable: process.env.USERS_TABLE_NAME || 'CrossStitchUsers',
  designsIndex: process.env.DESIGNS_INDEX || 'Designs-index',
  designsByIdIndex: process.env.DESIGNS_BY_ID_INDEX || 'DesignsByID-index',
  sequenceStrategy: process.env.SEQUENCE_STRATEGY === 'max-query' ? 'max-query' as const : 'atomic' as const,

  // User table attribute names
  userAttributes: {
    email: process.env.USER_EMAIL_ATTRIBUTE || 'Email',
    firstName: process.env.USER_FIRST_NAME_ATTRIBUTE || 'FirstName',
    id: process.env.USER_ID_ATTRIBUTE || 'ID',
    cid: process.env.USER_CID_ATTRIBUTE || 'cid',
    verified: process.env.USER_VERIFIED_ATTRIBUTE || 'Verified',
    unsubscribed: process.env.USER_UNSUBSCRIBED_ATTRIBUTE || 'Unsubscribed'
  },

  // Conversion Configuration
  converterPath: process.env.CONVERTER_PATH || '',
  converterTimeoutMs: parseInt(process.env.CONVERTER_TIMEOUT_MS || '0'),
  pdfVariants: parseList(process.env.PDF_VARIANTS, ['1', '3', '5']),
  photoFileName: process.env.PHOTO_FILE_NAME || '4.jpg',

  // Site Configuration
  siteBaseUrl: process.env.SITE_BASE_URL || '',
  albumUrlTemplate: process.env.ALBUM_URL_TEMPLATE || '',
  facebookUrl: process.env.FACEBOOK_URL || '',

  // Pinterest Configuration
  pinterestApiBaseUrl: process.env.PINTEREST_API_BASE_URL || 'https://api.pinterest.com/v5',
  boardsCsvPath: process.env.PINTEREST_BOARDS_CSV_PATH || 'AlbumBoards.csv',
  defaultBoardId: process.env.PINTEREST_BOARD_ID || '',

  // EC2 Configuration
  environmentName: process.env.EC2_ENVIRONMENT_NAME || '',
  pollIntervalMs: parseInt(process.env.EC2_POLL_INTERVAL_MS || '5000'),
  maxPollAttempts: parseInt(process.env.EC2_MAX_POLL_ATTEMPTS || '60'),

  // Email Configuration
  senderEmail: process.env.SENDER_EMAIL || '',
  adminEmail: process.env.ADMIN_EMAIL || '',
  unsubscribeBaseUrl: process.env.UNSUBSCRIBE_BASE_URL || '',
  campaignSubject: process.env.CAMPAIGN_SUBJECT || 'A new cross stitch pattern is ready!',
  progressInterval: parseInt(process.env.CAMPAIGN_PROGRESS_INTERVAL || '50'),
  minSendIntervalMs: parseInt(process.env.CAMPAIGN_MIN_SEND_INTERVAL_MS || '0'),
  albumSuggestionCount: parseInt(process.env.ALBUM_SUGGESTION_COUNT || '4')
};

export type AppConfig = typeof config;

/**
 * Returns a required setting or throws ConfigurationError
 */
export function requireSetting(name: string, value: string | undefined): string {
  if (!value || value.trim() === '') {
    throw new ConfigurationError(`${name} is not configured`, { setting: name });
  }
  return value.trim();
}

/**
 * Validates every setting the full publish pipeline needs, before any side effect
 */
export function assertPipelineConfig(settings: AppConfig = config): void {
  requireSetting('S3_BUCKET_NAME', settings.bucketName);
  requireSetting('CONVERTER_PATH', settings.converterPath);
  requireSetting('SITE_BASE_URL', settings.siteBaseUrl);
  requireSetting('EC2_ENVIRONMENT_NAME', settings.environmentName);

  if (settings.pdfVariants.length === 0) {
    throw new ConfigurationError('PDF_VARIANTS must name at least one variant', { setting: 'PDF_VARIANTS' });
  }
}

/**
 * Validates the settings a notification campaign needs
 */
export function assertCampaignConfig(settings: AppConfig = config): void {
  requireSetting('SENDER_EMAIL', settings.senderEmail);
  requireSetting('SITE_BASE_URL', settings.siteBaseUrl);
}
