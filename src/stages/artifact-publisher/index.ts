// Artifact uploads to object storage
import { promises as fs } from 'fs';
import { extname } from 'path';
import { DeleteObjectCommand, ListObjectsV2Command, PutObjectCommand } from '@aws-sdk/client-s3';
import { s3Client } from '../../shared/utils/aws-clients';
import { config } from '../../shared/utils/environment';
import { UploadError } from '../../shared/utils/error-handling';

export const LEGACY_PDF_VARIANT = '1';

export interface PublishArtifactsInput {
  albumId: number;
  designId: number;
  title: string;
  chartPath: string;
  convertedPdfPaths: Record<string, string>;
  photoPath: string;
}

export interface UploadedArtifact {
  key: string;
  contentType: string;
}

export function buildChartKey(designId: number, title: string, extension: string = '.scc'): string {
  return `${config.chartPrefix}/${designId.toString().padStart(5, '0')}_${title}${extension}`;
}

export function buildPdfKey(albumId: number, designId: number, variant: string): string {
  return `${config.pdfPrefix}/${albumId}/${designId}/Stitch${designId}_${variant}_Kit.pdf`;
}

export function buildLegacyPdfKey(albumId: number, designId: number): string {
  return `${config.pdfPrefix}/${albumId}/Stitch${designId}_Kit.pdf`;
}

export function buildPhotoKey(albumId: number, designId: number, photoFileName: string = config.photoFileName): string {
  return `${config.photoPrefix}/${albumId}/${designId}/${photoFileName}`;
}

/**
 * Every PDF key a published design should have
 */
export function buildExpectedPdfKeys(albumId: number, designId: number, variants: string[] = config.pdfVariants): string[] {
  const keys = variants.map(variant => buildPdfKey(albumId, designId, variant));
  if (variants.includes(LEGACY_PDF_VARIANT)) {
    keys.push(buildLegacyPdfKey(albumId, designId));
  }
  return keys;
}

/**
 * Uploads a local file; any failure becomes UploadError for that key
 */
export async function uploadFile(filePath: string, key: string, contentType: string): Promise<UploadedArtifact> {
  try {
    const body = await fs.readFile(filePath);
    await s3Client.send(new PutObjectCommand({
      Bucket: config.bucketName,
      Key: key,
      Body: body,
      ContentType: contentType
    }));
  } catch (error) {
    throw new UploadError(key, error);
  }

  console.log('Uploaded artifact', { key, contentType });
  return { key, contentType };
}

/**
 * Uploads chart, PDF variants, the legacy PDF copy and the photo, in that
 * order. Nothing is rolled back when a later upload fails.
 */
export async function publishArtifacts(input: PublishArtifactsInput): Promise<UploadedArtifact[]> {
  const { albumId, designId } = input;
  const uploaded: UploadedArtifact[] = [];

  const chartExtension = extname(input.chartPath).toLowerCase() || '.scc';
  uploaded.push(await uploadFile(
    input.chartPath,
    buildChartKey(designId, input.title, chartExtension),
    `text/${chartExtension.substring(1)}`
  ));

  for (const [variant, pdfPath] of Object.entries(input.convertedPdfPaths)) {
    uploaded.push(await uploadFile(pdfPath, buildPdfKey(albumId, designId, variant), 'application/pdf'));
  }

  const legacySource = input.convertedPdfPaths[LEGACY_PDF_VARIANT];
  if (legacySource) {
    uploaded.push(await uploadFile(legacySource, buildLegacyPdfKey(albumId, designId), 'application/pdf'));
  }

  uploaded.push(await uploadFile(input.photoPath, buildPhotoKey(albumId, designId), 'image/jpeg'));

  return uploaded;
}

export async function deleteObject(key: string): Promise<void> {
  await s3Client.send(new DeleteObjectCommand({
    Bucket: config.bucketName,
    Key: key
  }));
  console.log('Deleted object', { key });
}

/**
 * Lists every key under a prefix, following continuation tokens
 */
export async function listKeys(prefix: string): Promise<string[]> {
  const keys: string[] = [];
  let continuationToken: string | undefined;

  do {
    const response = await s3Client.send(new ListObjectsV2Command({
      Bucket: config.bucketName,
      Prefix: prefix,
      ContinuationToken: continuationToken
    }));

    for (const object of response.Contents ?? []) {
      if (object.Key) {
        keys.push(object.Key);
      }
    }

    continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
  } while (continuationToken);

  return keys;
}
