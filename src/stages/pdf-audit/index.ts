// Audit of published designs against the PDF objects in storage
import { config } from '../../shared/utils/environment';
import { writeFileContent } from '../../shared/utils/file-handler';
import type { ProgressChannel } from '../../shared/utils/progress-tracker';
import { buildExpectedPdfKeys, listKeys } from '../artifact-publisher';
import { fetchDesignRefs } from '../item-catalog';
import type { DesignRef } from '../item-catalog';

const SOURCE = 'audit';
export const ALL_PRESENT_LINE = 'All required PDFs are present.';
export const DEFAULT_REPORT_PATH = 'MissingDesignPdfs.txt';

export interface MissingPdfs extends DesignRef {
  missingKeys: string[];
}

export interface AuditResult {
  designCount: number;
  pdfCount: number;
  missing: MissingPdfs[];
  reportPath: string;
}

/**
 * Designs lacking any expected PDF key; keys compare case-insensitively
 */
export function findMissingPdfs(
  designs: DesignRef[],
  existingKeys: Iterable<string>,
  variants: string[] = config.pdfVariants
): MissingPdfs[] {
  const existing = new Set<string>();
  for (const key of existingKeys) {
    existing.add(key.toLowerCase());
  }

  const missing: MissingPdfs[] = [];
  for (const design of designs) {
    const missingKeys = buildExpectedPdfKeys(design.albumId, design.designId, variants)
      .filter(key => !existing.has(key.toLowerCase()));
    if (missingKeys.length > 0) {
      missing.push({ ...design, missingKeys });
    }
  }
  return missing;
}

/**
 * `designId,albumId` per line ordered by design id, or the all-present line
 */
export function formatMissingPdfReport(missing: MissingPdfs[]): string {
  const lines = missing.length === 0
    ? [ALL_PRESENT_LINE]
    : [...missing].sort((a, b) => a.designId - b.designId).map(entry => `${entry.designId},${entry.albumId}`);
  return `${lines.join('\n')}\n`;
}

export async function auditMissingPdfs(
  progress: ProgressChannel,
  reportPath: string = DEFAULT_REPORT_PATH
): Promise<AuditResult> {
  progress.emit(SOURCE, 'Checking storage for missing PDFs...');

  const designs = await fetchDesignRefs();
  progress.emit(SOURCE, `Fetched ${designs.length} designs from the item store.`);

  const pdfKeys = await listKeys(`${config.pdfPrefix}/`);
  progress.emit(SOURCE, `Indexed ${pdfKeys.length} PDF objects.`);

  const missing = findMissingPdfs(designs, pdfKeys);
  await writeFileContent(reportPath, formatMissingPdfReport(missing));
  progress.emit(SOURCE, `Missing PDFs for ${missing.length} design(s). Report written to: ${reportPath}`);

  return { designCount: designs.length, pdfCount: pdfKeys.length, missing, reportPath };
}
