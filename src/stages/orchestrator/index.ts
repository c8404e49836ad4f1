// Publish pipeline: every stage awaited in order, failures reported per stage
import type { DesignRecord, PatternInfoExtractor } from '../../shared/models';
import { assertCampaignConfig, assertPipelineConfig, config } from '../../shared/utils/environment';
import type { AppConfig } from '../../shared/utils/environment';
import { NotFoundError, PipelineError, describeError, errorMessage } from '../../shared/utils/error-handling';
import type { PipelineErrorKind } from '../../shared/utils/error-handling';
import { JsonPatternInfoExtractor, loadBatchFolder } from '../../shared/utils/file-handler';
import { EnvAccessTokenProvider, PinterestClient } from '../../shared/utils/pinterest-client';
import type { ProgressChannel } from '../../shared/utils/progress-tracker';
import { ArtifactConverter } from '../artifact-converter';
import { publishArtifacts } from '../artifact-publisher';
import type { UploadedArtifact } from '../artifact-publisher';
import { InfraVerifier } from '../infra-verifier';
import type { VerificationOutcome } from '../infra-verifier';
import { albumExists, putDesignRecord } from '../item-catalog';
import { NotificationCampaign, toAnnouncementDesign } from '../notification-campaign';
import type { CampaignSummary } from '../notification-campaign';
import { SequenceAllocator } from '../sequence-allocator';
import { BoardIndexCache, SocialPinPublisher } from '../social-pin-publisher';

const SOURCE = 'pipeline';

export type PipelineStage =
  | 'configuration'
  | 'batch'
  | 'allocation'
  | 'conversion'
  | 'upload'
  | 'pin'
  | 'catalog'
  | 'verification'
  | 'campaign';

export interface PublishInput {
  batchFolderPath: string;
  runCampaign?: boolean;
  signal?: AbortSignal;
}

export interface PipelineDependencies {
  progress: ProgressChannel;
  extractor: PatternInfoExtractor;
  allocator: SequenceAllocator;
  converter: ArtifactConverter;
  pinPublisher: SocialPinPublisher;
  verifier: Pick<InfraVerifier, 'verify'>;
  campaign: Pick<NotificationCampaign, 'assertReady' | 'runDesignCampaign'>;
  settings?: AppConfig;
}

export type CampaignOutcome =
  | { status: 'sent'; summary: CampaignSummary }
  | { status: 'skipped'; reason: string };

export type PublishRunResult =
  | {
    status: 'succeeded';
    record: DesignRecord;
    uploaded: UploadedArtifact[];
    verification: VerificationOutcome;
    campaign: CampaignOutcome;
  }
  | {
    status: 'failed';
    stage: PipelineStage;
    errorKind: PipelineErrorKind | 'unexpected';
    message: string;
    record?: DesignRecord;
    error: unknown;
  };

class StageFailure extends Error {
  constructor(public readonly stage: PipelineStage, public readonly error: unknown) {
    super(errorMessage(error));
  }
}

async function runStage<T>(
  stage: PipelineStage,
  progress: ProgressChannel,
  signal: AbortSignal | undefined,
  work: () => Promise<T>
): Promise<T> {
  if (signal?.aborted) {
    throw new StageFailure(stage, new Error(`Cancelled before ${stage}`));
  }

  progress.emit(SOURCE, `[${stage}] started`);
  try {
    const result = await work();
    progress.emit(SOURCE, `[${stage}] done`);
    return result;
  } catch (error) {
    throw new StageFailure(stage, error);
  }
}

/**
 * Wires the real collaborators from configuration
 */
export function createPipelineDependencies(progress: ProgressChannel, signal?: AbortSignal): PipelineDependencies {
  const pinterest = new PinterestClient(new EnvAccessTokenProvider());

  return {
    progress,
    extractor: new JsonPatternInfoExtractor(),
    allocator: new SequenceAllocator(),
    converter: new ArtifactConverter(),
    pinPublisher: new SocialPinPublisher(pinterest, new BoardIndexCache()),
    verifier: new InfraVerifier(progress, { signal }),
    campaign: new NotificationCampaign(progress, { signal })
  };
}

/**
 * Publishes one batch folder: allocate, convert, upload, pin, catalog,
 * verify and, when verification passed and it was asked for, notify
 */
export async function publishDesign(input: PublishInput, deps: PipelineDependencies): Promise<PublishRunResult> {
  const { progress } = deps;
  const settings = deps.settings ?? config;
  const signal = input.signal;
  let record: DesignRecord | undefined;

  try {
    await runStage('configuration', progress, signal, async () => {
      assertPipelineConfig(settings);
      await deps.pinPublisher.assertReady();
      if (input.runCampaign) {
        assertCampaignConfig(settings);
        await deps.campaign.assertReady();
      }
    });

    const { batch, pattern } = await runStage('batch', progress, signal, async () => {
      const batch = await loadBatchFolder(input.batchFolderPath, settings.pdfVariants, settings.photoFileName);
      if (!(await albumExists(batch.albumId))) {
        throw new NotFoundError(`Album ${batch.albumId} does not exist in the item store`, [`ALB#${batch.albumId.toString().padStart(4, '0')}`]);
      }
      const pattern = await deps.extractor.extract(batch.folderPath);
      return { batch, pattern };
    });

    const numbers = await runStage('allocation', progress, signal, () => deps.allocator.allocateDesignNumbers(batch.albumId));
    progress.emit(SOURCE, `Allocated design ${numbers.designId}, page ${numbers.nPage}, global page ${numbers.nGlobalPage}.`);

    const convertedPdfPaths = await runStage('conversion', progress, signal, () => deps.converter.convertAll(batch.pdfPaths));

    const uploaded = await runStage('upload', progress, signal, () => publishArtifacts({
      albumId: batch.albumId,
      designId: numbers.designId,
      title: pattern.title,
      chartPath: batch.chartPath,
      convertedPdfPaths,
      photoPath: batch.photoPath
    }));

    const pin = await runStage('pin', progress, signal, () => deps.pinPublisher.createPin({
      ...pattern,
      albumId: batch.albumId,
      designId: numbers.designId,
      nPage: numbers.nPage
    }));

    const designRecord: DesignRecord = {
      albumId: batch.albumId,
      designId: numbers.designId,
      nPage: numbers.nPage,
      nGlobalPage: numbers.nGlobalPage,
      title: pattern.title,
      description: pattern.description,
      notes: pattern.notes,
      width: pattern.width,
      height: pattern.height,
      nColors: pattern.nColors,
      pinId: pin.pinId
    };
    record = designRecord;
    await runStage('catalog', progress, signal, () => putDesignRecord(designRecord));

    const verification = await runStage('verification', progress, signal, () => deps.verifier.verify());

    let campaign: CampaignOutcome;
    if (!input.runCampaign) {
      campaign = { status: 'skipped', reason: 'Campaign not requested' };
    } else if (verification.status !== 'success') {
      campaign = { status: 'skipped', reason: `Infrastructure verification failed: ${verification.error.message}` };
      progress.emit(SOURCE, `Campaign skipped: ${campaign.reason}`);
    } else {
      const design = toAnnouncementDesign(designRecord, settings.photoFileName);
      const summary = await runStage('campaign', progress, signal, () => deps.campaign.runDesignCampaign(design));
      campaign = { status: 'sent', summary };
    }

    progress.emit(SOURCE, `Design ${designRecord.designId} published.`);
    return { status: 'succeeded', record: designRecord, uploaded, verification, campaign };
  } catch (error) {
    const stage: PipelineStage = error instanceof StageFailure ? error.stage : 'configuration';
    const cause = error instanceof StageFailure ? error.error : error;
    const message = describeError(cause);

    progress.emit(SOURCE, `[${stage}] failed: ${message}`);
    console.error('Publish pipeline failed', { stage, error: errorMessage(cause) });

    return {
      status: 'failed',
      stage,
      errorKind: cause instanceof PipelineError ? cause.kind : 'unexpected',
      message,
      record,
      error: cause
    };
  }
}
