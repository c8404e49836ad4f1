// Pipeline error types

export type PipelineErrorKind =
  | 'configuration'
  | 'not_found'
  | 'conversion'
  | 'upload'
  | 'publish'
  | 'verification'
  | 'send'
  | 'item_store';

/**
 * Base class for every failure the pipeline reports
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly kind: PipelineErrorKind,
    public readonly retryable: boolean = false,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'configuration', false, details);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message, 'not_found', false, { missing });
    this.name = 'NotFoundError';
  }
}

export class ConversionError extends PipelineError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly output: string
  ) {
    super(message, 'conversion', false, { exitCode, output });
    this.name = 'ConversionError';
  }
}

export class UploadError extends PipelineError {
  constructor(public readonly key: string, cause: unknown) {
    super(`Upload of ${key} failed: ${errorMessage(cause)}`, 'upload', true, { key }, { cause });
    this.name = 'UploadError';
  }
}

export class PublishError extends PipelineError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    // 429 and 5xx are worth another attempt, the rest is a bad request
    super(message, 'publish', status === 429 || status >= 500, { status, body });
    this.name = 'PublishError';
  }
}

export class VerificationFailure extends PipelineError {
  constructor(message: string, public readonly stage: string, cause?: unknown) {
    super(message, 'verification', false, { stage }, { cause });
    this.name = 'VerificationFailure';
  }
}

export class SendError extends PipelineError {
  constructor(
    public readonly email: string,
    public readonly sentCount: number,
    cause: unknown
  ) {
    super(`Sending to ${email} failed after ${sentCount} sent: ${errorMessage(cause)}`, 'send', false, { email, sentCount }, { cause });
    this.name = 'SendError';
  }
}

export class ItemStoreError extends PipelineError {
  constructor(public readonly operation: string, cause: unknown) {
    super(`Item store ${operation} failed: ${errorMessage(cause)}`, 'item_store', true, { operation }, { cause });
    this.name = 'ItemStoreError';
  }
}

/**
 * Extracts a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Reads the retry flag; foreign errors are not retried
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof PipelineError && error.retryable;
}

/**
 * Turns any error into the status text shown to the operator
 */
export function describeError(error: unknown): string {
  if (!(error instanceof PipelineError)) {
    return `Unexpected error: ${errorMessage(error)}`;
  }

  switch (error.kind) {
    case 'configuration':
      return `Configuration problem: ${error.message}`;
    case 'not_found':
      return `Not found: ${error.message}`;
    case 'conversion':
      return `PDF conversion failed: ${error.message}`;
    case 'upload':
      return `Upload failed: ${error.message}`;
    case 'publish':
      return `Pin publishing failed: ${error.message}`;
    case 'verification':
      return `Infrastructure verification failed: ${error.message}`;
    case 'send':
      return `Email campaign stopped: ${error.message}`;
    case 'item_store':
      return `Database operation failed: ${error.message}`;
  }
}
