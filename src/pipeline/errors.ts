// ============================================================================
// Pipeline Error Types — Typed errors for stage and capability failures
// ============================================================================

/**
 * Base error for pipeline failures.
 * Messages carry ids only, never document text or email content.
 */
export class PipelineError extends Error {
  readonly code: string;

  constructor(message: string, code: string = 'PIPELINE_ERROR') {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
  }
}

/**
 * A stage message references a unit or attachment that does not exist.
 * Redelivery cannot fix this, so the stage worker dead-letters the message.
 */
export class DataIntegrityError extends PipelineError {
  readonly unitId: string;

  constructor(message: string, unitId: string) {
    super(message, 'DATA_INTEGRITY');
    this.name = 'DataIntegrityError';
    this.unitId = unitId;
  }
}

/**
 * Thrown when a blob cannot be fetched from storage.
 * Treated as transient: the stage returns false and the queue redelivers.
 */
export class BlobDownloadError extends PipelineError {
  readonly uri: string;
  readonly statusCode: number | null;

  constructor(message: string, uri: string, statusCode: number | null = null) {
    super(message, 'BLOB_DOWNLOAD_FAILED');
    this.name = 'BlobDownloadError';
    this.uri = uri;
    this.statusCode = statusCode;
  }
}

/**
 * A stage handler reported a transient failure (returned false).
 * Thrown from the job processor so BullMQ redelivers with backoff.
 */
export class StageRetryError extends PipelineError {
  constructor(message: string) {
    super(message, 'STAGE_RETRY');
    this.name = 'StageRetryError';
  }
}

/**
 * The kill switch is on. Never a dead-letter reason: the unit keeps its
 * status and the work resumes when the switch is cleared.
 */
export class AutomationPausedError extends PipelineError {
  constructor() {
    super('Automation disabled by kill switch', 'AUTOMATION_PAUSED');
    this.name = 'AutomationPausedError';
  }
}

/** Unrecognized blob URI scheme */
export class UnsupportedBlobUriError extends PipelineError {
  constructor(uri: string) {
    super(`Unsupported blob URI scheme: ${uri.split(':')[0]}`, 'BLOB_URI_UNSUPPORTED');
    this.name = 'UnsupportedBlobUriError';
  }
}

/** A file could not be turned into text (unsupported or unreadable format) */
export class ExtractionError extends PipelineError {
  constructor(message: string) {
    super(message, 'EXTRACTION_FAILED');
    this.name = 'ExtractionError';
  }
}

/** The AI capability returned something that failed validation */
export class ClassificationError extends PipelineError {
  constructor(message: string) {
    super(message, 'CLASSIFICATION_FAILED');
    this.name = 'ClassificationError';
  }
}

/** Returns the error message for logs and stored lastError fields */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
