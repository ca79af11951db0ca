// ============================================================================
// Intake Module — Barrel Export
// ============================================================================
//
// Ingestion coordinator (intake message → units and OCR fan-out) and the
// Gmail mail source feeding it.

// Types (type-only exports)
export type { GmailMessageMeta, AttachmentInfo, MailJobData, MailJobResult } from './types.js';

// Config
export { intakeConfig, SUPPORTED_EXTENSIONS, isSupportedFilename } from './config.js';
export type { IntakeConfig } from './config.js';

// Ingestion coordinator
export { handleIntake, defaultIngestionDeps, filenameFromUri, intakeRejectReason } from './ingestion-coordinator.js';
export type { IngestionDeps } from './ingestion-coordinator.js';
export {
  INGESTION_STAGE,
  processIngestionJob,
  createIngestionWorker,
  closeIngestionWorker,
} from './ingestion-worker.js';

// Gmail reading
export {
  pollForNewMessages,
  getMessageDetails,
  getInitialHistoryId,
  getRawMessage,
  listAttachments,
  downloadAttachment,
} from './gmail-reader.js';
export { getGmailReadonlyClient } from './gmail-client.js';

// Email source
export { ingestGmailMessage, defaultEmailSourceDeps, splitMailDate, unitIdForGmailMessage } from './email-source.js';
export type { EmailSourceDeps } from './email-source.js';

// Gmail monitor + history id
export {
  startGmailMonitor,
  getMailQueue,
  closeMailQueue,
  getStoredHistoryId,
  storeHistoryId,
  MAIL_QUEUE_NAME,
} from './gmail-monitor.js';

// Mail worker
export { createMailWorker, processMailJob, closeMailWorker } from './mail-worker.js';
