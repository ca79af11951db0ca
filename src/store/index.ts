// ============================================================================
// Document Store — Barrel Export
// ============================================================================

export type {
  AttachmentInput,
  AttachmentPatch,
  AttachmentStatus,
  AttachmentUnit,
  CasOutcome,
  ClassificationRecord,
  DocumentStore,
  EmailMetadata,
  FileMetadata,
  ListUnitsOptions,
  OcrResultRecord,
  OcrStatus,
  ProcessingUnit,
  SourceType,
  UnitInput,
  UnitStatus,
  UpsertUnitResult,
} from './types.js';
export { ATTACHMENT_STATUSES, UNIT_STATUSES, attachmentIdFor } from './types.js';

export {
  ALLOWED_TRANSITIONS,
  canTransition,
  isTerminalStatus,
  isTerminalAttachmentStatus,
  transitionUnit,
} from './status.js';
export type { TransitionOutcome, TransitionOptions } from './status.js';

export { RedisDocumentStore, getDocumentStore, closeDocumentStore } from './redis-store.js';
