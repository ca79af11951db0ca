/**
 * Document Store Type Definitions
 *
 * Records written by the pipeline stages:
 * - ProcessingUnit: master record, one per intake (email or uploaded file)
 * - AttachmentUnit: one per attachment, keyed "{parentId}-{sequenceNumber}"
 * - OcrResultRecord: text extraction outcome, keyed (unitId, attachmentId)
 * - ClassificationRecord: classification outcome, keyed (unitId, attachmentId)
 *
 * DocumentStore is the only coordination surface between stages. Every write
 * is an upsert by a deterministic key so redelivered messages are harmless.
 */

import type {
  DocumentType,
  ExtractedEntity,
  Priority,
  RiskLevel,
} from '../classification/types.js';

// ---------------------------------------------------------------------------
// Status enums
// ---------------------------------------------------------------------------

export const UNIT_STATUSES = ['PENDING', 'PROCESSING', 'OCR_PENDING', 'COMPLETED', 'FAILED'] as const;
export type UnitStatus = (typeof UNIT_STATUSES)[number];

export const ATTACHMENT_STATUSES = ['PENDING', 'OCR_COMPLETED', 'OCR_FAILED', 'CLASSIFIED'] as const;
export type AttachmentStatus = (typeof ATTACHMENT_STATUSES)[number];

export type SourceType = 'EMAIL' | 'FILE';

export type OcrStatus = 'COMPLETED' | 'FAILED';

// ---------------------------------------------------------------------------
// ProcessingUnit
// ---------------------------------------------------------------------------

export interface EmailMetadata {
  emailFrom: string | null;
  emailTo: string[];
  emailCc: string[];
  emailSubject: string | null;
  emailBody: string | null;
  emailDate: string | null;
  emailTime: string | null;
  emailUri: string | null;
}

export interface FileMetadata {
  filename: string | null;
  fileUri: string | null;
  fileSize: number | null;
}

export interface ProcessingUnit extends EmailMetadata, FileMetadata {
  id: string;
  processingId: string;
  sourceType: SourceType;
  status: UnitStatus;
  /** Incremented once per successful status transition */
  statusVersion: number;
  attachmentCount: number;
  lastError: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Fields the coordinator supplies when upserting a unit */
export type UnitInput = Pick<ProcessingUnit, 'id' | 'processingId' | 'sourceType' | 'attachmentCount'> &
  Partial<EmailMetadata & FileMetadata>;

export interface UpsertUnitResult {
  unit: ProcessingUnit;
  created: boolean;
}

// ---------------------------------------------------------------------------
// AttachmentUnit
// ---------------------------------------------------------------------------

export interface AttachmentUnit {
  id: string;
  parentId: string;
  sequenceNumber: number;
  filename: string;
  blobUri: string;
  status: AttachmentStatus;
  ocrText: string | null;
  ocrConfidence: number | null;
  classificationType: DocumentType | null;
  classificationConfidence: number | null;
  createdAt: string;
  updatedAt: string;
}

export type AttachmentInput = Pick<AttachmentUnit, 'parentId' | 'sequenceNumber' | 'filename' | 'blobUri'>;

export type AttachmentPatch = Partial<
  Pick<
    AttachmentUnit,
    'status' | 'ocrText' | 'ocrConfidence' | 'classificationType' | 'classificationConfidence'
  >
>;

// ---------------------------------------------------------------------------
// Stage results
// ---------------------------------------------------------------------------

export interface OcrResultRecord {
  unitId: string;
  attachmentId: string;
  fileUri: string;
  extractedText: string;
  confidenceScore: number;
  pageCount: number;
  processingTimeSeconds: number;
  status: OcrStatus;
  extractor: string;
  error: string | null;
  createdAt: string;
}

export interface ClassificationRecord {
  unitId: string;
  attachmentId: string;
  fileUri: string;
  documentType: DocumentType;
  confidence: number;
  extractedEntities: ExtractedEntity[];
  riskAssessment: RiskLevel;
  priority: Priority;
  summary: string | null;
  keyFindings: string[];
  error: string | null;
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Store interface
// ---------------------------------------------------------------------------

/** Outcome of a compare-and-set on a unit's status */
export type CasOutcome = 'updated' | 'conflict' | 'missing';

export interface ListUnitsOptions {
  status?: UnitStatus;
  limit?: number;
}

export interface DocumentStore {
  getUnit(id: string): Promise<ProcessingUnit | null>;
  /**
   * Creates the unit with status PROCESSING, or merges metadata into an
   * existing one. Never touches status, statusVersion or createdAt of an
   * existing unit.
   */
  upsertUnit(input: UnitInput): Promise<UpsertUnitResult>;
  /**
   * Atomically moves the unit from `expected` to `next`. Increments
   * statusVersion and refreshes updatedAt on success.
   */
  compareAndSetStatus(
    id: string,
    expected: UnitStatus,
    next: UnitStatus,
    lastError?: string,
  ): Promise<CasOutcome>;
  listUnits(options?: ListUnitsOptions): Promise<ProcessingUnit[]>;

  upsertAttachment(input: AttachmentInput): Promise<AttachmentUnit>;
  getAttachment(attachmentId: string): Promise<AttachmentUnit | null>;
  /** Attachments of a unit ordered by sequence number */
  listAttachments(unitId: string): Promise<AttachmentUnit[]>;
  updateAttachment(attachmentId: string, patch: AttachmentPatch): Promise<void>;

  saveOcrResult(result: OcrResultRecord): Promise<void>;
  getOcrResult(unitId: string, attachmentId: string): Promise<OcrResultRecord | null>;

  saveClassification(result: ClassificationRecord): Promise<void>;
  getClassification(unitId: string, attachmentId: string): Promise<ClassificationRecord | null>;
}

/** Deterministic attachment key */
export function attachmentIdFor(unitId: string, sequenceNumber: number): string {
  return `${unitId}-${sequenceNumber}`;
}
