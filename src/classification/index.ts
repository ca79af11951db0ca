// ============================================================================
// Classification Module — Barrel Export
// ============================================================================
//
// Document classification stage: Gemini structured output over OCR text,
// persisted per attachment, followed by the unit completion check.

// Types (type-only exports)
export type { DocumentType, RiskLevel, Priority, ExtractedEntity, ClassificationOutput } from './types.js';

// Constants
export {
  DOCUMENT_TYPES,
  RISK_LEVELS,
  PRIORITIES,
  ExtractedEntitySchema,
  ClassificationOutputSchema,
  UNCLASSIFIED_RESULT,
} from './types.js';

// Config
export { classificationConfig } from './config.js';
export type { ClassificationConfig } from './config.js';

// Classifier
export { classifyText } from './classifier.js';

// Stage handler + worker
export { handleClassification, defaultClassificationStageDeps } from './classification-stage.js';
export type { ClassificationStageDeps } from './classification-stage.js';
export {
  CLASSIFICATION_STAGE,
  processClassificationJob,
  createClassificationWorker,
  closeClassificationWorker,
} from './classification-worker.js';
