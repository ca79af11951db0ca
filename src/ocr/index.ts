// ============================================================================
// OCR Module — Barrel Export
// ============================================================================

export type { ExtractorKind, FileFormat, ExtractionResult } from './types.js';
export { CONFIDENCE } from './types.js';

export { ocrConfig } from './config.js';
export type { OcrConfig } from './config.js';

export { FILE_FORMATS, OCR_IMAGE_MIME_TYPES, extensionOf, formatFor, mimeTypeFor, sniffFormat } from './formats.js';
export { extractText, countPdfPages } from './extractors.js';
export { transcribeDocument } from './gemini-ocr.js';
export type { Transcription } from './gemini-ocr.js';

export { handleOcr, defaultOcrStageDeps } from './ocr-stage.js';
export type { OcrStageDeps } from './ocr-stage.js';
export { OCR_STAGE, processOcrJob, createOcrWorker, closeOcrWorker } from './ocr-worker.js';
