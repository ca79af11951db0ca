/**
 * OCR Stage — extract_text handler
 *
 * For one attachment:
 *   1. Verify the parent unit and attachment exist (DataIntegrityError if not)
 *   2. Download the blob
 *   3. Extract text (extractor chosen by extension, never throws)
 *   4. Persist the OCR result and attachment status
 *   5. Text found → enqueue classification (text capped for the message)
 *      No text   → attachment is terminal (OCR_FAILED); run the completion check
 *
 * Returns false only when download, persistence or enqueueing throws, so the
 * queue redelivers. Redelivery is harmless: results are upserts keyed by
 * (unitId, attachmentId) and the classification job id is per attachment.
 */

import { getBlobStore } from '../blob/blob-store.js';
import type { BlobStore } from '../blob/blob-store.js';
import { completeUnitIfSettled } from '../pipeline/completion.js';
import { DataIntegrityError, errorMessage } from '../pipeline/errors.js';
import { truncateText } from '../pipeline/text.js';
import { enqueueClassification } from '../queue/queues.js';
import type { ClassificationMessage, OcrMessage } from '../queue/messages.js';
import { getDocumentStore } from '../store/redis-store.js';
import { isTerminalAttachmentStatus } from '../store/status.js';
import type { DocumentStore } from '../store/types.js';
import { ocrConfig } from './config.js';
import { extractText } from './extractors.js';
import type { ExtractionResult } from './types.js';

export interface OcrStageDeps {
  store: DocumentStore;
  blobs: BlobStore;
  extract: (bytes: Buffer, filename: string) => Promise<ExtractionResult>;
  enqueueClassification: (message: ClassificationMessage) => Promise<void>;
  /** Max characters of text placed on the classification message */
  messageTextLimit: number;
}

export function defaultOcrStageDeps(): OcrStageDeps {
  return {
    store: getDocumentStore(),
    blobs: getBlobStore(),
    extract: extractText,
    enqueueClassification,
    messageTextLimit: ocrConfig.messageTextLimit,
  };
}

export async function handleOcr(message: OcrMessage, deps: OcrStageDeps): Promise<boolean> {
  const { unit_id: unitId, attachment_id: attachmentId } = message;

  const unit = await deps.store.getUnit(unitId);
  if (!unit) {
    console.warn('[ocr] anomaly: OCR message for unknown unit', { unitId, attachmentId });
    throw new DataIntegrityError(`OCR message references unknown unit ${unitId}`, unitId);
  }

  const attachment = await deps.store.getAttachment(attachmentId);
  if (!attachment || attachment.parentId !== unitId) {
    console.warn('[ocr] anomaly: OCR message for unknown attachment', { unitId, attachmentId });
    throw new DataIntegrityError(`OCR message references unknown attachment ${attachmentId}`, unitId);
  }

  if (isTerminalAttachmentStatus(attachment.status)) {
    console.log('[ocr] Attachment already settled, skipping', { unitId, attachmentId, status: attachment.status });
    return true;
  }

  try {
    const bytes = await deps.blobs.get(message.file_uri);
    const extraction = await deps.extract(bytes, message.filename || attachment.filename);
    const hasText = extraction.text.trim().length > 0;

    await deps.store.saveOcrResult({
      unitId,
      attachmentId,
      fileUri: message.file_uri,
      extractedText: extraction.text,
      confidenceScore: extraction.confidence,
      pageCount: extraction.pageCount,
      processingTimeSeconds: extraction.elapsedSeconds,
      status: hasText ? 'COMPLETED' : 'FAILED',
      extractor: extraction.extractor,
      error: extraction.error,
      createdAt: new Date().toISOString(),
    });

    await deps.store.updateAttachment(attachmentId, {
      status: hasText ? 'OCR_COMPLETED' : 'OCR_FAILED',
      ocrText: extraction.text,
      ocrConfidence: extraction.confidence,
    });

    console.log('[ocr] Text extracted', {
      unitId,
      attachmentId,
      extractor: extraction.extractor,
      chars: extraction.text.length,
      pages: extraction.pageCount,
      confidence: extraction.confidence,
      seconds: extraction.elapsedSeconds,
    });

    if (hasText) {
      await deps.enqueueClassification({
        processing_id: message.processing_id,
        unit_id: unitId,
        attachment_id: attachmentId,
        file_uri: message.file_uri,
        extracted_text: truncateText(extraction.text, deps.messageTextLimit),
        action: 'classify_document',
        timestamp: new Date().toISOString(),
      });
    } else {
      await completeUnitIfSettled(deps.store, unitId);
    }

    return true;
  } catch (err) {
    console.error('[ocr] Processing failed', { unitId, attachmentId, error: errorMessage(err) });
    return false;
  }
}
