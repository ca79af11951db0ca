/**
 * Classification Stage — classify_document handler
 *
 *   1. Verify the parent unit and attachment exist (DataIntegrityError if not)
 *      Already CLASSIFIED (redelivery) → skip to step 4
 *   2. Classify the text (capped at CLASSIFICATION_MAX_INPUT_CHARS)
 *      Classifier failure → UNCLASSIFIED / confidence 0 with the error recorded
 *   3. Persist the classification and mark the attachment CLASSIFIED
 *   4. Run the completion check for the parent unit
 *
 * Returns false only when persistence throws. A classifier failure is a
 * recorded outcome, not a retry.
 */

import { completeUnitIfSettled } from '../pipeline/completion.js';
import { DataIntegrityError, errorMessage } from '../pipeline/errors.js';
import { truncateText } from '../pipeline/text.js';
import type { ClassificationMessage } from '../queue/messages.js';
import { getDocumentStore } from '../store/redis-store.js';
import type { DocumentStore } from '../store/types.js';
import { classifyText } from './classifier.js';
import { classificationConfig } from './config.js';
import { UNCLASSIFIED_RESULT } from './types.js';
import type { ClassificationOutput } from './types.js';

export interface ClassificationStageDeps {
  store: DocumentStore;
  classify: (text: string) => Promise<ClassificationOutput>;
  maxInputChars: number;
  /** When false every document is recorded UNCLASSIFIED without calling the model */
  enabled: boolean;
}

export function defaultClassificationStageDeps(): ClassificationStageDeps {
  return {
    store: getDocumentStore(),
    classify: classifyText,
    maxInputChars: classificationConfig.maxInputChars,
    enabled: classificationConfig.enabled,
  };
}

export async function handleClassification(
  message: ClassificationMessage,
  deps: ClassificationStageDeps,
): Promise<boolean> {
  const { unit_id: unitId, attachment_id: attachmentId } = message;

  const unit = await deps.store.getUnit(unitId);
  if (!unit) {
    console.warn('[classification] anomaly: message for unknown unit', { unitId, attachmentId });
    throw new DataIntegrityError(`Classification message references unknown unit ${unitId}`, unitId);
  }

  const attachment = await deps.store.getAttachment(attachmentId);
  if (!attachment || attachment.parentId !== unitId) {
    console.warn('[classification] anomaly: message for unknown attachment', { unitId, attachmentId });
    throw new DataIntegrityError(
      `Classification message references unknown attachment ${attachmentId}`,
      unitId,
    );
  }

  // Redelivered after a successful run: keep the stored result
  if (attachment.status === 'CLASSIFIED') {
    console.log('[classification] Attachment already classified, skipping', { unitId, attachmentId });
    try {
      await completeUnitIfSettled(deps.store, unitId);
      return true;
    } catch (err) {
      console.error('[classification] Completion check failed', { unitId, attachmentId, error: errorMessage(err) });
      return false;
    }
  }

  const text = truncateText(message.extracted_text, deps.maxInputChars);

  let output: ClassificationOutput = UNCLASSIFIED_RESULT;
  let classificationError: string | null = null;
  if (!deps.enabled) {
    classificationError = 'Classification disabled';
  } else {
    try {
      output = await deps.classify(text);
    } catch (err) {
      classificationError = errorMessage(err);
      console.warn('[classification] Classifier failed, recording UNCLASSIFIED', {
        unitId,
        attachmentId,
        error: classificationError,
      });
    }
  }

  try {
    await deps.store.saveClassification({
      unitId,
      attachmentId,
      fileUri: message.file_uri,
      documentType: output.documentType,
      confidence: output.confidence,
      extractedEntities: output.entities,
      riskAssessment: output.riskAssessment,
      priority: output.priority,
      summary: output.summary,
      keyFindings: output.keyFindings,
      error: classificationError,
      createdAt: new Date().toISOString(),
    });

    await deps.store.updateAttachment(attachmentId, {
      status: 'CLASSIFIED',
      classificationType: output.documentType,
      classificationConfidence: output.confidence,
    });

    await completeUnitIfSettled(deps.store, unitId);
    return true;
  } catch (err) {
    console.error('[classification] Persistence failed', { unitId, attachmentId, error: errorMessage(err) });
    return false;
  }
}
