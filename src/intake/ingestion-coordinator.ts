/**
 * Ingestion Coordinator — intake message handler
 *
 * Turns one intake message into a ProcessingUnit plus its AttachmentUnits and
 * fans out one OCR message per attachment.
 *
 * EMAIL:
 *   1. unit id = email.id, else processing_id (unresolvable → false, no writes)
 *   2. Upsert the unit (PROCESSING when new, status untouched when existing)
 *   3. No attachments → COMPLETED, nothing enqueued
 *   4. Per attachment, in arrival order: upsert "{unitId}-{n}" then enqueue OCR
 *   5. Unit → OCR_PENDING, then the completion check
 *
 * FILE: same flow with one synthetic attachment; a missing file_uri returns
 * false before anything is written.
 *
 * Enqueue failures are collected per attachment so siblings still go out; the
 * handler then returns false and the redelivered message re-sends only what
 * BullMQ's job-id dedup has not already accepted.
 */

import { completeUnitIfSettled } from '../pipeline/completion.js';
import { errorMessage } from '../pipeline/errors.js';
import { enqueueOcr } from '../queue/queues.js';
import { resolveIntakeUnitId } from '../queue/messages.js';
import type {
  EmailIntakeMessage,
  FileIntakeMessage,
  IntakeMessage,
  OcrMessage,
} from '../queue/messages.js';
import { getDocumentStore } from '../store/redis-store.js';
import { isTerminalStatus, transitionUnit } from '../store/status.js';
import type { DocumentStore, UnitInput } from '../store/types.js';

export interface IngestionDeps {
  store: DocumentStore;
  enqueueOcr: (message: OcrMessage) => Promise<void>;
}

export function defaultIngestionDeps(): IngestionDeps {
  return { store: getDocumentStore(), enqueueOcr };
}

/** One attachment to register and send to OCR */
interface PlannedAttachment {
  uri: string;
  filename: string;
}

/** Filename from an attachment URI when the producer omitted it */
export function filenameFromUri(uri: string): string {
  const path = uri.split(/[?#]/)[0];
  const last = path.split('/').filter((segment) => segment.length > 0).pop() ?? '';
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

/** Why an intake message can never be processed, or undefined when it can */
export function intakeRejectReason(message: IntakeMessage): string | undefined {
  if (message.source_type === 'file' && !message.file_uri) {
    return 'File intake has no file_uri';
  }
  if (!resolveIntakeUnitId(message)) {
    return 'Intake has neither an email id nor a processing_id';
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// handleIntake
// ---------------------------------------------------------------------------

export async function handleIntake(message: IntakeMessage, deps: IngestionDeps): Promise<boolean> {
  if (message.source_type === 'file' && !message.file_uri) {
    console.warn('[ingestion] File intake without file_uri', { processingId: message.processing_id });
    return false;
  }

  const unitId = resolveIntakeUnitId(message);
  if (!unitId) {
    console.warn('[ingestion] Intake has no email id or processing_id', { sourceType: message.source_type });
    return false;
  }

  const existing = await deps.store.getUnit(unitId);
  if (existing && isTerminalStatus(existing.status)) {
    console.log('[ingestion] Unit already settled, skipping redelivery', { unitId, status: existing.status });
    return true;
  }

  const processingId = message.processing_id ?? unitId;
  const { unitInput, attachments } = message.source_type === 'email'
    ? planEmail(message, unitId, processingId)
    : planFile(message, unitId, processingId);

  const { unit, created } = await deps.store.upsertUnit(unitInput);
  console.log('[ingestion] Unit upserted', {
    unitId,
    sourceType: unitInput.sourceType,
    attachments: attachments.length,
    created,
  });

  // Units registered ahead of intake start in PENDING
  if (unit.status === 'PENDING') {
    await transitionUnit(deps.store, unitId, 'PROCESSING');
  }

  if (attachments.length === 0) {
    await transitionUnit(deps.store, unitId, 'COMPLETED');
    return true;
  }

  const enqueueErrors: string[] = [];
  for (const [index, planned] of attachments.entries()) {
    const sequenceNumber = index + 1;
    const attachment = await deps.store.upsertAttachment({
      parentId: unitId,
      sequenceNumber,
      filename: planned.filename,
      blobUri: planned.uri,
    });

    try {
      await deps.enqueueOcr({
        processing_id: processingId,
        unit_id: unitId,
        attachment_id: attachment.id,
        file_uri: planned.uri,
        filename: planned.filename,
        action: 'extract_text',
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      enqueueErrors.push(`${attachment.id}: ${errorMessage(err)}`);
      console.error('[ingestion] OCR enqueue failed', { unitId, attachmentId: attachment.id, error: errorMessage(err) });
    }
  }

  await transitionUnit(deps.store, unitId, 'OCR_PENDING');
  await completeUnitIfSettled(deps.store, unitId);

  if (enqueueErrors.length > 0) {
    console.warn('[ingestion] Some attachments were not enqueued, requesting redelivery', {
      unitId,
      failed: enqueueErrors.length,
    });
    return false;
  }

  console.log('[ingestion] Fan-out complete', { unitId, enqueued: attachments.length });
  return true;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

function planEmail(
  message: EmailIntakeMessage,
  unitId: string,
  processingId: string,
): { unitInput: UnitInput; attachments: PlannedAttachment[] } {
  const { email } = message;
  const attachments = message.attachments.map((a, index) => ({
    uri: a.uri,
    filename: a.filename || filenameFromUri(a.uri) || `attachment-${index + 1}`,
  }));

  return {
    unitInput: {
      id: unitId,
      processingId,
      sourceType: 'EMAIL',
      attachmentCount: attachments.length,
      emailFrom: email.from ?? null,
      emailTo: email.to ?? [],
      emailCc: email.cc ?? [],
      emailSubject: email.subject ?? null,
      emailBody: email.body ?? null,
      emailDate: email.date ?? null,
      emailTime: email.time ?? null,
      emailUri: email.email_uri ?? null,
    },
    attachments,
  };
}

function planFile(
  message: FileIntakeMessage,
  unitId: string,
  processingId: string,
): { unitInput: UnitInput; attachments: PlannedAttachment[] } {
  // Checked by handleIntake before planning
  const fileUri = message.file_uri ?? '';
  const filename = message.file_metadata.filename || filenameFromUri(fileUri) || 'document';

  return {
    unitInput: {
      id: unitId,
      processingId,
      sourceType: 'FILE',
      attachmentCount: 1,
      filename,
      fileUri,
      fileSize: message.file_metadata.size ?? null,
    },
    attachments: [{ uri: fileUri, filename }],
  };
}
