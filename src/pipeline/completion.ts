/**
 * Sibling aggregation: completes a unit once every attachment is terminal.
 *
 * Called by the OCR stage (after an empty-text result), the classification
 * stage (after persisting a result) and the ingestion coordinator (right
 * after the unit enters OCR_PENDING, in case every attachment finished
 * before that). Any number of callers may race here; the compare-and-set
 * from OCR_PENDING lets exactly one of them complete the unit.
 */

import { isTerminalAttachmentStatus } from '../store/status.js';
import type { DocumentStore } from '../store/types.js';

export type CompletionOutcome =
  | 'completed'
  | 'not-ready'
  | 'already-completed'
  | 'not-awaiting-ocr'
  | 'missing';

export async function completeUnitIfSettled(
  store: DocumentStore,
  unitId: string,
): Promise<CompletionOutcome> {
  const unit = await store.getUnit(unitId);
  if (!unit) return 'missing';
  if (unit.status === 'COMPLETED') return 'already-completed';
  if (unit.status !== 'OCR_PENDING') return 'not-awaiting-ocr';

  const attachments = await store.listAttachments(unitId);
  const terminal = attachments.filter((a) => isTerminalAttachmentStatus(a.status)).length;

  if (attachments.length < unit.attachmentCount || terminal < unit.attachmentCount) {
    return 'not-ready';
  }

  const outcome = await store.compareAndSetStatus(unitId, 'OCR_PENDING', 'COMPLETED');
  if (outcome !== 'updated') {
    // Another sibling completed it, or it failed meanwhile
    return outcome === 'missing' ? 'missing' : 'already-completed';
  }

  console.log('[completion] Unit completed', {
    unitId,
    attachments: attachments.length,
    classified: attachments.filter((a) => a.status === 'CLASSIFIED').length,
  });
  return 'completed';
}
