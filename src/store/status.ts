/**
 * Processing Unit Status Machine
 *
 *   PENDING     → PROCESSING | FAILED
 *   PROCESSING  → OCR_PENDING | COMPLETED | FAILED
 *   OCR_PENDING → COMPLETED | FAILED
 *   COMPLETED, FAILED → (terminal)
 *
 * transitionUnit applies an edge with compare-and-set against the status it
 * just read. Moving to the current status is a no-op. Leaving a terminal
 * state, or following an edge not in the table, is logged as an anomaly and
 * ignored (never thrown) since redelivered messages routinely arrive late.
 */

import type { AttachmentStatus, DocumentStore, UnitStatus } from './types.js';

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

export const ALLOWED_TRANSITIONS: Record<UnitStatus, readonly UnitStatus[]> = {
  PENDING: ['PROCESSING', 'FAILED'],
  PROCESSING: ['OCR_PENDING', 'COMPLETED', 'FAILED'],
  OCR_PENDING: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

const TERMINAL_ATTACHMENT_STATUSES: ReadonlySet<AttachmentStatus> = new Set(['OCR_FAILED', 'CLASSIFIED']);

export function canTransition(from: UnitStatus, to: UnitStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: UnitStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function isTerminalAttachmentStatus(status: AttachmentStatus): boolean {
  return TERMINAL_ATTACHMENT_STATUSES.has(status);
}

// ---------------------------------------------------------------------------
// transitionUnit
// ---------------------------------------------------------------------------

/** Bounded re-read/CAS loop when another writer changes the status first */
const MAX_CAS_ATTEMPTS = 3;

export type TransitionOutcome = 'transitioned' | 'unchanged' | 'rejected' | 'missing';

export interface TransitionOptions {
  /** Stored on the unit when moving to FAILED */
  lastError?: string;
}

/**
 * Moves a unit to `to` if the state machine allows it from its current status.
 *
 * @returns 'transitioned' when this caller performed the write,
 *   'unchanged' when the unit already had status `to`,
 *   'rejected' for a terminal source or undefined edge (logged as anomaly),
 *   'missing' when no such unit exists
 */
export async function transitionUnit(
  store: DocumentStore,
  unitId: string,
  to: UnitStatus,
  options: TransitionOptions = {},
): Promise<TransitionOutcome> {
  for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
    const unit = await store.getUnit(unitId);
    if (!unit) {
      console.warn('[status] anomaly: transition for unknown unit', { unitId, to });
      return 'missing';
    }

    if (unit.status === to) return 'unchanged';

    if (!canTransition(unit.status, to)) {
      console.warn('[status] anomaly: transition rejected', { unitId, from: unit.status, to });
      return 'rejected';
    }

    const outcome = await store.compareAndSetStatus(unitId, unit.status, to, options.lastError);
    if (outcome === 'updated') {
      console.log('[status] Unit transitioned', { unitId, from: unit.status, to });
      return 'transitioned';
    }
    if (outcome === 'missing') return 'missing';
    // conflict: someone else moved it, re-read and re-evaluate
  }

  console.warn('[status] anomaly: transition lost every compare-and-set race', { unitId, to });
  return 'rejected';
}
