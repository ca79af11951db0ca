/**
 * Ingestion Worker — consumes the doc-ingestion queue
 *
 * Wires the Ingestion Coordinator into the shared stage worker. FILE intakes
 * without a file_uri and intakes with no resolvable unit id are contract
 * violations and go straight to the dead-letter set.
 *
 * Uses lazy singleton pattern (same as the OCR and classification workers).
 */

import type { Job, Worker } from 'bullmq';
import { IntakeMessageSchema } from '../queue/messages.js';
import type { IntakeMessage } from '../queue/messages.js';
import { INGESTION_QUEUE_NAME } from '../queue/queues.js';
import { createStageWorker, processStageJob } from '../queue/stage-worker.js';
import type { StageDefinition, StageJobResult } from '../queue/stage-worker.js';
import { getDocumentStore } from '../store/redis-store.js';
import { defaultIngestionDeps, handleIntake, intakeRejectReason } from './ingestion-coordinator.js';

export const INGESTION_STAGE: StageDefinition<IntakeMessage> = {
  name: 'ingestion',
  queueName: INGESTION_QUEUE_NAME,
  schema: IntakeMessageSchema,
  handle: (message) => handleIntake(message, defaultIngestionDeps()),
  rejectReason: intakeRejectReason,
};

let _worker: Worker | null = null;

/** Exported for testing */
export function processIngestionJob(job: Job<unknown>): Promise<StageJobResult> {
  return processStageJob(job, INGESTION_STAGE);
}

export function createIngestionWorker(): Worker {
  if (_worker) return _worker;
  _worker = createStageWorker(INGESTION_STAGE, getDocumentStore);
  return _worker;
}

export async function closeIngestionWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
