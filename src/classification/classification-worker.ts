/**
 * Classification Worker — consumes the doc-classification queue
 *
 * One job per attachment with extracted text; see classification-stage.ts.
 */

import type { Job, Worker } from 'bullmq';
import { ClassificationMessageSchema } from '../queue/messages.js';
import type { ClassificationMessage } from '../queue/messages.js';
import { CLASSIFICATION_QUEUE_NAME } from '../queue/queues.js';
import { createStageWorker, processStageJob } from '../queue/stage-worker.js';
import type { StageDefinition, StageJobResult } from '../queue/stage-worker.js';
import { getDocumentStore } from '../store/redis-store.js';
import { defaultClassificationStageDeps, handleClassification } from './classification-stage.js';

export const CLASSIFICATION_STAGE: StageDefinition<ClassificationMessage> = {
  name: 'classification',
  queueName: CLASSIFICATION_QUEUE_NAME,
  schema: ClassificationMessageSchema,
  handle: (message) => handleClassification(message, defaultClassificationStageDeps()),
};

let _worker: Worker | null = null;

/** Exported for testing */
export function processClassificationJob(job: Job<unknown>): Promise<StageJobResult> {
  return processStageJob(job, CLASSIFICATION_STAGE);
}

export function createClassificationWorker(): Worker {
  if (_worker) return _worker;
  _worker = createStageWorker(CLASSIFICATION_STAGE, getDocumentStore);
  return _worker;
}

export async function closeClassificationWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
