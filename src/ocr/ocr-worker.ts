/**
 * OCR Worker — consumes the doc-ocr queue
 *
 * One job per attachment; see ocr-stage.ts for the handler.
 */

import type { Job, Worker } from 'bullmq';
import { OcrMessageSchema } from '../queue/messages.js';
import type { OcrMessage } from '../queue/messages.js';
import { OCR_QUEUE_NAME } from '../queue/queues.js';
import { createStageWorker, processStageJob } from '../queue/stage-worker.js';
import type { StageDefinition, StageJobResult } from '../queue/stage-worker.js';
import { getDocumentStore } from '../store/redis-store.js';
import { defaultOcrStageDeps, handleOcr } from './ocr-stage.js';

export const OCR_STAGE: StageDefinition<OcrMessage> = {
  name: 'ocr',
  queueName: OCR_QUEUE_NAME,
  schema: OcrMessageSchema,
  handle: (message) => handleOcr(message, defaultOcrStageDeps()),
};

let _worker: Worker | null = null;

/** Exported for testing */
export function processOcrJob(job: Job<unknown>): Promise<StageJobResult> {
  return processStageJob(job, OCR_STAGE);
}

export function createOcrWorker(): Worker {
  if (_worker) return _worker;
  _worker = createStageWorker(OCR_STAGE, getDocumentStore);
  return _worker;
}

export async function closeOcrWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
