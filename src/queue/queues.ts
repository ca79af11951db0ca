/**
 * BullMQ Queue Configuration
 *
 * Manages the three stage queues of the pipeline:
 * - doc-ingestion: intake messages (email or uploaded file)
 * - doc-ocr: one extract_text message per attachment
 * - doc-classification: one classify_document message per attachment with text
 *
 * All queues share:
 * - Deduplication via BullMQ jobId (deterministic per unit / attachment)
 * - Exponential backoff retry (QUEUE_ATTEMPTS, QUEUE_BACKOFF_MS base)
 * - 24h completed job retention for the dedup window
 * - Failed jobs preserved for inspection (dead-letter pattern)
 *
 * Uses lazy singletons — queues are not created until first access.
 * This prevents Redis connections during module import (breaks tests).
 */

import { Queue } from 'bullmq';
import type { QueueOptions } from 'bullmq';
import { appConfig } from '../config.js';
import type { ClassificationMessage, IntakeMessageInput, OcrMessage } from './messages.js';

export const INGESTION_QUEUE_NAME = 'doc-ingestion';
export const OCR_QUEUE_NAME = 'doc-ocr';
export const CLASSIFICATION_QUEUE_NAME = 'doc-classification';

/** Redis connection config shape for BullMQ */
export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  maxRetriesPerRequest: null;
}

/**
 * Parse a Redis URL into a connection config object.
 * Supports redis:// and rediss:// URL formats.
 */
export function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
}

/**
 * Create a Redis connection config for BullMQ and the document store.
 *
 * If REDIS_URL is set, parses it into host/port/password components.
 * Otherwise uses individual REDIS_HOST/PORT/PASSWORD env vars.
 *
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

/**
 * Builds a BullMQ custom job id from its parts.
 * BullMQ reserves ':' in job ids, so it is replaced.
 */
export function jobIdFor(...parts: string[]): string {
  return parts.map((part) => part.replace(/:/g, '_')).join('-');
}

function stageQueueOptions(): QueueOptions {
  return {
    connection: createRedisConnection(),
    defaultJobOptions: {
      attempts: appConfig.queue.attempts,
      backoff: {
        type: 'exponential',
        delay: appConfig.queue.backoffMs,
      },
      removeOnComplete: { age: 86400 }, // Keep 24h for dedup window
      removeOnFail: false, // Dead-letter: keep failed jobs for inspection
    },
  };
}

// ---------------------------------------------------------------------------
// Lazy singletons
// ---------------------------------------------------------------------------

let _ingestionQueue: Queue<IntakeMessageInput> | null = null;
let _ocrQueue: Queue<OcrMessage> | null = null;
let _classificationQueue: Queue<ClassificationMessage> | null = null;

export function getIngestionQueue(): Queue<IntakeMessageInput> {
  if (!_ingestionQueue) {
    _ingestionQueue = new Queue<IntakeMessageInput>(INGESTION_QUEUE_NAME, stageQueueOptions());
  }
  return _ingestionQueue;
}

export function getOcrQueue(): Queue<OcrMessage> {
  if (!_ocrQueue) {
    _ocrQueue = new Queue<OcrMessage>(OCR_QUEUE_NAME, stageQueueOptions());
  }
  return _ocrQueue;
}

export function getClassificationQueue(): Queue<ClassificationMessage> {
  if (!_classificationQueue) {
    _classificationQueue = new Queue<ClassificationMessage>(CLASSIFICATION_QUEUE_NAME, stageQueueOptions());
  }
  return _classificationQueue;
}

// ---------------------------------------------------------------------------
// Producers
// ---------------------------------------------------------------------------

/** Enqueue an intake message, deduplicated per unit */
export async function enqueueIntake(message: IntakeMessageInput, dedupKey: string): Promise<string> {
  const jobId = jobIdFor('intake', dedupKey);
  await getIngestionQueue().add('ingest', message, { jobId });
  return jobId;
}

/** Enqueue one OCR message, deduplicated per attachment */
export async function enqueueOcr(message: OcrMessage): Promise<void> {
  await getOcrQueue().add('extract-text', message, {
    jobId: jobIdFor('ocr', message.attachment_id),
  });
}

/** Enqueue one classification message, deduplicated per attachment */
export async function enqueueClassification(message: ClassificationMessage): Promise<void> {
  await getClassificationQueue().add('classify-document', message, {
    jobId: jobIdFor('classify', message.attachment_id),
  });
}

/**
 * Close all queue connections for graceful shutdown.
 * Resets the singletons so new connections can be created if needed.
 */
export async function closeQueues(): Promise<void> {
  const queues = [_ingestionQueue, _ocrQueue, _classificationQueue];
  _ingestionQueue = null;
  _ocrQueue = null;
  _classificationQueue = null;
  for (const queue of queues) {
    if (queue) await queue.close();
  }
}
