/**
 * Stage Worker — shared BullMQ consumer for pipeline stages
 *
 * Maps a stage handler's outcome onto queue semantics:
 *
 *   body fails schema validation      → UnrecoverableError (dead-letter, no retry)
 *   stage-specific contract violation → UnrecoverableError
 *   handler throws DataIntegrityError → UnrecoverableError
 *   handler returns false / throws    → retry with exponential backoff
 *   handler returns true              → job completed
 *   kill switch active                → job postponed by the backoff delay,
 *                                       no attempt used, unit untouched
 *
 * When a job lands in the failed set for good (unrecoverable, or retries
 * exhausted) the owning unit is moved to FAILED with the reason in lastError.
 * Failed jobs are kept (removeOnFail: false) for inspection and replay.
 */

import { DelayedError, UnrecoverableError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { z } from 'zod';
import { appConfig } from '../config.js';
import { AutomationPausedError, DataIntegrityError, StageRetryError, errorMessage } from '../pipeline/errors.js';
import { transitionUnit } from '../store/status.js';
import type { DocumentStore } from '../store/types.js';
import { peekUnitId } from './messages.js';
import { createRedisConnection } from './queues.js';

export interface StageDefinition<T> {
  /** Log tag and lastError prefix, e.g. 'ocr' */
  name: string;
  queueName: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  handle: (message: T) => Promise<boolean>;
  /** Contract violations no redelivery can fix; returns the reason */
  rejectReason?: (message: T) => string | undefined;
}

export interface StageJobResult {
  unitId: string | null;
  handled: true;
}

// ---------------------------------------------------------------------------
// processStageJob
// ---------------------------------------------------------------------------

/**
 * Validate and handle one job.
 * Exported for testing (allows calling without BullMQ Worker infrastructure).
 *
 * @param token - Worker lock token; with it a paused job is moved back to the
 *   delayed set, without it AutomationPausedError is thrown
 */
export async function processStageJob<T>(
  job: Job<unknown>,
  stage: StageDefinition<T>,
  token?: string,
): Promise<StageJobResult> {
  const unitId = peekUnitId(job.data) ?? null;
  console.log(`[${stage.name}] Processing job ${job.id}`, { unitId, attempt: job.attemptsMade + 1 });

  if (appConfig.killSwitch) {
    if (!token) throw new AutomationPausedError();
    console.log(`[${stage.name}] Kill switch active, postponing job ${job.id}`, { unitId });
    await job.moveToDelayed(Date.now() + appConfig.queue.backoffMs, token);
    throw new DelayedError();
  }

  const parsed = stage.schema.safeParse(job.data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
    throw new UnrecoverableError(`Malformed ${stage.name} message: invalid ${fields}`);
  }

  const rejection = stage.rejectReason?.(parsed.data);
  if (rejection) {
    throw new UnrecoverableError(rejection);
  }

  let ok: boolean;
  try {
    ok = await stage.handle(parsed.data);
  } catch (err) {
    if (err instanceof DataIntegrityError) {
      throw new UnrecoverableError(err.message);
    }
    throw err;
  }

  if (!ok) {
    throw new StageRetryError(`${stage.name} handler requested redelivery`);
  }

  return { unitId, handled: true };
}

// ---------------------------------------------------------------------------
// Dead-letter handling
// ---------------------------------------------------------------------------

export function isDeadLettered(job: Job<unknown>, err: Error): boolean {
  if (err instanceof AutomationPausedError || err.name === 'AutomationPausedError') return false;
  if (err instanceof UnrecoverableError || err.name === 'UnrecoverableError') return true;
  return job.attemptsMade >= (job.opts.attempts ?? 1);
}

/**
 * 'failed' event handler. Logs every failure; on dead-letter, fails the unit.
 * Exported for testing.
 */
export async function onStageJobFailed(
  job: Job<unknown>,
  err: Error,
  stage: Pick<StageDefinition<unknown>, 'name'>,
  store: DocumentStore,
): Promise<void> {
  const unitId = peekUnitId(job.data);
  console.error(`[${stage.name}] Job ${job.id} failed`, {
    unitId,
    error: err.message,
    attempt: job.attemptsMade,
    maxAttempts: job.opts.attempts,
  });

  if (!isDeadLettered(job, err)) return;

  console.error(`[${stage.name}] Job ${job.id} dead-lettered`, { unitId, error: err.message });
  if (!unitId) return;

  await transitionUnit(store, unitId, 'FAILED', { lastError: `${stage.name}: ${err.message}` });
}

// ---------------------------------------------------------------------------
// Worker factory
// ---------------------------------------------------------------------------

/**
 * Create and start a BullMQ worker for a stage.
 *
 * @param getStore - Resolved when a job fails, so creating the worker never opens a store connection
 */
export function createStageWorker<T>(stage: StageDefinition<T>, getStore: () => DocumentStore): Worker {
  const worker = new Worker<unknown, StageJobResult>(
    stage.queueName,
    (job, token) => processStageJob(job, stage, token),
    {
      connection: createRedisConnection(),
      concurrency: appConfig.queue.concurrency,
    },
  );

  worker.on('completed', (job) => {
    console.log(`[${stage.name}] Job ${job.id} completed`, { unitId: job.returnvalue?.unitId ?? null });
  });

  worker.on('failed', (job, err) => {
    if (!job) {
      console.error(`[${stage.name}] Job failed without job context`, { error: err.message });
      return;
    }
    onStageJobFailed(job, err, stage, getStore()).catch((markErr: unknown) => {
      console.error(`[${stage.name}] Could not mark unit failed`, {
        jobId: job.id,
        error: errorMessage(markErr),
      });
    });
  });

  console.log(`[${stage.name}] Started, listening for jobs on queue:`, stage.queueName);
  return worker;
}
