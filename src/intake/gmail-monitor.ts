/**
 * Gmail Monitor — BullMQ Job Scheduler for Periodic Inbox Polling
 *
 * Polls the intake mailbox with a repeating job on the mail-intake queue
 * (upsertJobScheduler). Poll jobs fan out one job per new message.
 *
 * History ID persistence:
 * - The last polled Gmail historyId is stored in Redis
 * - On restart polling resumes from the stored historyId
 * - With no stored historyId (first run), getInitialHistoryId seeds it
 */

import { Queue } from 'bullmq';
import { Redis as IORedis } from 'ioredis';
import { appConfig } from '../config.js';
import { createRedisConnection } from '../queue/queues.js';
import { intakeConfig } from './config.js';
import type { MailJobData } from './types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MAIL_QUEUE_NAME = 'mail-intake';

export function historyIdKey(): string {
  return `${appConfig.store.keyPrefix}:mail:gmail:historyId`;
}

// ---------------------------------------------------------------------------
// History ID Persistence (Redis)
// ---------------------------------------------------------------------------

/**
 * Reads the stored Gmail historyId. Returns null on first run.
 *
 * Opens and closes a Redis connection per call; polls are minutes apart.
 */
export async function getStoredHistoryId(): Promise<string | null> {
  const redis = new IORedis(createRedisConnection());

  try {
    const value = await redis.get(historyIdKey());
    return value ?? null;
  } finally {
    await redis.quit();
  }
}

export async function storeHistoryId(historyId: string): Promise<void> {
  const redis = new IORedis(createRedisConnection());

  try {
    await redis.set(historyIdKey(), historyId);
  } finally {
    await redis.quit();
  }
}

// ---------------------------------------------------------------------------
// Mail Queue (Lazy Singleton)
// ---------------------------------------------------------------------------

let _queue: Queue<MailJobData> | null = null;

/**
 * - 3 attempts with exponential backoff (10s base)
 * - 24h completed job retention (message dedup window)
 * - Failed jobs preserved for inspection
 */
export function getMailQueue(): Queue<MailJobData> {
  if (!_queue) {
    _queue = new Queue<MailJobData>(MAIL_QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 10000, // 10s, 20s, 40s
        },
        removeOnComplete: { age: 86400 },
        removeOnFail: false,
      },
    });
  }
  return _queue;
}

export async function closeMailQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}

// ---------------------------------------------------------------------------
// Gmail Monitor Scheduler
// ---------------------------------------------------------------------------

/**
 * Creates (or updates) the poll scheduler. No-op when INTAKE_ENABLED=false.
 */
export async function startGmailMonitor(queue: Queue<MailJobData>): Promise<void> {
  if (!intakeConfig.enabled) {
    console.log('[mail] Gmail monitor disabled (INTAKE_ENABLED=false)');
    return;
  }

  await queue.upsertJobScheduler(
    'gmail-poll-intake',
    { every: intakeConfig.pollIntervalMs },
    {
      name: 'poll-intake-inbox',
      data: {
        source: 'gmail',
        receivedAt: new Date().toISOString(),
      },
    },
  );

  console.log(
    `[mail] Gmail monitor started, polling every ${intakeConfig.pollIntervalMs / 1000}s`,
  );
}
