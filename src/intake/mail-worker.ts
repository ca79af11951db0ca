/**
 * Mail Intake Worker — BullMQ consumer of the mail-intake queue
 *
 * Two job kinds share the queue:
 *
 * **Poll job** (no gmailMessageId, created by the scheduler):
 * 1. Read the stored historyId (seed it on first run and stop)
 * 2. history.list for messages added since then
 * 3. Enqueue one message job per id (jobId gmail-{id} dedups repeats)
 * 4. Store the new historyId
 *
 * **Message job**: ingestGmailMessage stores the raw email and attachments
 * as blobs and enqueues the email intake message for the ingestion stage.
 *
 * Buffers never go in job data; only blob URIs travel through Redis.
 */

import { DelayedError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { appConfig } from '../config.js';
import { createRedisConnection, jobIdFor } from '../queue/queues.js';
import { intakeConfig } from './config.js';
import { defaultEmailSourceDeps, ingestGmailMessage } from './email-source.js';
import { getGmailReadonlyClient } from './gmail-client.js';
import {
  MAIL_QUEUE_NAME,
  getMailQueue,
  getStoredHistoryId,
  storeHistoryId,
} from './gmail-monitor.js';
import { getInitialHistoryId, pollForNewMessages } from './gmail-reader.js';
import type { MailJobData, MailJobResult } from './types.js';

const EMPTY_RESULT: MailJobResult = { messagesFound: 0, intakeJobId: null, attachmentsStored: 0, skipped: [] };

// ---------------------------------------------------------------------------
// processMailJob — Core Processing Logic
// ---------------------------------------------------------------------------

/**
 * Process a single mail-intake job.
 * Exported for testing (allows calling without BullMQ Worker infrastructure).
 *
 * Under the kill switch poll jobs are skipped (the history id stays put) and
 * message jobs are postponed, since their message is already past the stored
 * history id.
 */
export async function processMailJob(job: Job<MailJobData>, token?: string): Promise<MailJobResult> {
  if (appConfig.killSwitch) {
    if (job.data.gmailMessageId && token) {
      console.log('[mail] Kill switch active, postponing message job', { jobId: job.id });
      await job.moveToDelayed(Date.now() + appConfig.queue.backoffMs, token);
      throw new DelayedError();
    }
    console.log('[mail] Kill switch active, skipping job', { jobId: job.id });
    return EMPTY_RESULT;
  }

  const gmail = getGmailReadonlyClient(intakeConfig.mailbox);
  const messageId = job.data.gmailMessageId;

  if (!messageId) {
    return processGmailPoll(gmail);
  }

  return ingestGmailMessage(gmail, messageId, defaultEmailSourceDeps());
}

async function processGmailPoll(gmail: ReturnType<typeof getGmailReadonlyClient>): Promise<MailJobResult> {
  let historyId = await getStoredHistoryId();
  if (!historyId) {
    historyId = await getInitialHistoryId(gmail);
    await storeHistoryId(historyId);
    console.log('[mail] First run, seeded historyId:', historyId);
    return EMPTY_RESULT;
  }

  const { messageIds, newHistoryId } = await pollForNewMessages(gmail, historyId);

  if (messageIds.length > 0) {
    console.log(`[mail] Poll found ${messageIds.length} new messages`);
    const queue = getMailQueue();
    for (const msgId of messageIds) {
      await queue.add(
        'process-gmail-message',
        {
          source: 'gmail',
          gmailMessageId: msgId,
          receivedAt: new Date().toISOString(),
        },
        { jobId: jobIdFor('gmail', msgId) },
      );
    }
  }

  // Stored only after every message job is queued, so a crash re-polls them
  await storeHistoryId(newHistoryId);

  return { ...EMPTY_RESULT, messagesFound: messageIds.length };
}

// ---------------------------------------------------------------------------
// Mail Worker (Lazy Singleton)
// ---------------------------------------------------------------------------

let _worker: Worker<MailJobData, MailJobResult> | null = null;

/**
 * Concurrency 1: polls and message jobs run sequentially.
 */
export function createMailWorker(): Worker<MailJobData, MailJobResult> {
  if (_worker) return _worker;

  _worker = new Worker<MailJobData, MailJobResult>(MAIL_QUEUE_NAME, processMailJob, {
    connection: createRedisConnection(),
    concurrency: 1,
  });

  _worker.on('completed', (job) => {
    console.log(`[mail-worker] Job ${job.id} completed`, {
      messagesFound: job.returnvalue?.messagesFound,
      attachmentsStored: job.returnvalue?.attachmentsStored,
    });
  });

  _worker.on('failed', (job, err) => {
    console.error(`[mail-worker] Job ${job?.id} failed`, {
      gmailMessageId: job?.data?.gmailMessageId,
      error: err.message,
      attempt: job?.attemptsMade,
    });
  });

  console.log('[mail-worker] Started, listening for jobs on queue:', MAIL_QUEUE_NAME);
  return _worker;
}

export async function closeMailWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
