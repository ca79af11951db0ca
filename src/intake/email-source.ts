/**
 * Email Source — Gmail message to intake message
 *
 * For one inbox message:
 *   1. Read headers, body text and attachment list
 *   2. Store the raw .eml as a blob (emails/{processingId}/message.eml)
 *   3. Skip attachments with an unsupported extension or over the size limit
 *   4. Download the rest and store each as a blob
 *   5. Enqueue one email intake message referencing the blob URIs
 *
 * The unit id is derived from the Gmail message id, so a message picked up
 * twice (stale history fallback, worker retry) lands on the same unit and
 * the same intake job id.
 */

import type { gmail_v1 } from 'googleapis';
import { getBlobStore } from '../blob/blob-store.js';
import type { BlobStore } from '../blob/blob-store.js';
import { enqueueIntake } from '../queue/queues.js';
import type { IntakeMessageInput } from '../queue/messages.js';
import { intakeConfig, isSupportedFilename } from './config.js';
import { downloadAttachment, getMessageDetails, getRawMessage } from './gmail-reader.js';
import type { MailJobResult } from './types.js';

type GmailClient = gmail_v1.Gmail;

export interface EmailSourceDeps {
  blobs: BlobStore;
  enqueueIntake: (message: IntakeMessageInput, dedupKey: string) => Promise<string>;
  maxAttachmentBytes: number;
}

export function defaultEmailSourceDeps(): EmailSourceDeps {
  return {
    blobs: getBlobStore(),
    enqueueIntake,
    maxAttachmentBytes: intakeConfig.maxAttachmentBytes,
  };
}

export function unitIdForGmailMessage(messageId: string): string {
  return `gmail-${messageId}`;
}

/**
 * Splits an RFC 2822 Date header into UTC date (YYYY-MM-DD) and time
 * (HH:MM:SS). Unparseable headers yield undefined for both.
 */
export function splitMailDate(header: string): { date?: string; time?: string } {
  const parsed = header ? new Date(header) : null;
  if (!parsed || Number.isNaN(parsed.getTime())) return {};
  const iso = parsed.toISOString();
  return { date: iso.slice(0, 10), time: iso.slice(11, 19) };
}

export async function ingestGmailMessage(
  gmail: GmailClient,
  messageId: string,
  deps: EmailSourceDeps,
): Promise<MailJobResult> {
  const meta = await getMessageDetails(gmail, messageId);
  const processingId = unitIdForGmailMessage(meta.messageId);
  const skipped: string[] = [];

  const raw = await getRawMessage(gmail, messageId);
  const emailUri = await deps.blobs.put(raw, `emails/${processingId}/message.eml`, 'message/rfc822');

  const attachments: { uri: string; filename: string }[] = [];
  for (const att of meta.attachments) {
    if (!isSupportedFilename(att.filename)) {
      skipped.push(`Unsupported file type: ${att.filename}`);
      continue;
    }
    if (att.size > deps.maxAttachmentBytes) {
      skipped.push(`Attachment too large: ${att.filename} (${att.size} bytes > ${deps.maxAttachmentBytes} max)`);
      continue;
    }

    const bytes = await downloadAttachment(gmail, messageId, att.attachmentId);
    const uri = await deps.blobs.put(
      bytes,
      `emails/${processingId}/attachments/${att.filename}`,
      att.mimeType,
    );
    attachments.push({ uri, filename: att.filename });
  }

  if (skipped.length > 0) {
    console.warn('[mail] Skipped attachments', { messageId, skipped });
  }

  const { date, time } = splitMailDate(meta.date);
  const intakeJobId = await deps.enqueueIntake(
    {
      source_type: 'email',
      processing_id: processingId,
      email: {
        id: processingId,
        from: meta.from,
        to: meta.to,
        cc: meta.cc,
        subject: meta.subject,
        body: meta.bodyText,
        date,
        time,
        email_uri: emailUri,
      },
      attachments,
      timestamp: new Date().toISOString(),
    },
    processingId,
  );

  console.log('[mail] Message ingested', {
    messageId,
    unitId: processingId,
    attachmentsStored: attachments.length,
    skipped: skipped.length,
  });

  return { messagesFound: 1, intakeJobId, attachmentsStored: attachments.length, skipped };
}
