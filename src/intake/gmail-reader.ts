/**
 * Gmail Reader — Inbox Polling via History API
 *
 * 1. getInitialHistoryId: current historyId from the mailbox profile
 * 2. pollForNewMessages: message ids added to INBOX since a historyId
 * 3. getMessageDetails: headers, body text and attachment list of one message
 * 4. getRawMessage: the RFC 822 source of one message
 * 5. downloadAttachment: the decoded bytes of one attachment
 *
 * All functions take the gmail client as the first parameter so tests can
 * pass a stub.
 *
 * Stale historyId recovery: if history.list returns 404 (expired historyId),
 * falls back to messages.list with newer_than:1d and refreshes the historyId.
 */

import type { gmail_v1 } from 'googleapis';
import type { AttachmentInfo, GmailMessageMeta } from './types.js';

type GmailClient = gmail_v1.Gmail;
type MessagePart = gmail_v1.Schema$MessagePart;

// ---------------------------------------------------------------------------
// getInitialHistoryId
// ---------------------------------------------------------------------------

/**
 * Returns the current historyId from the mailbox profile.
 * Used on first startup when no stored historyId exists.
 */
export async function getInitialHistoryId(gmail: GmailClient): Promise<string> {
  const profile = await gmail.users.getProfile({ userId: 'me' });
  const historyId = profile.data.historyId;

  if (!historyId) {
    throw new Error('[mail] Gmail profile returned no historyId');
  }

  return historyId;
}

// ---------------------------------------------------------------------------
// pollForNewMessages
// ---------------------------------------------------------------------------

/**
 * Polls for new inbox messages since the given historyId.
 *
 * @returns messageIds (deduplicated) and newHistoryId for the next poll
 */
export async function pollForNewMessages(
  gmail: GmailClient,
  startHistoryId: string,
): Promise<{ messageIds: string[]; newHistoryId: string }> {
  try {
    const response = await gmail.users.history.list({
      userId: 'me',
      startHistoryId,
      historyTypes: ['messageAdded'],
      labelId: 'INBOX',
    });

    const messageIdSet = new Set<string>();
    for (const record of response.data.history ?? []) {
      for (const added of record.messagesAdded ?? []) {
        if (added.message?.id) {
          messageIdSet.add(added.message.id);
        }
      }
    }

    return {
      messageIds: [...messageIdSet],
      newHistoryId: response.data.historyId ?? startHistoryId,
    };
  } catch (err: unknown) {
    if (isStaleHistoryError(err)) {
      console.warn('[mail] historyId stale, falling back to recent messages');
      return fallbackToRecentMessages(gmail);
    }
    throw err;
  }
}

/** Gmail answers 404 when the historyId is older than its history window */
function isStaleHistoryError(err: unknown): boolean {
  if (err === null || typeof err !== 'object') return false;
  if ('code' in err && err.code === 404) return true;
  return err instanceof Error && err.message.includes('notFound');
}

async function fallbackToRecentMessages(
  gmail: GmailClient,
): Promise<{ messageIds: string[]; newHistoryId: string }> {
  const [messagesResponse, profileResponse] = await Promise.all([
    gmail.users.messages.list({
      userId: 'me',
      q: 'newer_than:1d',
      labelIds: ['INBOX'],
      maxResults: 50,
    }),
    gmail.users.getProfile({ userId: 'me' }),
  ]);

  const messageIds = (messagesResponse.data.messages ?? [])
    .map((m) => m.id)
    .filter((id): id is string => id != null);

  const newHistoryId = profileResponse.data.historyId;
  if (!newHistoryId) {
    throw new Error('[mail] Gmail profile returned no historyId during fallback');
  }

  return { messageIds, newHistoryId };
}

// ---------------------------------------------------------------------------
// getMessageDetails
// ---------------------------------------------------------------------------

export async function getMessageDetails(
  gmail: GmailClient,
  messageId: string,
): Promise<GmailMessageMeta> {
  const response = await gmail.users.messages.get({
    userId: 'me',
    id: messageId,
    format: 'full',
  });

  const payload = response.data.payload ?? undefined;
  const headers = payload?.headers ?? [];
  const getHeader = (name: string): string =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? '';

  return {
    messageId: response.data.id ?? messageId,
    threadId: response.data.threadId ?? null,
    from: parseEmailFromHeader(getHeader('From')),
    to: parseAddressList(getHeader('To')),
    cc: parseAddressList(getHeader('Cc')),
    subject: getHeader('Subject'),
    date: getHeader('Date'),
    historyId: response.data.historyId ?? '',
    bodyText: extractBodyText(payload),
    attachments: listAttachments(payload),
  };
}

/** Downloads the full RFC 822 source of a message */
export async function getRawMessage(gmail: GmailClient, messageId: string): Promise<Buffer> {
  const response = await gmail.users.messages.get({
    userId: 'me',
    id: messageId,
    format: 'raw',
  });

  const raw = response.data.raw;
  if (!raw) {
    throw new Error(`[mail] Message ${messageId} returned no raw content`);
  }
  return Buffer.from(raw, 'base64url');
}

// ---------------------------------------------------------------------------
// Attachments
// ---------------------------------------------------------------------------

/**
 * File attachments of a message in MIME order, nested multiparts included.
 * Parts without a filename or attachmentId (inline bodies) are not attachments.
 */
export function listAttachments(part: MessagePart | undefined): AttachmentInfo[] {
  if (!part) return [];

  const own: AttachmentInfo[] = part.filename && part.body?.attachmentId
    ? [{
        filename: part.filename,
        mimeType: part.mimeType ?? 'application/octet-stream',
        attachmentId: part.body.attachmentId,
        size: part.body.size ?? 0,
      }]
    : [];

  return own.concat((part.parts ?? []).flatMap((child) => listAttachments(child)));
}

export async function downloadAttachment(
  gmail: GmailClient,
  messageId: string,
  attachmentId: string,
): Promise<Buffer> {
  const response = await gmail.users.messages.attachments.get({
    userId: 'me',
    messageId,
    id: attachmentId,
  });

  const data = response.data.data;
  if (!data) {
    throw new Error(`[mail] Attachment ${attachmentId} on message ${messageId} returned no data`);
  }
  return Buffer.from(data, 'base64url');
}

// ---------------------------------------------------------------------------
// Body and header parsing
// ---------------------------------------------------------------------------

/**
 * Plain-text body of a message. Prefers a text/plain part; otherwise the
 * first text/html part with tags removed. Attachment parts are skipped.
 */
export function extractBodyText(payload: MessagePart | undefined): string {
  const plain = findBodyPart(payload, 'text/plain');
  if (plain !== null) return plain.trim();

  const html = findBodyPart(payload, 'text/html');
  if (html !== null) return htmlToText(html);

  return '';
}

function findBodyPart(part: MessagePart | undefined, mimeType: string): string | null {
  if (!part) return null;

  if (part.mimeType === mimeType && !part.filename && part.body?.data) {
    return Buffer.from(part.body.data, 'base64url').toString('utf-8');
  }

  for (const child of part.parts ?? []) {
    const found = findBodyPart(child, mimeType);
    if (found !== null) return found;
  }

  return null;
}

export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|tr|li)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Extracts the email address from a From header value.
 * - "John Doe <john@example.com>" -> "john@example.com"
 * - "john@example.com" -> "john@example.com"
 */
export function parseEmailFromHeader(fromHeader: string): string {
  const match = fromHeader.match(/<([^>]+)>/);
  if (match) return match[1].trim();
  return fromHeader.trim();
}

/**
 * Splits a To/Cc header into bare addresses. Commas inside quoted display
 * names ("Doe, Jane" <jane@example.com>) do not split.
 */
export function parseAddressList(header: string): string[] {
  const entries: string[] = [];
  let current = '';
  let quoted = false;

  for (const ch of header) {
    if (ch === '"') quoted = !quoted;
    if (ch === ',' && !quoted) {
      entries.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  entries.push(current);

  return entries
    .map((entry) => parseEmailFromHeader(entry))
    .filter((addr) => addr.length > 0);
}
