/**
 * Intake Type Definitions
 *
 * - GmailMessageMeta: headers, plain-text body and attachment list of a message
 * - AttachmentInfo: attachment metadata extracted from a Gmail message part
 * - MailJobData / MailJobResult: mail-intake queue job types
 */

// ---------------------------------------------------------------------------
// Gmail Message Types
// ---------------------------------------------------------------------------

/** Attachment info extracted from a Gmail message part */
export interface AttachmentInfo {
  filename: string;
  mimeType: string;
  attachmentId: string;
  size: number;
}

export interface GmailMessageMeta {
  messageId: string;
  threadId: string | null;
  from: string;
  to: string[];
  cc: string[];
  subject: string;
  /** Raw Date header */
  date: string;
  historyId: string;
  /** text/plain body, or tag-stripped text/html when no plain part exists */
  bodyText: string;
  attachments: AttachmentInfo[];
}

// ---------------------------------------------------------------------------
// Mail intake queue
// ---------------------------------------------------------------------------

/** Poll jobs have no message id; message jobs carry one */
export interface MailJobData {
  source: 'gmail';
  gmailMessageId?: string;
  receivedAt: string;
}

export interface MailJobResult {
  messagesFound: number;
  intakeJobId: string | null;
  attachmentsStored: number;
  skipped: string[];
}
