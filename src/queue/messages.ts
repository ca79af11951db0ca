/**
 * Queue Message Schemas
 *
 * Wire format of every message exchanged between stages (snake_case JSON).
 * Each consumer validates its body with these schemas before doing any work;
 * a body that fails validation is dead-lettered without retries.
 *
 * - IntakeMessage: tagged union on source_type ('email' | 'file')
 * - OcrMessage: one per attachment, action 'extract_text'
 * - ClassificationMessage: one per attachment with text, action 'classify_document'
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Intake
// ---------------------------------------------------------------------------

/** Address lists arrive either as arrays or as comma-separated strings */
const AddressListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((addr) => addr.trim())
      .filter((addr) => addr.length > 0),
  );

export const EmailPayloadSchema = z.object({
  id: z.string().min(1).optional(),
  from: z.string().optional(),
  to: AddressListSchema.optional(),
  cc: AddressListSchema.optional(),
  subject: z.string().optional(),
  body: z.string().optional(),
  date: z.string().optional(),
  time: z.string().optional(),
  email_uri: z.string().optional(),
});

export const IntakeAttachmentSchema = z.object({
  uri: z.string().min(1),
  filename: z.string().optional(),
});

export const EmailIntakeMessageSchema = z.object({
  source_type: z.literal('email'),
  processing_id: z.string().min(1).optional(),
  email: EmailPayloadSchema.default({}),
  attachments: z.array(IntakeAttachmentSchema).default([]),
  timestamp: z.string().optional(),
});

export const FileMetadataSchema = z.object({
  id: z.string().min(1).optional(),
  filename: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
  mime_type: z.string().optional(),
});

export const FileIntakeMessageSchema = z.object({
  source_type: z.literal('file'),
  processing_id: z.string().min(1).optional(),
  file_uri: z.string().min(1).optional(),
  file_metadata: FileMetadataSchema.default({}),
  timestamp: z.string().optional(),
});

export const IntakeMessageSchema = z.discriminatedUnion('source_type', [
  EmailIntakeMessageSchema,
  FileIntakeMessageSchema,
]);

export type EmailIntakeMessage = z.infer<typeof EmailIntakeMessageSchema>;
export type FileIntakeMessage = z.infer<typeof FileIntakeMessageSchema>;
export type IntakeMessage = z.infer<typeof IntakeMessageSchema>;
/** Shape accepted by producers (before defaults are applied) */
export type IntakeMessageInput = z.input<typeof IntakeMessageSchema>;

// ---------------------------------------------------------------------------
// OCR
// ---------------------------------------------------------------------------

export const OcrMessageSchema = z.object({
  processing_id: z.string().min(1),
  unit_id: z.string().min(1),
  attachment_id: z.string().min(1),
  file_uri: z.string().min(1),
  filename: z.string(),
  action: z.literal('extract_text'),
  timestamp: z.string().optional(),
});

export type OcrMessage = z.infer<typeof OcrMessageSchema>;

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export const ClassificationMessageSchema = z.object({
  processing_id: z.string().min(1),
  unit_id: z.string().min(1),
  attachment_id: z.string().min(1),
  file_uri: z.string(),
  extracted_text: z.string(),
  action: z.literal('classify_document'),
  timestamp: z.string().optional(),
});

export type ClassificationMessage = z.infer<typeof ClassificationMessageSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Unit id for a file intake that carries neither a file id nor a
 * processing_id. Derived from the blob URI so redelivery finds the same unit.
 */
export function fileUnitIdFor(fileUri: string): string {
  return `file-${createHash('sha256').update(fileUri).digest('hex').slice(0, 16)}`;
}

/** Resolves the unit id an intake message will create, if any */
export function resolveIntakeUnitId(message: IntakeMessage): string | undefined {
  if (message.source_type === 'email') {
    return message.email.id ?? message.processing_id;
  }
  const derived = message.file_uri ? fileUnitIdFor(message.file_uri) : undefined;
  return message.file_metadata.id ?? message.processing_id ?? derived;
}

/**
 * Best-effort unit id from an unvalidated body, used when logging or
 * failing a unit for a message that never passed validation.
 */
export function peekUnitId(data: unknown): string | undefined {
  if (data === null || typeof data !== 'object') return undefined;
  const parsed = z
    .object({
      unit_id: z.string().optional(),
      processing_id: z.string().optional(),
      email: z.object({ id: z.string().optional() }).optional(),
      file_metadata: z.object({ id: z.string().optional() }).optional(),
      source_type: z.string().optional(),
      file_uri: z.string().optional(),
    })
    .safeParse(data);
  if (!parsed.success) return undefined;
  const body = parsed.data;
  const derived = body.source_type === 'file' && body.file_uri ? fileUnitIdFor(body.file_uri) : undefined;
  return body.unit_id ?? body.email?.id ?? body.file_metadata?.id ?? body.processing_id ?? derived;
}
