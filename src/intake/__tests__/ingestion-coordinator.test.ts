/**
 * Tests for the Ingestion Coordinator
 *
 * Runs handleIntake against the in-memory store with a stubbed OCR producer.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { filenameFromUri, handleIntake, intakeRejectReason } from '../ingestion-coordinator.js';
import type { IngestionDeps } from '../ingestion-coordinator.js';
import { IntakeMessageSchema, fileUnitIdFor } from '../../queue/messages.js';
import type { OcrMessage } from '../../queue/messages.js';
import { MemoryDocumentStore } from '../../store/__tests__/fixtures/memory-store.js';

function emailIntake(attachments: { uri: string; filename?: string }[]) {
  return IntakeMessageSchema.parse({
    source_type: 'email',
    processing_id: 'proc-1',
    email: {
      id: 'email-1',
      from: 'broker@example.com',
      to: 'claims@example.com, underwriting@example.com',
      subject: 'Claim documents',
      body: 'Please see attached.',
      date: '2026-03-02',
      time: '09:15:00',
      email_uri: 'gdrive://raw-email',
    },
    attachments,
  });
}

describe('handleIntake', () => {
  let store: MemoryDocumentStore;
  let enqueueOcr: Mock<(message: OcrMessage) => Promise<void>>;
  let deps: IngestionDeps;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    enqueueOcr = vi.fn<(message: OcrMessage) => Promise<void>>().mockResolvedValue(undefined);
    deps = { store, enqueueOcr };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('creates the unit, its attachments and one OCR message per attachment', async () => {
    const message = emailIntake([
      { uri: 'gdrive://att-a', filename: 'policy.pdf' },
      { uri: 'https://blobs.example.com/x/photo.jpg' },
    ]);

    expect(await handleIntake(message, deps)).toBe(true);

    const unit = await store.getUnit('email-1');
    expect(unit).toMatchObject({
      id: 'email-1',
      processingId: 'proc-1',
      sourceType: 'EMAIL',
      status: 'OCR_PENDING',
      attachmentCount: 2,
      emailFrom: 'broker@example.com',
      emailTo: ['claims@example.com', 'underwriting@example.com'],
      emailSubject: 'Claim documents',
      emailUri: 'gdrive://raw-email',
    });

    const attachments = await store.listAttachments('email-1');
    expect(attachments.map((a) => [a.id, a.filename, a.status])).toEqual([
      ['email-1-1', 'policy.pdf', 'PENDING'],
      ['email-1-2', 'photo.jpg', 'PENDING'],
    ]);

    expect(enqueueOcr).toHaveBeenCalledTimes(2);
    expect(enqueueOcr).toHaveBeenNthCalledWith(1, {
      processing_id: 'proc-1',
      unit_id: 'email-1',
      attachment_id: 'email-1-1',
      file_uri: 'gdrive://att-a',
      filename: 'policy.pdf',
      action: 'extract_text',
      timestamp: expect.any(String),
    });
    expect(enqueueOcr.mock.calls[1][0]).toMatchObject({
      attachment_id: 'email-1-2',
      file_uri: 'https://blobs.example.com/x/photo.jpg',
      filename: 'photo.jpg',
    });
  });

  it('completes a unit with no attachments without touching OCR', async () => {
    expect(await handleIntake(emailIntake([]), deps)).toBe(true);

    const unit = await store.getUnit('email-1');
    expect(unit?.status).toBe('COMPLETED');
    expect(unit?.statusVersion).toBe(1);
    expect(enqueueOcr).not.toHaveBeenCalled();
  });

  it('is idempotent across redelivery', async () => {
    const message = emailIntake([
      { uri: 'gdrive://att-a', filename: 'policy.pdf' },
      { uri: 'gdrive://att-b', filename: 'invoice.pdf' },
    ]);
    await handleIntake(message, deps);
    await store.updateAttachment('email-1-1', { status: 'OCR_COMPLETED', ocrText: 'policy text' });

    expect(await handleIntake(message, deps)).toBe(true);

    expect(store.units.size).toBe(1);
    expect(store.attachments.size).toBe(2);
    const unit = await store.getUnit('email-1');
    expect(unit?.status).toBe('OCR_PENDING');
    expect(unit?.statusVersion).toBe(1);
    // Progress made before the redelivery is kept
    expect((await store.getAttachment('email-1-1'))?.status).toBe('OCR_COMPLETED');
    // Re-sent messages carry the same attachment ids; job-id dedup drops them
    expect(enqueueOcr.mock.calls.map(([m]) => m.attachment_id)).toEqual([
      'email-1-1', 'email-1-2', 'email-1-1', 'email-1-2',
    ]);
  });

  it('acknowledges redelivery of a settled unit without side effects', async () => {
    await handleIntake(emailIntake([]), deps);
    enqueueOcr.mockClear();

    expect(await handleIntake(emailIntake([{ uri: 'gdrive://late' }]), deps)).toBe(true);

    expect(enqueueOcr).not.toHaveBeenCalled();
    expect(store.attachments.size).toBe(0);
  });

  it('registers a file intake as a unit with one attachment', async () => {
    const message = IntakeMessageSchema.parse({
      source_type: 'file',
      processing_id: 'upload-7',
      file_uri: 'gdrive://file-7',
      file_metadata: { filename: 'certificate.pdf', size: 2048 },
    });

    expect(await handleIntake(message, deps)).toBe(true);

    expect(await store.getUnit('upload-7')).toMatchObject({
      sourceType: 'FILE',
      status: 'OCR_PENDING',
      attachmentCount: 1,
      filename: 'certificate.pdf',
      fileUri: 'gdrive://file-7',
      fileSize: 2048,
    });
    expect(enqueueOcr).toHaveBeenCalledWith(expect.objectContaining({
      unit_id: 'upload-7',
      attachment_id: 'upload-7-1',
      file_uri: 'gdrive://file-7',
      filename: 'certificate.pdf',
    }));
  });

  it('gives an id-less file intake a unit id derived from its blob URI', async () => {
    const message = IntakeMessageSchema.parse({ source_type: 'file', file_uri: 'gdrive://scan-3' });
    const unitId = fileUnitIdFor('gdrive://scan-3');

    expect(await handleIntake(message, deps)).toBe(true);
    expect(await handleIntake(message, deps)).toBe(true);

    expect(store.units.size).toBe(1);
    expect(await store.getUnit(unitId)).toMatchObject({ processingId: unitId, sourceType: 'FILE', attachmentCount: 1 });
    expect(enqueueOcr).toHaveBeenCalledWith(expect.objectContaining({
      unit_id: unitId,
      attachment_id: `${unitId}-1`,
      filename: 'scan-3',
    }));
  });

  it('returns false for a file intake without a blob URI and writes nothing', async () => {
    const message = IntakeMessageSchema.parse({
      source_type: 'file',
      processing_id: 'upload-8',
      file_metadata: { filename: 'lost.pdf' },
    });

    expect(await handleIntake(message, deps)).toBe(false);
    expect(store.units.size).toBe(0);
    expect(enqueueOcr).not.toHaveBeenCalled();
  });

  it('falls back to processing_id and rejects intakes with no id at all', async () => {
    const withProcessingId = IntakeMessageSchema.parse({ source_type: 'email', processing_id: 'proc-9' });
    expect(await handleIntake(withProcessingId, deps)).toBe(true);
    expect(await store.getUnit('proc-9')).not.toBeNull();

    const anonymous = IntakeMessageSchema.parse({ source_type: 'email' });
    expect(await handleIntake(anonymous, deps)).toBe(false);
    expect(store.units.size).toBe(1);
  });

  it('promotes a pre-registered PENDING unit to PROCESSING before fan-out', async () => {
    await store.upsertUnit({ id: 'email-1', processingId: 'proc-1', sourceType: 'EMAIL', attachmentCount: 1 });
    const seeded = store.units.get('email-1');
    if (seeded) seeded.status = 'PENDING';

    await handleIntake(emailIntake([{ uri: 'gdrive://att-a', filename: 'policy.pdf' }]), deps);

    expect(store.transitions.filter((t) => t.unitId === 'email-1').map((t) => t.to)).toEqual([
      'PROCESSING',
      'OCR_PENDING',
    ]);
  });

  it('keeps fanning out when one enqueue fails, then asks for redelivery', async () => {
    enqueueOcr
      .mockRejectedValueOnce(new Error('Redis connection lost'))
      .mockResolvedValue(undefined);

    const result = await handleIntake(emailIntake([
      { uri: 'gdrive://att-a', filename: 'policy.pdf' },
      { uri: 'gdrive://att-b', filename: 'invoice.pdf' },
    ]), deps);

    expect(result).toBe(false);
    expect(enqueueOcr).toHaveBeenCalledTimes(2);
    expect((await store.getUnit('email-1'))?.status).toBe('OCR_PENDING');
  });

  it('completes on redelivery when every attachment already settled', async () => {
    const message = emailIntake([{ uri: 'gdrive://att-a', filename: 'policy.pdf' }]);
    await handleIntake(message, deps);
    await store.updateAttachment('email-1-1', { status: 'CLASSIFIED' });

    expect(await handleIntake(message, deps)).toBe(true);

    const unit = await store.getUnit('email-1');
    expect(unit?.status).toBe('COMPLETED');
    expect(unit?.statusVersion).toBe(2);
  });
});

describe('intakeRejectReason', () => {
  it('names the contract violation', () => {
    expect(intakeRejectReason(IntakeMessageSchema.parse({ source_type: 'file', processing_id: 'p' })))
      .toBe('File intake has no file_uri');
    expect(intakeRejectReason(IntakeMessageSchema.parse({ source_type: 'email' })))
      .toBe('Intake has neither an email id nor a processing_id');
    expect(intakeRejectReason(IntakeMessageSchema.parse({ source_type: 'email', processing_id: 'p' })))
      .toBeUndefined();
  });
});

describe('filenameFromUri', () => {
  it('takes the decoded last path segment', () => {
    expect(filenameFromUri('https://blobs.example.com/a/b/Claim%20Form.pdf?sig=abc')).toBe('Claim Form.pdf');
    expect(filenameFromUri('gdrive://file-123')).toBe('file-123');
  });

  it('returns the raw segment when it is not valid percent-encoding', () => {
    expect(filenameFromUri('https://blobs.example.com/bad%E0%A4%A.pdf')).toBe('bad%E0%A4%A.pdf');
  });
});
