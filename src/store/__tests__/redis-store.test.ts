/**
 * Tests for RedisDocumentStore
 *
 * Runs against FakeRedis (in-process hashes and sorted sets).
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Redis as IORedis } from 'ioredis';
import { RedisDocumentStore } from '../redis-store.js';
import { FakeRedis } from './fixtures/fake-redis.js';

describe('RedisDocumentStore', () => {
  let redis: FakeRedis;
  let store: RedisDocumentStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-02T09:00:00.000Z'));
    redis = new FakeRedis();
    store = new RedisDocumentStore(redis as unknown as IORedis, 'test');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // -------------------------------------------------------------------------
  // Units
  // -------------------------------------------------------------------------

  describe('upsertUnit', () => {
    it('creates a unit in PROCESSING with creation fields set', async () => {
      const { unit, created } = await store.upsertUnit({
        id: 'msg-1',
        processingId: 'proc-1',
        sourceType: 'EMAIL',
        attachmentCount: 2,
        emailFrom: 'broker@example.com',
        emailTo: ['claims@example.com', 'ops@example.com'],
        emailSubject: 'New claim',
      });

      expect(created).toBe(true);
      expect(unit).toEqual({
        id: 'msg-1',
        processingId: 'proc-1',
        sourceType: 'EMAIL',
        status: 'PROCESSING',
        statusVersion: 0,
        attachmentCount: 2,
        lastError: null,
        emailFrom: 'broker@example.com',
        emailTo: ['claims@example.com', 'ops@example.com'],
        emailCc: [],
        emailSubject: 'New claim',
        emailBody: null,
        emailDate: null,
        emailTime: null,
        emailUri: null,
        filename: null,
        fileUri: null,
        fileSize: null,
        createdAt: '2026-03-02T09:00:00.000Z',
        updatedAt: '2026-03-02T09:00:00.000Z',
      });
      expect(redis.zsets.get('test:units')?.get('msg-1')).toBe(Date.parse('2026-03-02T09:00:00.000Z'));
    });

    it('never regresses status or creation fields on re-upsert', async () => {
      await store.upsertUnit({ id: 'u1', processingId: 'p1', sourceType: 'FILE', attachmentCount: 1, filename: 'a.pdf' });
      await store.compareAndSetStatus('u1', 'PROCESSING', 'OCR_PENDING');
      vi.setSystemTime(new Date('2026-03-02T10:00:00.000Z'));

      const { unit, created } = await store.upsertUnit({
        id: 'u1',
        processingId: 'p1',
        sourceType: 'FILE',
        attachmentCount: 7,
        fileSize: 1024,
      });

      expect(created).toBe(false);
      expect(unit.status).toBe('OCR_PENDING');
      expect(unit.statusVersion).toBe(1);
      expect(unit.attachmentCount).toBe(1);
      expect(unit.createdAt).toBe('2026-03-02T09:00:00.000Z');
      expect(unit.filename).toBe('a.pdf');
      expect(unit.fileSize).toBe(1024);
    });
  });

  it('returns null for an unknown unit', async () => {
    expect(await store.getUnit('nope')).toBeNull();
  });

  describe('compareAndSetStatus', () => {
    beforeEach(async () => {
      await store.upsertUnit({ id: 'u1', processingId: 'p1', sourceType: 'FILE', attachmentCount: 0 });
    });

    it('updates on a matching expected status', async () => {
      vi.setSystemTime(new Date('2026-03-02T09:05:00.000Z'));

      expect(await store.compareAndSetStatus('u1', 'PROCESSING', 'FAILED', 'ocr: blob missing')).toBe('updated');

      const unit = await store.getUnit('u1');
      expect(unit?.status).toBe('FAILED');
      expect(unit?.statusVersion).toBe(1);
      expect(unit?.lastError).toBe('ocr: blob missing');
      expect(unit?.updatedAt).toBe('2026-03-02T09:05:00.000Z');
    });

    it('reports a conflict without writing', async () => {
      expect(await store.compareAndSetStatus('u1', 'OCR_PENDING', 'COMPLETED')).toBe('conflict');

      const unit = await store.getUnit('u1');
      expect(unit?.status).toBe('PROCESSING');
      expect(unit?.statusVersion).toBe(0);
    });

    it('reports a missing unit', async () => {
      expect(await store.compareAndSetStatus('ghost', 'PROCESSING', 'FAILED')).toBe('missing');
    });
  });

  describe('listUnits', () => {
    beforeEach(async () => {
      await store.upsertUnit({ id: 'old', processingId: 'old', sourceType: 'FILE', attachmentCount: 0 });
      vi.setSystemTime(new Date('2026-03-02T09:01:00.000Z'));
      await store.upsertUnit({ id: 'mid', processingId: 'mid', sourceType: 'FILE', attachmentCount: 0 });
      vi.setSystemTime(new Date('2026-03-02T09:02:00.000Z'));
      await store.upsertUnit({ id: 'new', processingId: 'new', sourceType: 'FILE', attachmentCount: 0 });
      await store.compareAndSetStatus('mid', 'PROCESSING', 'COMPLETED');
    });

    it('returns newest first', async () => {
      expect((await store.listUnits()).map((u) => u.id)).toEqual(['new', 'mid', 'old']);
    });

    it('applies the limit', async () => {
      expect((await store.listUnits({ limit: 2 })).map((u) => u.id)).toEqual(['new', 'mid']);
    });

    it('filters by status', async () => {
      expect((await store.listUnits({ status: 'COMPLETED' })).map((u) => u.id)).toEqual(['mid']);
    });
  });

  // -------------------------------------------------------------------------
  // Attachments
  // -------------------------------------------------------------------------

  describe('attachments', () => {
    it('lists attachments in sequence order', async () => {
      await store.upsertAttachment({ parentId: 'u1', sequenceNumber: 2, filename: 'b.png', blobUri: 'gdrive://b' });
      await store.upsertAttachment({ parentId: 'u1', sequenceNumber: 1, filename: 'a.pdf', blobUri: 'gdrive://a' });

      const attachments = await store.listAttachments('u1');

      expect(attachments.map((a) => a.id)).toEqual(['u1-1', 'u1-2']);
      expect(attachments[0]).toMatchObject({ parentId: 'u1', sequenceNumber: 1, filename: 'a.pdf', status: 'PENDING' });
    });

    it('keeps the stage status on re-upsert', async () => {
      await store.upsertAttachment({ parentId: 'u1', sequenceNumber: 1, filename: 'a.pdf', blobUri: 'gdrive://a' });
      await store.updateAttachment('u1-1', { status: 'OCR_COMPLETED', ocrText: 'hello', ocrConfidence: 0.9 });

      const attachment = await store.upsertAttachment({
        parentId: 'u1',
        sequenceNumber: 1,
        filename: 'a.pdf',
        blobUri: 'gdrive://a',
      });

      expect(attachment).toMatchObject({ status: 'OCR_COMPLETED', ocrText: 'hello', ocrConfidence: 0.9 });
    });

    it('decodes classification fields from a patch', async () => {
      await store.upsertAttachment({ parentId: 'u1', sequenceNumber: 1, filename: 'a.pdf', blobUri: 'gdrive://a' });

      await store.updateAttachment('u1-1', {
        status: 'CLASSIFIED',
        classificationType: 'INVOICE_RECEIPT',
        classificationConfidence: 0.75,
      });

      expect(await store.getAttachment('u1-1')).toMatchObject({
        status: 'CLASSIFIED',
        classificationType: 'INVOICE_RECEIPT',
        classificationConfidence: 0.75,
        ocrText: null,
      });
    });
  });

  // -------------------------------------------------------------------------
  // Results
  // -------------------------------------------------------------------------

  describe('stage results', () => {
    it('overwrites an OCR result entirely', async () => {
      await store.saveOcrResult({
        unitId: 'u1',
        attachmentId: 'u1-1',
        fileUri: 'gdrive://a',
        extractedText: '',
        confidenceScore: 0,
        pageCount: 0,
        processingTimeSeconds: 0.2,
        status: 'FAILED',
        extractor: 'image',
        error: 'No text found in document',
        createdAt: '2026-03-02T09:00:00.000Z',
      });
      await store.saveOcrResult({
        unitId: 'u1',
        attachmentId: 'u1-1',
        fileUri: 'gdrive://a',
        extractedText: 'Invoice 55',
        confidenceScore: 0.8,
        pageCount: 1,
        processingTimeSeconds: 1.5,
        status: 'COMPLETED',
        extractor: 'image',
        error: null,
        createdAt: '2026-03-02T09:10:00.000Z',
      });

      expect(await store.getOcrResult('u1', 'u1-1')).toEqual({
        unitId: 'u1',
        attachmentId: 'u1-1',
        fileUri: 'gdrive://a',
        extractedText: 'Invoice 55',
        confidenceScore: 0.8,
        pageCount: 1,
        processingTimeSeconds: 1.5,
        status: 'COMPLETED',
        extractor: 'image',
        error: null,
        createdAt: '2026-03-02T09:10:00.000Z',
      });
    });

    it('stores classification entities as JSON', async () => {
      await store.saveClassification({
        unitId: 'u1',
        attachmentId: 'u1-1',
        fileUri: 'gdrive://a',
        documentType: 'POLICY_DOCUMENT',
        confidence: 0.88,
        extractedEntities: [{ type: 'policy_number', value: 'P-77', confidence: 0.9 }],
        riskAssessment: 'LOW',
        priority: 'MEDIUM',
        summary: null,
        keyFindings: ['Policy renews 2027-01-01'],
        error: null,
        createdAt: '2026-03-02T09:00:00.000Z',
      });

      expect(redis.hashes.get('test:classification:u1:u1-1')?.get('extractedEntities')).toBe(
        '[{"type":"policy_number","value":"P-77","confidence":0.9}]',
      );
      expect(redis.hashes.get('test:classification:u1:u1-1')?.get('keyFindings')).toBe(
        '["Policy renews 2027-01-01"]',
      );
      expect(await store.getClassification('u1', 'u1-1')).toMatchObject({
        documentType: 'POLICY_DOCUMENT',
        confidence: 0.88,
        extractedEntities: [{ type: 'policy_number', value: 'P-77', confidence: 0.9 }],
        riskAssessment: 'LOW',
        priority: 'MEDIUM',
        summary: null,
        keyFindings: ['Policy renews 2027-01-01'],
      });
    });

    it('returns null for missing results', async () => {
      expect(await store.getOcrResult('u1', 'u1-9')).toBeNull();
      expect(await store.getClassification('u1', 'u1-9')).toBeNull();
    });
  });
});
