import { describe, it, expect } from 'vitest';
import { sanitizeForLog, PII_FIELDS } from '../sanitize.js';

describe('sanitizeForLog', () => {
  // -------------------------------------------------------------------------
  // 1. Primitives pass through unchanged
  // -------------------------------------------------------------------------
  describe('primitive values', () => {
    it('returns primitives unchanged', () => {
      expect(sanitizeForLog('hello')).toBe('hello');
      expect(sanitizeForLog(42)).toBe(42);
      expect(sanitizeForLog(false)).toBe(false);
      expect(sanitizeForLog(null)).toBeNull();
      expect(sanitizeForLog(undefined)).toBeUndefined();
    });
  });

  // -------------------------------------------------------------------------
  // 2. Message content is redacted
  // -------------------------------------------------------------------------
  describe('PII field redaction', () => {
    it('redacts email sender, recipients, subject and body', () => {
      expect(
        sanitizeForLog({
          from: 'insured@example.com',
          to: ['claims@example.com'],
          cc: 'ops@example.com',
          subject: 'My claim',
          body: 'Policy P-1, injury to left knee',
        }),
      ).toEqual({
        from: '[REDACTED]',
        to: '[REDACTED]',
        cc: '[REDACTED]',
        subject: '[REDACTED]',
        body: '[REDACTED]',
      });
    });

    it('redacts extracted text and summaries', () => {
      expect(sanitizeForLog({ extracted_text: 'x', ocrText: 'y', summary: 'z' })).toEqual({
        extracted_text: '[REDACTED]',
        ocrText: '[REDACTED]',
        summary: '[REDACTED]',
      });
    });

    it('keeps ids, filenames and statuses', () => {
      expect(
        sanitizeForLog({ unit_id: 'u1', filename: 'claim.pdf', status: 'OCR_PENDING', file_uri: 'gdrive://a' }),
      ).toEqual({ unit_id: 'u1', filename: 'claim.pdf', status: 'OCR_PENDING', file_uri: 'gdrive://a' });
    });

    it('covers the unit field names', () => {
      for (const field of ['emailFrom', 'emailTo', 'emailCc', 'emailSubject', 'emailBody', 'extractedText']) {
        expect(PII_FIELDS.has(field)).toBe(true);
      }
    });
  });

  // -------------------------------------------------------------------------
  // 3. Nesting
  // -------------------------------------------------------------------------
  describe('nested structures', () => {
    it('redacts inside nested objects', () => {
      expect(sanitizeForLog({ source_type: 'email', email: { id: 'm1', subject: 'Claim' } })).toEqual({
        source_type: 'email',
        email: { id: 'm1', subject: '[REDACTED]' },
      });
    });

    it('summarizes arrays without iterating', () => {
      expect(sanitizeForLog({ attachments: [{ uri: 'a' }, { uri: 'b' }] })).toEqual({
        attachments: '[Array(2)]',
      });
    });

    it('stops at the depth limit', () => {
      let deep: Record<string, unknown> = { leaf: true };
      for (let i = 0; i < 11; i++) deep = { next: deep };

      let expected: unknown = '[Object]';
      for (let i = 0; i < 10; i++) expected = { next: expected };

      expect(sanitizeForLog(deep)).toEqual(expected);
    });
  });
});
