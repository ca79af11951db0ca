/**
 * PII Sanitization for Safe Logging
 *
 * Replaces sender, recipient, body and extracted-text fields with
 * '[REDACTED]' before a payload is written to logs. Insurance documents
 * carry names, policy numbers and medical details; none of that belongs
 * in log output.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - Ids, filenames, URIs and statuses pass through
 * - Depth limit of 10
 */

/** Field names whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'from',
  'to',
  'cc',
  'subject',
  'body',
  'bodyText',
  'emailFrom',
  'emailTo',
  'emailCc',
  'emailSubject',
  'emailBody',
  'extracted_text',
  'extractedText',
  'ocrText',
  'summary',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

/**
 * Recursively sanitize a value for safe logging.
 *
 * @param depth - Current recursion depth (internal use)
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = PII_FIELDS.has(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }

  return result;
}
