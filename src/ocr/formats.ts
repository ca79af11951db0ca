/**
 * File format table for OCR dispatch.
 *
 * Dispatch is by filename extension; content sniffing is only used by the
 * generic fallback when the extension is unknown.
 */

import type { FileFormat } from './types.js';

export const FILE_FORMATS: ReadonlyMap<string, FileFormat> = new Map<string, FileFormat>([
  ['.pdf', { kind: 'pdf', mimeType: 'application/pdf' }],
  ['.jpg', { kind: 'image', mimeType: 'image/jpeg' }],
  ['.jpeg', { kind: 'image', mimeType: 'image/jpeg' }],
  ['.png', { kind: 'image', mimeType: 'image/png' }],
  ['.webp', { kind: 'image', mimeType: 'image/webp' }],
  ['.heic', { kind: 'image', mimeType: 'image/heic' }],
  ['.tif', { kind: 'image', mimeType: 'image/tiff' }],
  ['.tiff', { kind: 'image', mimeType: 'image/tiff' }],
  ['.docx', { kind: 'word', mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document' }],
  ['.doc', { kind: 'word', mimeType: 'application/msword' }],
  ['.txt', { kind: 'text', mimeType: 'text/plain' }],
  ['.csv', { kind: 'text', mimeType: 'text/csv' }],
  ['.md', { kind: 'text', mimeType: 'text/markdown' }],
]);

/** Image types Gemini accepts inline */
export const OCR_IMAGE_MIME_TYPES: ReadonlySet<string> = new Set([
  'image/jpeg',
  'image/png',
  'image/webp',
  'image/heic',
]);

/** Lower-cased extension including the dot, or '' when there is none */
export function extensionOf(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot).toLowerCase() : '';
}

export function formatFor(filename: string): FileFormat | undefined {
  return FILE_FORMATS.get(extensionOf(filename));
}

/** MIME type for a filename, falling back to application/octet-stream */
export function mimeTypeFor(filename: string): string {
  return formatFor(filename)?.mimeType ?? 'application/octet-stream';
}

/** Recognizes a format from leading magic bytes */
export function sniffFormat(bytes: Buffer): FileFormat | undefined {
  if (bytes.subarray(0, 5).toString('latin1') === '%PDF-') {
    return FILE_FORMATS.get('.pdf');
  }
  if (bytes.length >= 8 && bytes.readUInt32BE(0) === 0x89504e47) {
    return FILE_FORMATS.get('.png');
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return FILE_FORMATS.get('.jpg');
  }
  return undefined;
}
