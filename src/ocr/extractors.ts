/**
 * Text Extractors
 *
 * extractText dispatches on the filename extension:
 * - pdf:     Gemini transcription, page count from pdf-lib
 * - image:   Gemini OCR (JPEG, PNG, WebP, HEIC; TIFF is not readable)
 * - word:    mammoth raw text for .docx; legacy .doc yields no text
 * - text:    UTF-8 decode
 * - generic: magic-byte sniffing, then one of the above or a UTF-8 text check
 *
 * Errors never escape extractText. A failed extraction is reported as empty
 * text with confidence 0 and the reason in `error`, so the stage records a
 * FAILED OCR result instead of retrying an unreadable file forever.
 */

import mammoth from 'mammoth';
import { PDFDocument } from 'pdf-lib';
import { ExtractionError, errorMessage } from '../pipeline/errors.js';
import { ocrConfig } from './config.js';
import { formatFor, OCR_IMAGE_MIME_TYPES, sniffFormat, extensionOf } from './formats.js';
import { transcribeDocument } from './gemini-ocr.js';
import { CONFIDENCE } from './types.js';
import type { ExtractionResult, ExtractorKind, FileFormat } from './types.js';

/** What an individual extractor reports; timing is added by extractText */
interface PartialExtraction {
  text: string;
  confidence: number;
  pageCount: number;
}

type Extractor = (bytes: Buffer, format: FileFormat | undefined, filename: string) => Promise<PartialExtraction>;

// ---------------------------------------------------------------------------
// Individual extractors
// ---------------------------------------------------------------------------

function assertInlineSize(bytes: Buffer): void {
  if (bytes.length > ocrConfig.maxInlineBytes) {
    throw new ExtractionError(
      `File is ${bytes.length} bytes, above the ${ocrConfig.maxInlineBytes} byte OCR limit`,
    );
  }
}

/** Page count from the PDF structure; 0 when the file cannot be parsed */
export async function countPdfPages(bytes: Buffer): Promise<number> {
  try {
    const doc = await PDFDocument.load(new Uint8Array(bytes), { ignoreEncryption: true });
    return doc.getPageCount();
  } catch {
    return 0;
  }
}

export const extractPdf: Extractor = async (bytes) => {
  assertInlineSize(bytes);
  const pageCount = await countPdfPages(bytes);
  const { text, scanned } = await transcribeDocument(bytes, 'application/pdf');
  return {
    text,
    confidence: scanned ? CONFIDENCE.ocr : CONFIDENCE.pdfTextLayer,
    pageCount,
  };
};

export const extractImage: Extractor = async (bytes, format) => {
  const mimeType = format?.mimeType ?? 'application/octet-stream';
  if (!OCR_IMAGE_MIME_TYPES.has(mimeType)) {
    throw new ExtractionError(`Image type ${mimeType} is not supported for OCR`);
  }
  assertInlineSize(bytes);
  const { text } = await transcribeDocument(bytes, mimeType);
  return { text, confidence: CONFIDENCE.ocr, pageCount: 1 };
};

export const extractWord: Extractor = async (bytes, _format, filename) => {
  if (extensionOf(filename) === '.doc') {
    throw new ExtractionError('Legacy .doc files are not supported; convert to .docx');
  }
  const result = await mammoth.extractRawText({ buffer: bytes });
  return { text: result.value, confidence: CONFIDENCE.directText, pageCount: 1 };
};

export const extractPlainText: Extractor = async (bytes) => {
  const text = bytes.toString('utf-8').replace(/^\uFEFF/, '');
  return { text, confidence: CONFIDENCE.directText, pageCount: 1 };
};

/** True when the buffer decodes as UTF-8 and is mostly printable */
function looksLikeText(bytes: Buffer): boolean {
  if (bytes.length === 0) return false;
  const sample = bytes.subarray(0, 4096).toString('utf-8');
  if (sample.includes('\uFFFD')) return false;
  const controls = sample.match(/[\u0000-\u0008\u000E-\u001F]/g)?.length ?? 0;
  return controls / sample.length < 0.01;
}

export const extractGeneric: Extractor = async (bytes, _format, filename) => {
  const sniffed = sniffFormat(bytes);
  if (sniffed) {
    return EXTRACTORS[sniffed.kind](bytes, sniffed, filename);
  }
  if (looksLikeText(bytes)) {
    const { text, pageCount } = await extractPlainText(bytes, undefined, filename);
    return { text, confidence: CONFIDENCE.sniffedFallback, pageCount };
  }
  throw new ExtractionError(`Unrecognized file format${extensionOf(filename) ? ` (${extensionOf(filename)})` : ''}`);
};

const EXTRACTORS: Record<ExtractorKind, Extractor> = {
  pdf: extractPdf,
  image: extractImage,
  word: extractWord,
  text: extractPlainText,
  generic: extractGeneric,
};

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

function elapsedSince(startedAt: number): number {
  return Math.round(performance.now() - startedAt) / 1000;
}

/**
 * Extracts text from a file, choosing the extractor by filename extension.
 * Never throws.
 */
export async function extractText(bytes: Buffer, filename: string): Promise<ExtractionResult> {
  const startedAt = performance.now();
  const format = formatFor(filename);
  const kind: ExtractorKind = format?.kind ?? 'generic';

  try {
    const partial = await EXTRACTORS[kind](bytes, format, filename);
    const hasText = partial.text.trim().length > 0;
    return {
      text: hasText ? partial.text : '',
      confidence: hasText ? partial.confidence : CONFIDENCE.empty,
      pageCount: partial.pageCount,
      elapsedSeconds: elapsedSince(startedAt),
      extractor: kind,
      error: hasText ? null : 'No text found in document',
    };
  } catch (err) {
    console.warn('[ocr] Extraction failed', { extractor: kind, size: bytes.length, error: errorMessage(err) });
    return {
      text: '',
      confidence: CONFIDENCE.empty,
      pageCount: 0,
      elapsedSeconds: elapsedSince(startedAt),
      extractor: kind,
      error: errorMessage(err),
    };
  }
}
