/**
 * OCR Type Definitions
 *
 * Every extractor produces an ExtractionResult and never throws: an
 * unreadable file yields empty text with confidence 0.
 */

export type ExtractorKind = 'pdf' | 'image' | 'word' | 'text' | 'generic';

export interface FileFormat {
  kind: ExtractorKind;
  mimeType: string;
}

export interface ExtractionResult {
  text: string;
  /** 0–1, ordinal: direct text > PDF text layer > OCR > sniffed fallback > empty */
  confidence: number;
  pageCount: number;
  elapsedSeconds: number;
  extractor: ExtractorKind;
  /** Why extraction produced no text, when it failed */
  error: string | null;
}

/** Confidence assigned per extraction path */
export const CONFIDENCE = {
  directText: 1.0,
  pdfTextLayer: 0.9,
  ocr: 0.8,
  sniffedFallback: 0.7,
  empty: 0.0,
} as const;
