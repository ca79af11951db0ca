/**
 * OCR Stage Configuration
 *
 * Environment variables:
 * - OCR_MODEL: Gemini model used for PDF and image transcription (default gemini-2.0-flash)
 * - OCR_MESSAGE_TEXT_LIMIT: Max characters of extracted text sent downstream (default 10000)
 * - OCR_MAX_INLINE_BYTES: Largest file sent inline to Gemini (default 19MB, API limit is 20MB)
 */

import 'dotenv/config';
import { intEnv, optionalEnv } from '../config.js';

export interface OcrConfig {
  model: string;
  messageTextLimit: number;
  maxInlineBytes: number;
}

export const ocrConfig: OcrConfig = {
  model: optionalEnv('OCR_MODEL', 'gemini-2.0-flash'),
  messageTextLimit: intEnv('OCR_MESSAGE_TEXT_LIMIT', 10000),
  maxInlineBytes: intEnv('OCR_MAX_INLINE_BYTES', 19 * 1024 * 1024),
};
