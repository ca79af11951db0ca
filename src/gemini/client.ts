/**
 * Gemini Client (lazy singleton)
 *
 * Shared by the OCR extractors and the document classifier. The API key is
 * read on first use so modules that never call Gemini (HTTP server, tests)
 * load without it.
 *
 * Environment variables:
 * - GEMINI_API_KEY: Required once OCR or classification runs
 */

import 'dotenv/config';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { requiredEnv } from '../config.js';

let _genAI: GoogleGenerativeAI | null = null;

export function getGenAI(): GoogleGenerativeAI {
  if (_genAI) return _genAI;
  _genAI = new GoogleGenerativeAI(requiredEnv('GEMINI_API_KEY'));
  return _genAI;
}

/**
 * Parses a structured-output response body.
 * Gemini occasionally wraps JSON in a markdown fence despite responseMimeType.
 */
export function parseJsonResponse(text: string): unknown {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return JSON.parse(fenced ? fenced[1] : trimmed);
}
