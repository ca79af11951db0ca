/**
 * Gemini Document Transcription
 *
 * Sends a PDF or image inline to Gemini and asks for a verbatim transcription
 * with structured output. The model also reports whether the document had to
 * be read visually (scanned pages / photos) rather than from a text layer,
 * which the PDF extractor uses to pick its confidence.
 */

import { SchemaType, type ResponseSchema } from '@google/generative-ai';
import { z } from 'zod';
import { getGenAI, parseJsonResponse } from '../gemini/client.js';
import { ocrConfig } from './config.js';

const TranscriptionSchema = z.object({
  text: z.string(),
  scanned: z.boolean().default(false),
});

export type Transcription = z.infer<typeof TranscriptionSchema>;

const transcriptionResponseSchema: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    text: {
      type: SchemaType.STRING,
      description: 'Full text of the document in reading order, pages separated by blank lines',
    },
    scanned: {
      type: SchemaType.BOOLEAN,
      description: 'True if the text was read from scanned or photographed pages',
    },
  },
  required: ['text', 'scanned'],
};

const TRANSCRIPTION_PROMPT = `Transcribe all text in this document exactly as written.

Instructions:
- Preserve reading order. Keep table cells on one line separated by " | ".
- Do not summarize, translate or correct the text.
- Include handwritten text where legible.
- If the document contains no readable text, return an empty string.
- Set scanned to true if the pages are images (scans, photos, faxes) rather than digital text.`;

export async function transcribeDocument(bytes: Buffer, mimeType: string): Promise<Transcription> {
  const model = getGenAI().getGenerativeModel({
    model: ocrConfig.model,
    generationConfig: {
      responseMimeType: 'application/json',
      responseSchema: transcriptionResponseSchema,
      temperature: 0,
    },
  });

  const result = await model.generateContent([
    {
      inlineData: {
        mimeType,
        data: bytes.toString('base64'),
      },
    },
    { text: TRANSCRIPTION_PROMPT },
  ]);

  return TranscriptionSchema.parse(parseJsonResponse(result.response.text()));
}
