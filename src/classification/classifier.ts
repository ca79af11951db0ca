/**
 * Document Classifier — Google Gemini with Structured Output
 *
 * Classifies extracted document text into one of DOCUMENT_TYPES and returns
 * entities, a risk assessment, a processing priority and a short summary.
 *
 * Features:
 * - JSON schema-constrained output (responseMimeType + responseSchema)
 * - Zod validation after Gemini's schema enforcement
 * - Input capped at CLASSIFICATION_MAX_INPUT_CHARS (surrogate-pair safe)
 * - Only type and confidence are logged, never document text
 *
 * classifyText throws on API or validation failure; the stage records the
 * UNCLASSIFIED fallback in that case.
 */

import { SchemaType, type ResponseSchema } from '@google/generative-ai';
import { getGenAI, parseJsonResponse } from '../gemini/client.js';
import { ClassificationError } from '../pipeline/errors.js';
import { truncateText } from '../pipeline/text.js';
import { classificationConfig } from './config.js';
import {
  ClassificationOutputSchema,
  DOCUMENT_TYPES,
  PRIORITIES,
  RISK_LEVELS,
} from './types.js';
import type { ClassificationOutput } from './types.js';

// ---------------------------------------------------------------------------
// Gemini Response Schema (matches ClassificationOutputSchema)
// ---------------------------------------------------------------------------

const classificationResponseSchema: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    documentType: {
      type: SchemaType.STRING,
      format: 'enum',
      enum: [...DOCUMENT_TYPES],
      description: 'The classified document type',
    },
    confidence: {
      type: SchemaType.NUMBER,
      description: 'Confidence score between 0.0 and 1.0',
    },
    entities: {
      type: SchemaType.ARRAY,
      description: 'Key entities found in the document',
      items: {
        type: SchemaType.OBJECT,
        properties: {
          type: { type: SchemaType.STRING, description: 'Entity kind, e.g. policy_number, claimant, amount, date' },
          value: { type: SchemaType.STRING },
          confidence: { type: SchemaType.NUMBER },
        },
        required: ['type', 'value', 'confidence'],
      },
    },
    riskAssessment: {
      type: SchemaType.STRING,
      format: 'enum',
      enum: [...RISK_LEVELS],
    },
    priority: {
      type: SchemaType.STRING,
      format: 'enum',
      enum: [...PRIORITIES],
    },
    summary: {
      type: SchemaType.STRING,
      description: 'One or two sentence summary of the document',
      nullable: true,
    },
    keyFindings: {
      type: SchemaType.ARRAY,
      items: { type: SchemaType.STRING },
    },
  },
  required: ['documentType', 'confidence', 'entities', 'riskAssessment', 'priority'],
};

// ---------------------------------------------------------------------------
// Classification Prompt
// ---------------------------------------------------------------------------

function classificationPrompt(text: string): string {
  return `Classify this insurance document based on its extracted text.

Known document types: ${DOCUMENT_TYPES.join(', ')}

Instructions:
- Set documentType to the most specific match from the list above. Use UNCLASSIFIED if none fits.
- Set confidence between 0.0 and 1.0. If you are uncertain, set it below 0.7.
- List entities such as policy_number, claim_number, insured_name, claimant_name, insurer,
  coverage_type, amount, incident_date, effective_date and expiry_date, each with its own confidence.
- Set riskAssessment to HIGH for litigation, suspected fraud, large losses or injuries; LOW for routine
  correspondence; UNKNOWN if the text gives no basis.
- Set priority to HIGH when a deadline, claim or coverage gap needs prompt action.
- Keep summary to two sentences and keyFindings to at most five short items.

Classification guidance for commonly confused types:
- CLAIM_REQUEST is a free-form request to open or progress a claim; CLAIM_FORM is a structured claim form.
- CERTIFICATE_OF_INSURANCE summarizes coverage for a third party; POLICY_DOCUMENT contains the full terms.
- RFP asks insurers to quote on a risk; REQUEST covers any other request for action or information.

Document text:
"""
${text}
"""`;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export async function classifyText(text: string): Promise<ClassificationOutput> {
  const input = truncateText(text, classificationConfig.maxInputChars);

  const model = getGenAI().getGenerativeModel({
    model: classificationConfig.model,
    generationConfig: {
      responseMimeType: 'application/json',
      responseSchema: classificationResponseSchema,
      temperature: 0.1,
    },
  });

  const result = await model.generateContent(classificationPrompt(input));
  const responseText = result.response.text();

  let raw: unknown;
  try {
    raw = parseJsonResponse(responseText);
  } catch {
    throw new ClassificationError('Classifier returned a non-JSON response');
  }

  const validated = ClassificationOutputSchema.safeParse(raw);
  if (!validated.success) {
    throw new ClassificationError(
      `Classifier response failed validation: ${validated.error.issues.map((i) => i.path.join('.')).join(', ')}`,
    );
  }

  console.log('[classification] Classified', {
    documentType: validated.data.documentType,
    confidence: validated.data.confidence,
    inputChars: input.length,
  });
  return validated.data;
}
