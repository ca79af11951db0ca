/**
 * Classification Type Definitions
 *
 * - DOCUMENT_TYPES: closed set of insurance document types the classifier recognizes
 * - RISK_LEVELS / PRIORITIES: triage fields returned alongside the type
 * - ClassificationOutputSchema: Zod schema for Gemini structured output
 * - UNCLASSIFIED_RESULT: degraded result recorded when classification fails
 *
 * Consumers: classifier.ts, classification-stage.ts, store/types.ts
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Document Types
// ---------------------------------------------------------------------------

export const DOCUMENT_TYPES = [
  // Policy lifecycle
  'POLICY_DOCUMENT', 'CERTIFICATE_OF_INSURANCE', 'CONTRACT',
  // Claims
  'CLAIM_REQUEST', 'CLAIM_FORM', 'ACCIDENT_REPORT', 'MEDICAL_REPORT', 'INVOICE_RECEIPT',
  // Underwriting / sales
  'RFP', 'REQUEST', 'FINANCIAL_STATEMENT', 'IDENTIFICATION',
  // General
  'CORRESPONDENCE', 'LEGAL_DOCUMENT',
  // Catch-all
  'UNCLASSIFIED',
] as const;

export type DocumentType = typeof DOCUMENT_TYPES[number];

export const RISK_LEVELS = ['HIGH', 'MEDIUM', 'LOW', 'UNKNOWN'] as const;
export type RiskLevel = typeof RISK_LEVELS[number];

export const PRIORITIES = ['HIGH', 'MEDIUM', 'LOW'] as const;
export type Priority = typeof PRIORITIES[number];

// ---------------------------------------------------------------------------
// Classification Output (Zod schema for Gemini structured output)
// ---------------------------------------------------------------------------

export const ExtractedEntitySchema = z.object({
  type: z.string().min(1),
  value: z.string(),
  confidence: z.number().min(0).max(1),
});

export type ExtractedEntity = z.infer<typeof ExtractedEntitySchema>;

export const ClassificationOutputSchema = z.object({
  documentType: z.enum(DOCUMENT_TYPES),
  confidence: z.number().min(0).max(1),
  entities: z.array(ExtractedEntitySchema).default([]),
  riskAssessment: z.enum(RISK_LEVELS),
  priority: z.enum(PRIORITIES),
  summary: z.string().nullable().default(null),
  keyFindings: z.array(z.string()).default([]),
});

export type ClassificationOutput = z.infer<typeof ClassificationOutputSchema>;

/** Recorded in place of a real classification when the capability fails */
export const UNCLASSIFIED_RESULT: ClassificationOutput = {
  documentType: 'UNCLASSIFIED',
  confidence: 0,
  entities: [],
  riskAssessment: 'UNKNOWN',
  priority: 'LOW',
  summary: null,
  keyFindings: [],
};
