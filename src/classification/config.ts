/**
 * Classification Stage Configuration
 *
 * Environment variables:
 * - CLASSIFICATION_MODEL: Gemini model ID (default: gemini-2.0-flash)
 * - CLASSIFICATION_MAX_INPUT_CHARS: Text sent to the model (default: 8000)
 * - CLASSIFICATION_ENABLED: Kill switch; when 'false' every document is recorded UNCLASSIFIED
 */

import 'dotenv/config';
import { intEnv, optionalEnv } from '../config.js';

export interface ClassificationConfig {
  model: string;
  maxInputChars: number;
  enabled: boolean;
}

export const classificationConfig: ClassificationConfig = {
  model: optionalEnv('CLASSIFICATION_MODEL', 'gemini-2.0-flash'),
  maxInputChars: intEnv('CLASSIFICATION_MAX_INPUT_CHARS', 8000),
  enabled: process.env.CLASSIFICATION_ENABLED !== 'false',
};
