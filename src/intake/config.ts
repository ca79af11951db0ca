/**
 * Intake Module Configuration
 *
 * Provides configuration for the two intake sources:
 * - Gmail inbox polling (interval, mailbox, attachment size limit, toggle)
 * - HTTP file uploads (size limit, batch size)
 * - Accepted file extensions (shared by both)
 *
 * Follows the same pattern as src/config.ts.
 */

import 'dotenv/config';
import { intEnv, optionalEnv } from '../config.js';

// ---------------------------------------------------------------------------
// Config Interface
// ---------------------------------------------------------------------------

export interface IntakeConfig {
  /** Polling interval in milliseconds (default: 120000 = 2 minutes) */
  pollIntervalMs: number;
  /** Maximum email attachment size in bytes (default: 25MB, matching Gmail's limit) */
  maxAttachmentBytes: number;
  /** Maximum uploaded file size in bytes (default: 50MB) */
  uploadMaxBytes: number;
  /** Maximum files per batch upload request */
  uploadMaxFiles: number;
  /** The inbox to monitor for incoming documents */
  mailbox: string;
  /** Whether inbox monitoring is enabled */
  enabled: boolean;
}

// ---------------------------------------------------------------------------
// Supported formats
// ---------------------------------------------------------------------------

/** File extensions accepted from either source */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.pdf', '.doc', '.docx', '.txt', '.jpg', '.jpeg', '.png', '.tiff', '.tif',
];

export function isSupportedFilename(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0) return false;
  return SUPPORTED_EXTENSIONS.includes(filename.slice(dot).toLowerCase());
}

// ---------------------------------------------------------------------------
// Config Instance
// ---------------------------------------------------------------------------

export const intakeConfig: IntakeConfig = {
  pollIntervalMs: intEnv('INTAKE_POLL_INTERVAL_MS', 120000),
  maxAttachmentBytes: intEnv('INTAKE_MAX_ATTACHMENT_BYTES', 25 * 1024 * 1024),
  uploadMaxBytes: intEnv('UPLOAD_MAX_BYTES', 50 * 1024 * 1024),
  uploadMaxFiles: intEnv('UPLOAD_MAX_FILES', 10),
  mailbox: optionalEnv('INTAKE_MAILBOX', 'intake@example.com'),
  enabled: process.env.INTAKE_ENABLED !== 'false', // Enabled by default
};
