/**
 * Blob Storage Configuration
 *
 * Environment variables:
 * - DRIVE_BLOB_FOLDER_ID: Google Drive folder that receives uploaded blobs
 * - DRIVE_IMPERSONATE_AS: User the service account acts as for Drive calls
 * - BLOB_DOWNLOAD_TIMEOUT_MS: Timeout for HTTP(S) blob downloads (default 60000)
 */

import 'dotenv/config';
import { intEnv, optionalEnv } from '../config.js';

export interface BlobConfig {
  driveFolderId: string;
  impersonateAs: string;
  downloadTimeoutMs: number;
}

export const blobConfig: BlobConfig = {
  driveFolderId: optionalEnv('DRIVE_BLOB_FOLDER_ID'),
  impersonateAs: optionalEnv('DRIVE_IMPERSONATE_AS', 'intake@example.com'),
  downloadTimeoutMs: intEnv('BLOB_DOWNLOAD_TIMEOUT_MS', 60000),
};
