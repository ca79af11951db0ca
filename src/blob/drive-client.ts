/**
 * Google Drive API Client
 *
 * Lazy singleton for Drive v3, authenticated via src/google/auth.ts.
 * Used by the Drive blob store for uploads and downloads.
 */

import { google } from 'googleapis';
import { createGoogleAuth } from '../google/auth.js';
import { blobConfig } from './config.js';

export type DriveClient = ReturnType<typeof google.drive>;

const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';

let _driveClient: DriveClient | null = null;

export function getDriveClient(): DriveClient {
  if (_driveClient) return _driveClient;

  const auth = createGoogleAuth([DRIVE_SCOPE], blobConfig.impersonateAs);
  _driveClient = google.drive({ version: 'v3', auth });
  return _driveClient;
}

/** Resets the cached client (tests, credential rotation) */
export function resetDriveClient(): void {
  _driveClient = null;
}
