// ============================================================================
// Blob Storage — Barrel Export
// ============================================================================

export type { BlobStore } from './blob-store.js';
export {
  DriveBlobStore,
  DRIVE_URI_SCHEME,
  driveUri,
  parseDriveUri,
  fetchHttpBlob,
  getBlobStore,
} from './blob-store.js';
export { blobConfig } from './config.js';
export type { BlobConfig } from './config.js';
export { getDriveClient, resetDriveClient } from './drive-client.js';
export type { DriveClient } from './drive-client.js';
