/**
 * Blob Store
 *
 * Raw bytes of emails, attachments and uploaded files. Stages pass blob URIs
 * in queue messages and never put file contents on the queue.
 *
 * URI schemes:
 * - gdrive://{fileId}  files written by this service to the configured Drive folder
 * - https://… / http://…  externally hosted blobs (read only)
 *
 * A failed download throws BlobDownloadError; the calling stage treats it as
 * transient and lets the queue redeliver.
 */

import { Readable } from 'node:stream';
import { blobConfig } from './config.js';
import { getDriveClient } from './drive-client.js';
import type { DriveClient } from './drive-client.js';
import { BlobDownloadError, UnsupportedBlobUriError } from '../pipeline/errors.js';
import { truncateUtf8 } from '../pipeline/text.js';

export const DRIVE_URI_SCHEME = 'gdrive://';

/** Drive caps each app property at 124 UTF-8 bytes, key and value together */
const APP_PROPERTY_MAX_BYTES = 124;
const BLOB_NAME_PROPERTY = 'blobName';

export interface BlobStore {
  /** Stores bytes under a logical name and returns the blob URI */
  put(bytes: Buffer, name: string, mimeType?: string): Promise<string>;
  /** Fetches the bytes behind a blob URI */
  get(uri: string): Promise<Buffer>;
}

export function driveUri(fileId: string): string {
  return `${DRIVE_URI_SCHEME}${fileId}`;
}

/** Extracts the Drive file id from a gdrive:// URI, or null for other schemes */
export function parseDriveUri(uri: string): string | null {
  if (!uri.startsWith(DRIVE_URI_SCHEME)) return null;
  const fileId = uri.slice(DRIVE_URI_SCHEME.length);
  return fileId.length > 0 ? fileId : null;
}

// ---------------------------------------------------------------------------
// DriveBlobStore
// ---------------------------------------------------------------------------

export class DriveBlobStore implements BlobStore {
  private readonly drive: () => DriveClient;
  private readonly folderId: string;

  /**
   * @param drive - Client factory, resolved lazily so construction never authenticates
   * @param folderId - Drive folder receiving uploads ('' = drive root)
   */
  constructor(drive: () => DriveClient = getDriveClient, folderId: string = blobConfig.driveFolderId) {
    this.drive = drive;
    this.folderId = folderId;
  }

  async put(bytes: Buffer, name: string, mimeType = 'application/octet-stream'): Promise<string> {
    // Drive has no directories in names; keep the logical path readable
    const driveName = name.replace(/\//g, '__');
    const response = await this.drive().files.create({
      requestBody: {
        name: driveName,
        mimeType,
        ...(this.folderId && { parents: [this.folderId] }),
        appProperties: {
          [BLOB_NAME_PROPERTY]: truncateUtf8(name, APP_PROPERTY_MAX_BYTES - BLOB_NAME_PROPERTY.length),
        },
      },
      media: {
        mimeType,
        body: Readable.from(bytes),
      },
      fields: 'id',
      supportsAllDrives: true,
    });

    const fileId = response.data.id;
    if (!fileId) {
      throw new Error(`Drive upload returned no file id for ${driveName}`);
    }

    console.log('[blob] Stored', { fileId, size: bytes.length });
    return driveUri(fileId);
  }

  async get(uri: string): Promise<Buffer> {
    const fileId = parseDriveUri(uri);
    if (fileId) {
      return this.getDriveFile(uri, fileId);
    }
    if (uri.startsWith('https://') || uri.startsWith('http://')) {
      return fetchHttpBlob(uri);
    }
    throw new UnsupportedBlobUriError(uri);
  }

  private async getDriveFile(uri: string, fileId: string): Promise<Buffer> {
    try {
      const response = await this.drive().files.get(
        { fileId, alt: 'media', supportsAllDrives: true },
        { responseType: 'stream' },
      );

      const chunks: Buffer[] = [];
      for await (const chunk of response.data) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      return Buffer.concat(chunks);
    } catch (err) {
      const status = err !== null && typeof err === 'object' && 'code' in err && typeof err.code === 'number'
        ? err.code
        : null;
      throw new BlobDownloadError(
        `Drive download failed for ${fileId}: ${err instanceof Error ? err.message : String(err)}`,
        uri,
        status,
      );
    }
  }
}

// ---------------------------------------------------------------------------
// HTTP(S) blobs
// ---------------------------------------------------------------------------

/** Downloads an externally hosted blob (e.g. a pre-signed URL) */
export async function fetchHttpBlob(uri: string): Promise<Buffer> {
  let response: Response;
  try {
    response = await fetch(uri, { signal: AbortSignal.timeout(blobConfig.downloadTimeoutMs) });
  } catch (err) {
    throw new BlobDownloadError(
      `HTTP download failed: ${err instanceof Error ? err.message : String(err)}`,
      uri,
    );
  }

  if (!response.ok) {
    throw new BlobDownloadError(`HTTP download returned ${response.status}`, uri, response.status);
  }

  return Buffer.from(await response.arrayBuffer());
}

// ---------------------------------------------------------------------------
// Singleton
// ---------------------------------------------------------------------------

let _blobStore: BlobStore | null = null;

export function getBlobStore(): BlobStore {
  if (!_blobStore) {
    _blobStore = new DriveBlobStore();
  }
  return _blobStore;
}
