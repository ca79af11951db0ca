/**
 * Tests for the blob store
 *
 * Tests cover:
 * - Drive uploads: flattened names, folder placement, returned gdrive:// URI
 * - Drive downloads: stream collection, error mapping to BlobDownloadError
 * - HTTP(S) downloads via fetch
 * - Unsupported URI schemes
 *
 * The Drive client is a stub; fetch is stubbed globally.
 */

import { Readable } from 'node:stream';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../drive-client.js', () => ({ getDriveClient: vi.fn() }));

import { DriveBlobStore, driveUri, parseDriveUri } from '../blob-store.js';
import type { DriveClient } from '../drive-client.js';
import { BlobDownloadError, UnsupportedBlobUriError } from '../../pipeline/errors.js';

const mockCreate = vi.fn();
const mockGet = vi.fn();
const fakeDrive = { files: { create: mockCreate, get: mockGet } } as unknown as DriveClient;

describe('DriveBlobStore', () => {
  let store: DriveBlobStore;

  beforeEach(() => {
    mockCreate.mockReset();
    mockGet.mockReset();
    store = new DriveBlobStore(() => fakeDrive, 'folder-1');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('put', () => {
    it('uploads to the folder and returns a gdrive URI', async () => {
      mockCreate.mockResolvedValue({ data: { id: 'file-123' } });

      const uri = await store.put(Buffer.from('%PDF'), 'emails/p1/attachments/claim.pdf', 'application/pdf');

      expect(uri).toBe('gdrive://file-123');
      const request = mockCreate.mock.calls[0][0];
      expect(request.requestBody).toEqual({
        name: 'emails__p1__attachments__claim.pdf',
        mimeType: 'application/pdf',
        parents: ['folder-1'],
        appProperties: { blobName: 'emails/p1/attachments/claim.pdf' },
      });
      expect(request.media.mimeType).toBe('application/pdf');
      expect(request.supportsAllDrives).toBe(true);
    });

    it('keeps the blobName property within the Drive size limit', async () => {
      mockCreate.mockResolvedValue({ data: { id: 'file-10' } });
      const prefix = 'emails/gmail-abc/attachments/';

      await store.put(Buffer.from('%PDF'), `${prefix}${'é'.repeat(60)}.pdf`, 'application/pdf');

      const blobName = mockCreate.mock.calls[0][0].requestBody.appProperties.blobName;
      expect(blobName).toBe(`${prefix}${'é'.repeat(43)}`);
      expect(Buffer.byteLength('blobName') + Buffer.byteLength(blobName)).toBe(123);
    });

    it('omits parents when no folder is configured', async () => {
      mockCreate.mockResolvedValue({ data: { id: 'file-9' } });

      await new DriveBlobStore(() => fakeDrive, '').put(Buffer.from('x'), 'files/p/a.txt');

      const request = mockCreate.mock.calls[0][0];
      expect(request.requestBody).not.toHaveProperty('parents');
      expect(request.requestBody.mimeType).toBe('application/octet-stream');
    });

    it('throws when Drive returns no file id', async () => {
      mockCreate.mockResolvedValue({ data: {} });

      await expect(store.put(Buffer.from('x'), 'files/p/a.txt')).rejects.toThrow(
        'Drive upload returned no file id for files__p__a.txt',
      );
    });
  });

  describe('get', () => {
    it('collects the Drive media stream', async () => {
      mockGet.mockResolvedValue({ data: Readable.from([Buffer.from('ab'), Buffer.from('cd')]) });

      const bytes = await store.get('gdrive://file-123');

      expect(bytes.toString()).toBe('abcd');
      expect(mockGet).toHaveBeenCalledWith(
        { fileId: 'file-123', alt: 'media', supportsAllDrives: true },
        { responseType: 'stream' },
      );
    });

    it('maps Drive failures to BlobDownloadError with the status code', async () => {
      mockGet.mockRejectedValue(Object.assign(new Error('File not found'), { code: 404 }));

      const error = await store.get('gdrive://file-404').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BlobDownloadError);
      expect(error).toMatchObject({
        message: 'Drive download failed for file-404: File not found',
        uri: 'gdrive://file-404',
        statusCode: 404,
      });
    });

    it('downloads https blobs with fetch', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('remote bytes')));

      const bytes = await store.get('https://files.example.com/signed/claim.pdf');

      expect(bytes.toString()).toBe('remote bytes');
    });

    it('maps non-2xx HTTP responses to BlobDownloadError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('denied', { status: 403 })));

      const error = await store.get('https://files.example.com/expired').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BlobDownloadError);
      expect(error).toMatchObject({ message: 'HTTP download returned 403', statusCode: 403 });
    });

    it('maps network errors to BlobDownloadError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('socket hang up')));

      await expect(store.get('http://files.example.com/a')).rejects.toThrow('HTTP download failed: socket hang up');
    });

    it('rejects unknown URI schemes', async () => {
      const error = await store.get('s3://bucket/key').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnsupportedBlobUriError);
      expect(error).toHaveProperty('message', 'Unsupported blob URI scheme: s3');
    });
  });
});

describe('drive URIs', () => {
  it('builds and parses gdrive URIs', () => {
    expect(driveUri('abc')).toBe('gdrive://abc');
    expect(parseDriveUri('gdrive://abc')).toBe('abc');
  });

  it('returns null for empty ids and other schemes', () => {
    expect(parseDriveUri('gdrive://')).toBeNull();
    expect(parseDriveUri('https://example.com/a')).toBeNull();
  });
});
