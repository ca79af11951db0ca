/**
 * Tests for Gmail Monitor (job scheduler and history id persistence)
 *
 * Tests cover:
 * - getStoredHistoryId: returns null on first run, returns stored value on recovery
 * - storeHistoryId: writes historyId to Redis
 * - startGmailMonitor: calls upsertJobScheduler with correct config
 * - startGmailMonitor: skips scheduling when intake is disabled
 *
 * All Redis and BullMQ interactions are mocked.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Queue } from 'bullmq';
import type { MailJobData } from '../types.js';

// ---------------------------------------------------------------------------
// Module-level mocks
// ---------------------------------------------------------------------------

const mockRedis = vi.hoisted(() => ({
  get: vi.fn(),
  set: vi.fn(),
  quit: vi.fn(),
}));

// Mock ioredis — named import { Redis as IORedis } in gmail-monitor.ts
vi.mock('ioredis', () => ({
  Redis: class MockIORedis {
    get = mockRedis.get;
    set = mockRedis.set;
    quit = mockRedis.quit;
  },
}));

vi.mock('../../queue/queues.js', () => ({
  createRedisConnection: vi.fn(() => ({ host: 'localhost', port: 6379, maxRetriesPerRequest: null })),
}));

vi.mock('bullmq', () => ({
  Queue: vi.fn(() => ({ upsertJobScheduler: vi.fn(), close: vi.fn() })),
}));

vi.mock('../../config.js', () => ({
  appConfig: { store: { keyPrefix: 'test' } },
}));

const mockIntakeConfig = vi.hoisted(() => ({
  intakeConfig: {
    pollIntervalMs: 120000,
    maxAttachmentBytes: 25 * 1024 * 1024,
    mailbox: 'intake@example.com',
    enabled: true,
  },
}));

vi.mock('../config.js', () => mockIntakeConfig);

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { getStoredHistoryId, historyIdKey, startGmailMonitor, storeHistoryId } from '../gmail-monitor.js';

function mockQueue(upsertJobScheduler = vi.fn().mockResolvedValue(undefined)) {
  return { queue: { upsertJobScheduler } as unknown as Queue<MailJobData>, upsertJobScheduler };
}

describe('Gmail Monitor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockIntakeConfig.intakeConfig.enabled = true;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('namespaces the history id key with the store prefix', () => {
    expect(historyIdKey()).toBe('test:mail:gmail:historyId');
  });

  // -------------------------------------------------------------------------
  // getStoredHistoryId
  // -------------------------------------------------------------------------

  describe('getStoredHistoryId', () => {
    it('returns null when Redis key does not exist (first run)', async () => {
      mockRedis.get.mockResolvedValue(null);

      expect(await getStoredHistoryId()).toBeNull();
      expect(mockRedis.get).toHaveBeenCalledWith('test:mail:gmail:historyId');
      expect(mockRedis.quit).toHaveBeenCalled();
    });

    it('returns stored value when Redis key exists (crash recovery)', async () => {
      mockRedis.get.mockResolvedValue('12345');

      expect(await getStoredHistoryId()).toBe('12345');
      expect(mockRedis.quit).toHaveBeenCalled();
    });

    it('closes the connection when the read fails', async () => {
      mockRedis.get.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(getStoredHistoryId()).rejects.toThrow('ECONNREFUSED');
      expect(mockRedis.quit).toHaveBeenCalled();
    });
  });

  // -------------------------------------------------------------------------
  // storeHistoryId
  // -------------------------------------------------------------------------

  describe('storeHistoryId', () => {
    it('writes the historyId to Redis', async () => {
      mockRedis.set.mockResolvedValue('OK');

      await storeHistoryId('67890');

      expect(mockRedis.set).toHaveBeenCalledWith('test:mail:gmail:historyId', '67890');
      expect(mockRedis.quit).toHaveBeenCalled();
    });
  });

  // -------------------------------------------------------------------------
  // startGmailMonitor
  // -------------------------------------------------------------------------

  describe('startGmailMonitor', () => {
    it('calls upsertJobScheduler with correct scheduler config', async () => {
      const { queue, upsertJobScheduler } = mockQueue();

      await startGmailMonitor(queue);

      expect(upsertJobScheduler).toHaveBeenCalledWith(
        'gmail-poll-intake',
        { every: 120000 },
        {
          name: 'poll-intake-inbox',
          data: { source: 'gmail', receivedAt: expect.any(String) },
        },
      );
    });

    it('skips scheduling when intake is disabled', async () => {
      mockIntakeConfig.intakeConfig.enabled = false;
      const { queue, upsertJobScheduler } = mockQueue();

      await startGmailMonitor(queue);

      expect(upsertJobScheduler).not.toHaveBeenCalled();
    });
  });
});
