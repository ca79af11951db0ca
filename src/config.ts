/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the pipeline infrastructure
 * (Redis, HTTP server, queues, document store). Module-specific settings
 * live next to their module (intake/config.ts, ocr/config.ts, ...).
 *
 * Environment variables:
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to stop accepting and processing intakes
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - PORT: HTTP server port (default 3000)
 * - STORE_KEY_PREFIX: Namespace for document store keys (default 'docpipe')
 * - QUEUE_ATTEMPTS / QUEUE_BACKOFF_MS: Redelivery budget before dead-letter
 * - WORKER_CONCURRENCY: Jobs processed in parallel per stage worker
 */

import 'dotenv/config';
import { z } from 'zod';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  server: {
    port: number;
  };
  store: {
    keyPrefix: string;
  };
  queue: {
    attempts: number;
    backoffMs: number;
    concurrency: number;
  };
}

export function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

export function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

const positiveInt = z.coerce.number().int().positive();

/**
 * Reads a positive integer setting. Throws at load time when the variable is
 * set to anything else, so a typo cannot turn into a NaN limit.
 */
export function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = positiveInt.safeParse(raw.trim());
  if (!parsed.success) {
    throw new Error(`Invalid environment variable ${key}: expected a positive integer, got "${raw}"`);
  }
  return parsed.data;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  redis: {
    url: process.env.REDIS_URL || undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },
  server: {
    port: intEnv('PORT', 3000),
  },
  store: {
    keyPrefix: optionalEnv('STORE_KEY_PREFIX', 'docpipe'),
  },
  queue: {
    attempts: intEnv('QUEUE_ATTEMPTS', 5),
    backoffMs: intEnv('QUEUE_BACKOFF_MS', 5000),
    concurrency: intEnv('WORKER_CONCURRENCY', 2),
  },
};
