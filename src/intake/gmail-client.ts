/**
 * Gmail API Client (readonly)
 *
 * Readonly-scoped client for inbox monitoring, cached per mailbox.
 * Authentication (OAuth2 refresh token or service account with delegation)
 * comes from src/google/auth.ts.
 */

import { google } from 'googleapis';
import { createGoogleAuth } from '../google/auth.js';

export type GmailClient = ReturnType<typeof google.gmail>;

const READONLY_SCOPE = 'https://www.googleapis.com/auth/gmail.readonly';

const clientCache = new Map<string, GmailClient>();

/**
 * Returns an authenticated Gmail API client with readonly scope.
 *
 * @param mailbox - Address of the mailbox to read. In OAuth2 mode the refresh
 *   token decides the mailbox and this only keys the cache.
 */
export function getGmailReadonlyClient(mailbox: string): GmailClient {
  const cached = clientCache.get(mailbox);
  if (cached) return cached;

  const client = google.gmail({ version: 'v1', auth: createGoogleAuth([READONLY_SCOPE], mailbox) });
  clientCache.set(mailbox, client);
  return client;
}
