/**
 * Google API Authentication
 *
 * Supports two authentication modes:
 * 1. OAuth2 refresh token (dev) — GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN
 * 2. Service account with domain-wide delegation (production) — GOOGLE_SERVICE_ACCOUNT_KEY
 *
 * OAuth2 is checked first (preferred for dev), then service account.
 * Shared by the Gmail reader (intake) and the Drive blob store.
 */

import { JWT, OAuth2Client } from 'google-auth-library';
import { z } from 'zod';

const ServiceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export class GoogleAuthError extends Error {
  readonly code: string;

  constructor(message: string, code: string = 'GOOGLE_AUTH_ERROR') {
    super(message);
    this.name = 'GoogleAuthError';
    this.code = code;
  }
}

function createOAuth2Auth(): OAuth2Client {
  const clientId = process.env.GOOGLE_CLIENT_ID;
  const clientSecret = process.env.GOOGLE_CLIENT_SECRET;
  const refreshToken = process.env.GOOGLE_REFRESH_TOKEN;

  if (!clientId || !clientSecret || !refreshToken) {
    throw new GoogleAuthError(
      'OAuth2 credentials incomplete. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET, and GOOGLE_REFRESH_TOKEN.',
      'GOOGLE_AUTH_MISSING_OAUTH',
    );
  }

  const oauth2Client = new OAuth2Client(clientId, clientSecret);
  oauth2Client.setCredentials({ refresh_token: refreshToken });
  return oauth2Client;
}

/**
 * Loads and validates the service account key from GOOGLE_SERVICE_ACCOUNT_KEY
 * (base64-encoded JSON key file).
 */
export function loadServiceAccountKey(): z.infer<typeof ServiceAccountKeySchema> {
  const encoded = process.env.GOOGLE_SERVICE_ACCOUNT_KEY;
  if (!encoded) {
    throw new GoogleAuthError(
      'No Google credentials found. Set either:\n' +
        '  - GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN (OAuth2), or\n' +
        '  - GOOGLE_SERVICE_ACCOUNT_KEY (service account with domain-wide delegation)',
      'GOOGLE_AUTH_MISSING_KEY',
    );
  }

  try {
    const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
    const parsed = ServiceAccountKeySchema.safeParse(JSON.parse(decoded));

    if (!parsed.success) {
      throw new Error('Missing client_email or private_key fields');
    }

    return parsed.data;
  } catch (err) {
    throw new GoogleAuthError(
      `GOOGLE_SERVICE_ACCOUNT_KEY is malformed: ${err instanceof Error ? err.message : String(err)}. ` +
        'Ensure it is a base64-encoded JSON service account key file.',
      'GOOGLE_AUTH_INVALID_KEY',
    );
  }
}

/**
 * Creates credentials for the given scopes.
 *
 * @param impersonateAs - Mailbox/user the service account acts as. Ignored in
 *   OAuth2 mode, where the refresh token determines the user.
 */
export function createGoogleAuth(scopes: string[], impersonateAs: string): OAuth2Client | JWT {
  if (process.env.GOOGLE_REFRESH_TOKEN) {
    return createOAuth2Auth();
  }

  const key = loadServiceAccountKey();
  return new JWT({
    email: key.client_email,
    key: key.private_key,
    scopes,
    subject: impersonateAs,
  });
}
