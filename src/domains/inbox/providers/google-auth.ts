/**
 * @fileoverview Google OAuth2 client built from configured credentials.
 *
 * The consent flow happens elsewhere; this service only holds the
 * resulting refresh token. googleapis refreshes access tokens on demand.
 */

import { google } from 'googleapis';
import config, { isGoogleConfigured } from '../../../config.js';
import { AuthRequiredError } from '../../../utils/errors.js';

export type GoogleAuthClient = InstanceType<typeof google.auth.OAuth2>;

/**
 * @throws AuthRequiredError if any credential is missing
 */
export function getAuthenticatedClient(service: string): GoogleAuthClient {
  const { clientId, clientSecret, redirectUri, refreshToken } = config.google;
  if (!isGoogleConfigured() || !refreshToken) {
    throw new AuthRequiredError(service);
  }

  const oauth2Client = new google.auth.OAuth2(clientId, clientSecret, redirectUri);
  oauth2Client.setCredentials({ refresh_token: refreshToken });
  return oauth2Client;
}

/**
 * Check if an error means the stored grant no longer covers what we asked for.
 */
export function isAuthFailure(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('invalid_grant') ||
    message.includes('insufficient authentication scopes') ||
    message.includes('Insufficient Permission');
}
