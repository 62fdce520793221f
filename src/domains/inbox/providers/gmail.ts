/**
 * @fileoverview Gmail mail client.
 *
 * Implements the inbox domain's MailClient on top of the Gmail REST API.
 */

import { google, gmail_v1 } from 'googleapis';
import { createLogger } from '../../../utils/observability/index.js';
import { AuthRequiredError, errorMessage } from '../../../utils/errors.js';
import type { MailClient, MessageDetail } from '../types.js';
import { getAuthenticatedClient, isAuthFailure, type GoogleAuthClient } from './google-auth.js';

const log = createLogger({ domain: 'gmail' });

export class GmailMailClient implements MailClient {
  private readonly gmail: gmail_v1.Gmail;

  constructor(auth: GoogleAuthClient) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  async list(maxResults: number, query?: string): Promise<string[]> {
    try {
      const response = await this.gmail.users.messages.list({
        userId: 'me',
        maxResults,
        q: query,
      });
      const messages = response.data.messages ?? [];
      return messages.flatMap((message) => (message.id ? [message.id] : []));
    } catch (error) {
      throw this.translateError(error);
    }
  }

  async get(messageId: string): Promise<MessageDetail> {
    try {
      const response = await this.gmail.users.messages.get({
        userId: 'me',
        id: messageId,
        format: 'full',
      });
      const payload = response.data.payload ?? {};
      return {
        headers: payload.headers ?? [],
        body: payload,
      };
    } catch (error) {
      throw this.translateError(error);
    }
  }

  private translateError(error: unknown): unknown {
    if (isAuthFailure(error)) {
      log.warn('gmail_auth_rejected', { error: errorMessage(error) });
      return new AuthRequiredError('gmail');
    }
    return error;
  }
}

/** Gmail client from configured credentials. */
export function createGmailClient(): GmailMailClient {
  return new GmailMailClient(getAuthenticatedClient('gmail'));
}
