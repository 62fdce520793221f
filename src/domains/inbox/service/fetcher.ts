/**
 * @fileoverview Fetch orchestrator.
 *
 * Lists recent message ids and fetches each one sequentially with retry and
 * backoff. A single message failing never aborts the batch; a failing listing
 * call yields an empty result.
 */

import { createLogger, safeSnippet } from '../../../utils/observability/index.js';
import { errorMessage } from '../../../utils/errors.js';
import { withRetry } from '../../../utils/retry.js';
import { systemClock, type Clock } from '../../../utils/timing.js';
import type { FetchResult, MailClient, MessageDetail, MessageHeader, RawMessage } from '../types.js';

const log = createLogger({ domain: 'inbox-fetcher' });

export type FetchOptions = {
  /** Primary listing filter */
  query: string;
  maxResults: number;
  /** Cap for the relaxed listing used when the primary filter finds nothing */
  fallbackMaxResults: number;
  /** Upper bound on messages fetched per cycle */
  maxProcessed: number;
  maxAttempts: number;
  backoffBaseMs: number;
  /** Pause between successful detail fetches */
  fetchDelayMs: number;
  clock?: Clock;
};

export const DEFAULT_FETCH_OPTIONS: Omit<FetchOptions, 'clock'> = {
  query: 'newer_than:3d',
  maxResults: 20,
  fallbackMaxResults: 10,
  maxProcessed: 15,
  maxAttempts: 3,
  backoffBaseMs: 1000,
  fetchDelayMs: 100,
};

/**
 * First header with a matching name wins; names compare case-insensitively.
 */
export function getHeader(headers: MessageHeader[], name: string, fallback: string): string {
  const wanted = name.toLowerCase();
  const header = headers.find((h) => h.name?.toLowerCase() === wanted);
  return header?.value ?? fallback;
}

async function listCandidateIds(client: MailClient, options: FetchOptions): Promise<string[]> {
  const ids = await client.list(options.maxResults, options.query);
  log.info('messages_listed', { count: ids.length, query: options.query });
  if (ids.length > 0) return ids;

  const relaxed = await client.list(options.fallbackMaxResults);
  log.info('messages_listed_relaxed', { count: relaxed.length });
  return relaxed;
}

/**
 * Fetch one message with retries. Resolves null once every attempt failed.
 */
async function fetchDetail(
  client: MailClient,
  messageId: string,
  options: FetchOptions,
  clock: Clock
): Promise<MessageDetail | null> {
  try {
    return await withRetry(() => client.get(messageId), {
      operation: 'message_get',
      maxAttempts: options.maxAttempts,
      backoffBaseMs: options.backoffBaseMs,
      clock,
      log,
      logData: { messageId },
    });
  } catch (error) {
    log.error('message_fetch_failed', {
      messageId,
      attempts: options.maxAttempts,
      error: errorMessage(error),
    });
    return null;
  }
}

/**
 * Fetch up to `maxProcessed` recent messages.
 */
export async function fetchRecentMessages(
  client: MailClient,
  overrides: Partial<FetchOptions> = {}
): Promise<FetchResult> {
  const options: FetchOptions = { ...DEFAULT_FETCH_OPTIONS, ...overrides };
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();

  let ids: string[];
  try {
    ids = await listCandidateIds(client, options);
  } catch (error) {
    log.error('message_list_failed', { error: errorMessage(error) });
    return { messages: [], listedCount: 0, errorCount: 0, durationMs: clock.now() - startedAt };
  }

  const candidates = ids.slice(0, options.maxProcessed);
  const messages: RawMessage[] = [];
  let errorCount = 0;

  for (let i = 0; i < candidates.length; i++) {
    const messageId = candidates[i];
    const detail = await fetchDetail(client, messageId, options, clock);
    if (!detail) {
      errorCount += 1;
      continue;
    }

    const subject = getHeader(detail.headers, 'Subject', 'No Subject');
    messages.push({
      id: messageId,
      sender: getHeader(detail.headers, 'From', 'Unknown'),
      subject,
      date: getHeader(detail.headers, 'Date', ''),
      rawBody: detail.body,
    });
    log.debug('message_fetched', {
      messageId,
      position: i + 1,
      total: candidates.length,
      subject: safeSnippet(subject),
    });

    if (i < candidates.length - 1) {
      await clock.sleep(options.fetchDelayMs);
    }
  }

  const durationMs = clock.now() - startedAt;
  log.info('fetch_completed', {
    listed: ids.length,
    processed: messages.length,
    errors: errorCount,
    durationMs,
  });

  return { messages, listedCount: ids.length, errorCount, durationMs };
}
