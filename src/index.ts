/**
 * @fileoverview Express server entry point for the inbox triage service.
 *
 * Validates configuration, wires the Google and Gemini adapters into the
 * inbox coordinator, starts the background refresh and serves the HTTP API.
 */

import config, { isGoogleConfigured, validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();
import { createApp } from './app.js';
import { createCalendarWriter } from './domains/inbox/providers/google-calendar.js';
import { createGmailClient } from './domains/inbox/providers/gmail.js';
import { InboxService, startInboxWatcher, stopInboxWatcher } from './domains/inbox/runtime/index.js';
import { createGeminiGenerator } from './domains/summary/providers/gemini.js';
import { MinIntervalLimiter } from './domains/summary/service/rate-limiter.js';
import { Summarizer } from './domains/summary/service/summarizer.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const log = createLogger({ domain: 'server' });

const googleConfigured = isGoogleConfigured();
if (!googleConfigured) {
  log.warn('google_not_configured', {
    hint: 'Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN to read Gmail',
  });
}

const summarizer = new Summarizer(
  createGeminiGenerator(config.gemini.apiKey, config.gemini.model),
  new MinIntervalLimiter(config.summary.minIntervalMs)
);

const service = new InboxService({
  mailClient: googleConfigured ? createGmailClient() : null,
  calendar: googleConfigured ? createCalendarWriter() : null,
  summarizer,
  fetchOptions: {
    query: config.inbox.query,
    maxResults: config.inbox.maxResults,
    fallbackMaxResults: config.inbox.fallbackMaxResults,
    maxProcessed: config.inbox.maxProcessed,
    maxAttempts: config.inbox.maxAttempts,
    backoffBaseMs: config.inbox.backoffBaseMs,
    fetchDelayMs: config.inbox.fetchDelayMs,
  },
  timeZone: config.calendar.timeZone,
});

const app = createApp({ service, timeZone: config.calendar.timeZone });

const server = app.listen(config.port, () => {
  log.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    gmailConnected: googleConfigured,
    aiConfigured: summarizer.isAiConfigured(),
  });

  // Start background refresh after the server is ready
  startInboxWatcher(service);
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string) {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  // Stop background refresh first, waiting for an in-flight cycle
  await stopInboxWatcher();

  const forceExitTimer = setTimeout(() => {
    log.warn('shutdown_forced', { timeoutMs: 10000 });
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    log.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
