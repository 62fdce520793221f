/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the service requires.
 *
 * @see .env.example for the full list of variables
 */

import 'dotenv/config';
import { IANAZone } from 'luxon';

// ---------------------------------------------------------------------------
// Config helpers: required vs optional intent
// ---------------------------------------------------------------------------

/** Read an env var that is only required together with others (checked by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key] || undefined;
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return defaultValue;
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),

  /** Google OAuth client plus a refresh token issued out of band */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
    redirectUri: optional('GOOGLE_REDIRECT_URI', 'http://localhost:3000/auth/google/callback'),
    refreshToken: required('GOOGLE_REFRESH_TOKEN'),
  },

  /** Gemini summaries; absent key selects the deterministic summaries */
  gemini: {
    apiKey: process.env.GEMINI_API_KEY,
    model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
  },

  /** Fetch cycle tuning */
  inbox: {
    query: optional('INBOX_QUERY', 'newer_than:3d'),
    maxResults: optionalInt('INBOX_MAX_RESULTS', 20),
    fallbackMaxResults: optionalInt('INBOX_FALLBACK_MAX_RESULTS', 10),
    maxProcessed: optionalInt('INBOX_MAX_PROCESSED', 15),
    maxAttempts: optionalInt('INBOX_MAX_ATTEMPTS', 3),
    backoffBaseMs: optionalInt('INBOX_BACKOFF_BASE_MS', 1000),
    fetchDelayMs: optionalInt('INBOX_FETCH_DELAY_MS', 100),
    refreshEnabled: optionalBool('INBOX_REFRESH_ENABLED', true),
    refreshIntervalMs: optionalInt('INBOX_REFRESH_INTERVAL_MS', 300000),
  },

  summary: {
    minIntervalMs: optionalInt('SUMMARY_MIN_INTERVAL_MS', 1000),
  },

  calendar: {
    timeZone: optional('CALENDAR_TIMEZONE', 'America/New_York'),
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Google credentials are optional as a group, but partial sets are a mistake
  const googleKeys = [
    ['GOOGLE_CLIENT_ID', config.google.clientId],
    ['GOOGLE_CLIENT_SECRET', config.google.clientSecret],
    ['GOOGLE_REFRESH_TOKEN', config.google.refreshToken],
  ] as const;
  const presentGoogleKeys = googleKeys.filter(([, value]) => Boolean(value));
  if (presentGoogleKeys.length > 0 && presentGoogleKeys.length < googleKeys.length) {
    for (const [key, value] of googleKeys) {
      if (!value) errors.push(`${key} is required when Google access is configured`);
    }
  }

  // Numeric bounds
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!(config.inbox.maxResults >= 1 && config.inbox.maxResults <= 500)) {
    errors.push(`INBOX_MAX_RESULTS must be 1-500, got ${config.inbox.maxResults}`);
  }
  if (!(config.inbox.fallbackMaxResults >= 1 && config.inbox.fallbackMaxResults <= 500)) {
    errors.push(`INBOX_FALLBACK_MAX_RESULTS must be 1-500, got ${config.inbox.fallbackMaxResults}`);
  }
  if (!(config.inbox.maxProcessed >= 1)) {
    errors.push(`INBOX_MAX_PROCESSED must be >= 1, got ${config.inbox.maxProcessed}`);
  }
  if (!(config.inbox.maxAttempts >= 1 && config.inbox.maxAttempts <= 10)) {
    errors.push(`INBOX_MAX_ATTEMPTS must be 1-10, got ${config.inbox.maxAttempts}`);
  }
  if (!(config.inbox.backoffBaseMs >= 0)) {
    errors.push(`INBOX_BACKOFF_BASE_MS must be >= 0, got ${config.inbox.backoffBaseMs}`);
  }
  if (!(config.inbox.fetchDelayMs >= 0)) {
    errors.push(`INBOX_FETCH_DELAY_MS must be >= 0, got ${config.inbox.fetchDelayMs}`);
  }
  if (!(config.inbox.refreshIntervalMs >= 10000)) {
    errors.push(`INBOX_REFRESH_INTERVAL_MS must be >= 10000, got ${config.inbox.refreshIntervalMs}`);
  }
  if (!(config.summary.minIntervalMs >= 0)) {
    errors.push(`SUMMARY_MIN_INTERVAL_MS must be >= 0, got ${config.summary.minIntervalMs}`);
  }

  if (!IANAZone.isValidZone(config.calendar.timeZone)) {
    errors.push(`CALENDAR_TIMEZONE must be an IANA zone, got ${config.calendar.timeZone}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

/** True when all Google credentials needed to reach Gmail and Calendar are present. */
export function isGoogleConfigured(): boolean {
  return Boolean(config.google.clientId && config.google.clientSecret && config.google.refreshToken);
}

export default config;
