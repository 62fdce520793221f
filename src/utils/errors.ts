/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - safeExecute: Returns result objects instead of throwing
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Thrown when Google credentials are missing or were rejected.
 */
export class AuthRequiredError extends AppError {
  constructor(service: string) {
    super(`Google authentication required for ${service}`, 'AUTH_REQUIRED', false, { service });
    this.name = 'AuthRequiredError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Extract a printable message from anything that was thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const RATE_LIMIT_MARKERS = ['rate limit', 'rate_limit', 'too many requests', 'quota'];

/**
 * Detect rate-limit or quota rejections from a generative-text backend.
 * Providers only expose these through the error text.
 */
export function isRateLimitError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => message.includes(marker));
}

/**
 * Execute an async function and return a Result object.
 * Use for operations where the caller wants to handle failure without exceptions.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string
): Promise<Result<T>> {
  try {
    const data = await fn();
    return { success: true, data };
  } catch (error) {
    log.error('operation_failed', { operation: context, error: errorMessage(error) });
    return {
      success: false,
      error: errorMessage(error),
    };
  }
}
