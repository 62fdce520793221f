/**
 * @fileoverview Polling abstraction for background jobs.
 *
 * Runs a job immediately and then on a fixed interval, never letting two
 * runs overlap.
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'poller' });

/**
 * Interface for job polling implementations.
 */
export interface Poller {
  /** Start the polling loop */
  start(): void;
  /** Stop the polling loop and wait for any in-flight operation to complete */
  stop(): Promise<void>;
  /** Check if the poller is running */
  isRunning(): boolean;
}

/**
 * Create an interval-based poller.
 *
 * @param runJob - Function to call on each interval
 * @param intervalMs - Polling interval in milliseconds (default: 60000 = 1 minute)
 * @param name - Label used in log lines
 */
export function createIntervalPoller(
  runJob: () => Promise<void>,
  intervalMs: number = 60000,
  name: string = 'poller'
): Poller {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  return {
    start(): void {
      if (intervalId !== null) {
        log.info('poller_already_running', { poller: name });
        return;
      }

      log.info('poller_started', { poller: name, intervalMs });

      // Run immediately on start, then on interval
      void runJobSafe();

      intervalId = setInterval(() => {
        void runJobSafe();
      }, intervalMs);
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }

      clearInterval(intervalId);
      intervalId = null;

      if (inFlight) {
        await inFlight;
      }

      log.info('poller_stopped', { poller: name });
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };

  /**
   * Wrapper to prevent overlapping executions and catch errors.
   */
  async function runJobSafe(): Promise<void> {
    if (inFlight) {
      log.debug('poller_skip_overlap', { poller: name });
      return;
    }

    inFlight = (async () => {
      try {
        await runJob();
      } catch (error) {
        log.error('poller_error', {
          poller: name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    })();

    try {
      await inFlight;
    } finally {
      inFlight = null;
    }
  }
}
