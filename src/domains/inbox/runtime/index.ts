/**
 * @fileoverview Background inbox refresh lifecycle.
 *
 * Re-runs the fetch cycle on the configured interval through the shared
 * createIntervalPoller() abstraction.
 */

import config from '../../../config.js';
import { createIntervalPoller, type Poller } from '../../../utils/poller.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { InboxService } from '../service/inbox.js';

export { InboxService } from '../service/inbox.js';
export type * from '../types.js';

let poller: Poller | null = null;
const log = createLogger({ domain: 'inbox-runtime' });

export type InboxWatcherOptions = {
  enabled: boolean;
  intervalMs: number;
};

/**
 * Start refreshing the inbox in the background. The first cycle runs
 * immediately.
 */
export function startInboxWatcher(
  service: InboxService,
  options: InboxWatcherOptions = {
    enabled: config.inbox.refreshEnabled,
    intervalMs: config.inbox.refreshIntervalMs,
  }
): void {
  if (!options.enabled) {
    log.info('watcher_disabled');
    return;
  }

  if (poller) {
    log.info('watcher_already_running');
    return;
  }

  poller = createIntervalPoller(async () => {
    const result = await service.refresh();
    log.debug('watcher_cycle_completed', {
      fetched: result.messages.length,
      errors: result.errorCount,
    });
  }, options.intervalMs, 'inbox-watcher');

  poller.start();
  log.info('watcher_started', { intervalMs: options.intervalMs });
}

/**
 * Stop the background refresh, waiting for an in-flight cycle to finish.
 */
export async function stopInboxWatcher(): Promise<void> {
  if (poller) {
    await poller.stop();
    poller = null;
    log.info('watcher_stopped');
  }
}

export function isInboxWatcherRunning(): boolean {
  return poller?.isRunning() ?? false;
}
