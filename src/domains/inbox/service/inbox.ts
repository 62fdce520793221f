/**
 * @fileoverview Inbox coordinator.
 *
 * Owns the classified snapshot. Only `refresh()` replaces it, and only after
 * a fetch cycle has been fully ranked. Readers always see a complete list.
 */

import { createLogger, createRunId, withLogContext } from '../../../utils/observability/index.js';
import { errorMessage } from '../../../utils/errors.js';
import type { Summarizer } from '../../summary/service/summarizer.js';
import type { InboxBrief } from '../../summary/types.js';
import type {
  CalendarWriter,
  Classification,
  ClassifiedMessage,
  FetchResult,
  MailClient,
} from '../types.js';
import { buildCalendarEvent } from './calendar-event.js';
import { classify } from './classifier.js';
import { fetchRecentMessages, type FetchOptions } from './fetcher.js';
import { rankMessages } from './ranking.js';
import { hasTasks } from './task-detector.js';

const log = createLogger({ domain: 'inbox' });

export type InboxServiceOptions = {
  /** null when Gmail credentials are absent */
  mailClient: MailClient | null;
  summarizer: Summarizer;
  /** null when Calendar credentials are absent */
  calendar: CalendarWriter | null;
  fetchOptions?: Partial<FetchOptions>;
  timeZone: string;
  now?: () => Date;
};

export type InboxStatus = {
  gmailConnected: boolean;
  aiConfigured: boolean;
  calendarConfigured: boolean;
  emailCount: number;
  lastRefreshAt: string | null;
  refreshing: boolean;
  cachedSummaries: number;
  lastGenerationAt: string | null;
};

export type TextClassification = Classification & { hasTasks: boolean };

export type CalendarAddOutcome = 'created' | 'not_found' | 'failed' | 'not_configured';

export type ClassifyInput = {
  sender: string;
  subject: string;
  content: string;
};

export const IMPORTANT_LIMIT = 20;

const EMPTY_FETCH: FetchResult = {
  messages: [],
  listedCount: 0,
  errorCount: 0,
  durationMs: 0,
};

export class InboxService {
  private snapshot: readonly ClassifiedMessage[] = [];
  private lastRefreshAt: Date | null = null;
  private inFlight: Promise<FetchResult> | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: InboxServiceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one fetch cycle and publish the ranked result. Callers arriving while
   * a cycle is running share its outcome.
   */
  refresh(): Promise<FetchResult> {
    if (this.inFlight) {
      log.debug('refresh_joined');
      return this.inFlight;
    }

    const mailClient = this.options.mailClient;
    if (!mailClient) {
      log.debug('refresh_skipped', { reason: 'gmail_not_connected' });
      return Promise.resolve(EMPTY_FETCH);
    }

    const cycle = withLogContext({ runId: createRunId('fetch') }, () => this.runCycle(mailClient));
    this.inFlight = cycle;
    return cycle.finally(() => {
      this.inFlight = null;
    });
  }

  getMessages(): readonly ClassifiedMessage[] {
    return this.snapshot;
  }

  getMessage(id: string): ClassifiedMessage | undefined {
    return this.snapshot.find((message) => message.id === id);
  }

  hasRefreshed(): boolean {
    return this.lastRefreshAt !== null;
  }

  isAiConfigured(): boolean {
    return this.options.summarizer.isAiConfigured();
  }

  getStatus(): InboxStatus {
    return {
      gmailConnected: this.options.mailClient !== null,
      aiConfigured: this.options.summarizer.isAiConfigured(),
      calendarConfigured: this.options.calendar !== null,
      emailCount: this.snapshot.length,
      lastRefreshAt: this.lastRefreshAt?.toISOString() ?? null,
      refreshing: this.inFlight !== null,
      cachedSummaries: this.options.summarizer.cachedCount(),
      lastGenerationAt: this.options.summarizer.lastGenerationAt()?.toISOString() ?? null,
    };
  }

  /** Important messages by descending score; equal scores keep snapshot order. */
  getImportantMessages(limit: number = IMPORTANT_LIMIT): ClassifiedMessage[] {
    return this.snapshot
      .filter((message) => message.isImportant)
      .sort((a, b) => b.priorityScore - a.priorityScore)
      .slice(0, limit);
  }

  /** Summary for a message in the snapshot, or null when the id is unknown. */
  async summarizeMessage(id: string): Promise<string | null> {
    const message = this.getMessage(id);
    if (!message) return null;
    return this.options.summarizer.summarize(message);
  }

  summarizeInbox(): Promise<InboxBrief> {
    return this.options.summarizer.summarizeInbox(this.snapshot);
  }

  clearSummaryCache(): void {
    this.options.summarizer.clearCache();
  }

  async addToCalendar(id: string): Promise<CalendarAddOutcome> {
    const calendar = this.options.calendar;
    if (!calendar) return 'not_configured';

    const message = this.getMessage(id);
    if (!message) return 'not_found';

    try {
      const event = buildCalendarEvent(message, this.now(), this.options.timeZone);
      const created = await calendar.createEvent(event);
      log.info('calendar_add_completed', { messageId: id, created });
      return created ? 'created' : 'failed';
    } catch (error) {
      log.error('calendar_add_failed', { messageId: id, error: errorMessage(error) });
      return 'failed';
    }
  }

  classifyText(input: ClassifyInput): TextClassification {
    return {
      ...classify(input.sender, input.subject, input.content),
      hasTasks: hasTasks(input.content),
    };
  }

  private async runCycle(mailClient: MailClient): Promise<FetchResult> {
    log.info('refresh_started');
    const result = await fetchRecentMessages(mailClient, this.options.fetchOptions ?? {});
    const ranked = rankMessages(result.messages);

    this.snapshot = ranked;
    this.lastRefreshAt = this.now();

    log.info('refresh_completed', {
      fetched: ranked.length,
      errors: result.errorCount,
      withTasks: ranked.filter((message) => message.hasTasks).length,
      durationMs: result.durationMs,
    });
    return result;
  }
}
