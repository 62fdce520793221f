/**
 * @fileoverview Per-message and inbox-wide summaries.
 *
 * Generated summaries go through the shared min-interval limiter and are
 * cached by message id. Any failure, including rate-limit and quota
 * rejections, falls back to the deterministic templates. Callers always get
 * text back.
 */

import { createLogger } from '../../../utils/observability/index.js';
import { errorMessage, isRateLimitError } from '../../../utils/errors.js';
import type { ClassifiedMessage } from '../../inbox/types.js';
import type { GenerationOptions, InboxBrief, SummarizableMessage, TextGenerator } from '../types.js';
import { SummaryCache } from './cache.js';
import { composeBrief, countBrief, EMPTY_INBOX_SUMMARY, fallbackMessageSummary } from './fallback.js';
import { hasAllBriefSections } from './format.js';
import {
  BRIEF_OPTIONS,
  buildBriefPrompt,
  buildMessageSummaryPrompt,
  MESSAGE_SUMMARY_OPTIONS,
} from './prompts.js';
import type { MinIntervalLimiter } from './rate-limiter.js';

const log = createLogger({ domain: 'summarizer' });

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export class Summarizer {
  private readonly pending = new Map<string, Promise<string>>();
  /** Bumped by clearCache so work started before a clear is not stored. */
  private cacheGeneration = 0;

  constructor(
    private readonly generator: TextGenerator | null,
    private readonly limiter: MinIntervalLimiter,
    private readonly cache: SummaryCache = new SummaryCache()
  ) {}

  isAiConfigured(): boolean {
    return this.generator !== null;
  }

  /**
   * Summary for one message. A cached summary is returned as-is without
   * waiting on the limiter.
   */
  async summarize(message: SummarizableMessage): Promise<string> {
    const cached = this.cache.get(message.id);
    if (cached !== undefined) {
      log.debug('summary_cache_hit', { messageId: message.id });
      return cached;
    }

    const inFlight = this.pending.get(message.id);
    if (inFlight) return inFlight;

    const generation = this.cacheGeneration;
    const work = this.produceSummary(message).then((summary) => {
      if (generation === this.cacheGeneration) {
        this.cache.set(message.id, summary);
      } else {
        log.debug('summary_cache_skipped', { messageId: message.id, reason: 'cleared_during_generation' });
      }
      return summary;
    });
    this.pending.set(message.id, work);
    try {
      return await work;
    } finally {
      this.pending.delete(message.id);
    }
  }

  /**
   * Executive brief over the ranked list. The generated brief is only used
   * when it carries every expected section heading.
   */
  async summarizeInbox(messages: readonly ClassifiedMessage[]): Promise<InboxBrief> {
    const counts = countBrief(messages);

    if (messages.length === 0) {
      return { text: EMPTY_INBOX_SUMMARY, generatedWithAi: false, ...counts };
    }

    if (this.generator) {
      try {
        const text = await this.callGenerator(buildBriefPrompt(messages), BRIEF_OPTIONS);
        if (hasAllBriefSections(text)) {
          log.info('brief_generated', { totalEmails: counts.totalEmails, words: wordCount(text) });
          return { text, generatedWithAi: true, ...counts };
        }
        log.warn('brief_missing_sections', { words: wordCount(text) });
      } catch (error) {
        this.logGenerationFailure('brief', error);
      }
    }

    return { text: composeBrief(messages), generatedWithAi: false, ...counts };
  }

  clearCache(): void {
    const cleared = this.cache.size;
    this.cacheGeneration++;
    this.cache.clear();
    log.info('summary_cache_cleared', { cleared });
  }

  cachedCount(): number {
    return this.cache.size;
  }

  /** Issue time of the most recent generative call, or null before the first. */
  lastGenerationAt(): Date | null {
    const lastCallAt = this.limiter.getLastCallAt();
    return lastCallAt === null ? null : new Date(lastCallAt);
  }

  resetRateLimit(): void {
    this.limiter.reset();
  }

  private async produceSummary(message: SummarizableMessage): Promise<string> {
    if (!this.generator) {
      log.debug('summary_fallback', { messageId: message.id, reason: 'not_configured' });
      return fallbackMessageSummary(message);
    }

    try {
      const text = await this.callGenerator(buildMessageSummaryPrompt(message), MESSAGE_SUMMARY_OPTIONS);
      log.info('summary_generated', { messageId: message.id, words: wordCount(text) });
      return text;
    } catch (error) {
      this.logGenerationFailure('message', error, { messageId: message.id });
      return fallbackMessageSummary(message);
    }
  }

  private async callGenerator(
    prompt: string,
    options: GenerationOptions
  ): Promise<string> {
    if (!this.generator) {
      throw new Error('No text generator configured');
    }

    const waitedMs = await this.limiter.acquire();
    if (waitedMs > 0) {
      log.debug('generation_throttled', { waitedMs });
    }

    const text = (await this.generator.generate(prompt, options)).trim();
    if (!text) {
      throw new Error('Generator returned an empty response');
    }
    return text;
  }

  private logGenerationFailure(kind: 'message' | 'brief', error: unknown, data: Record<string, unknown> = {}): void {
    if (isRateLimitError(error)) {
      log.warn('generation_rate_limited', { ...data, kind, error: errorMessage(error) });
      return;
    }
    log.error('generation_failed', { ...data, kind, error: errorMessage(error) });
  }
}
