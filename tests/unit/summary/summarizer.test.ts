/**
 * Unit tests for the summarizer: caching, throttling and fallbacks.
 */

import { describe, expect, it } from 'vitest';
import { SummaryCache } from '../../../src/domains/summary/service/cache.js';
import { MinIntervalLimiter } from '../../../src/domains/summary/service/rate-limiter.js';
import { Summarizer } from '../../../src/domains/summary/service/summarizer.js';
import { BRIEF_OPTIONS, MESSAGE_SUMMARY_OPTIONS } from '../../../src/domains/summary/service/prompts.js';
import type { TextGenerator } from '../../../src/domains/summary/types.js';
import { classifiedMessage, FakeClock, FakeGenerator } from '../../helpers/fakes.js';

const message = classifiedMessage({
  id: 'm1',
  sender: 'Alice Smith <alice@example.com>',
  subject: 'Quarterly Review',
  body: 'Please review the attached report before Friday.',
});

const FALLBACK =
  'This email from Alice Smith is about quarterly review. Based on the content, it appears to require some action or response from you. The email discusses Please review the attached report before Friday.';

const COMPLETE_BRIEF = [
  '**Executive Overview**: Busy week.',
  '**Priority Actions**: Reply to Alice.',
  '**Key Themes**: Reviews.',
  '**Task Summary**: One report due.',
  '**Sender Analysis**: Mostly Alice.',
].join('\n');

function setup(generator: TextGenerator | null) {
  const clock = new FakeClock();
  const cache = new SummaryCache();
  const summarizer = new Summarizer(generator, new MinIntervalLimiter(1000, clock), cache);
  return { clock, cache, summarizer };
}

describe('Summarizer.summarize', () => {
  it('uses the deterministic summary without a generator and caches it', async () => {
    const { cache, summarizer } = setup(null);

    expect(summarizer.isAiConfigured()).toBe(false);
    expect(await summarizer.summarize(message)).toBe(FALLBACK);
    expect(cache.get('m1')).toBe(FALLBACK);
  });

  it('returns trimmed generated text with the message sampling settings', async () => {
    const generator = new FakeGenerator().enqueue('  Alice wants the report reviewed by Friday.  ');
    const { summarizer } = setup(generator);

    expect(await summarizer.summarize(message)).toBe('Alice wants the report reviewed by Friday.');
    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0].options).toEqual(MESSAGE_SUMMARY_OPTIONS);
    expect(generator.calls[0].prompt).toContain('Subject: Quarterly Review');
  });

  it('serves repeat requests from the cache without waiting', async () => {
    const generator = new FakeGenerator('Cached summary.');
    const { clock, summarizer } = setup(generator);

    await summarizer.summarize(message);
    const again = await summarizer.summarize(message);

    expect(again).toBe('Cached summary.');
    expect(generator.calls).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('issues a single generator call for concurrent requests', async () => {
    const generator = new FakeGenerator('Shared summary.');
    const { summarizer } = setup(generator);

    const results = await Promise.all([summarizer.summarize(message), summarizer.summarize(message)]);

    expect(results).toEqual(['Shared summary.', 'Shared summary.']);
    expect(generator.calls).toHaveLength(1);
  });

  it('falls back on a rate-limit rejection and caches the fallback', async () => {
    const generator = new FakeGenerator().enqueue(new Error('429 Too Many Requests: quota exceeded'));
    const { summarizer } = setup(generator);

    expect(await summarizer.summarize(message)).toBe(FALLBACK);
    expect(await summarizer.summarize(message)).toBe(FALLBACK);
    expect(generator.calls).toHaveLength(1);
  });

  it('falls back on an empty response', async () => {
    const generator = new FakeGenerator().enqueue('   ');
    const { summarizer } = setup(generator);

    expect(await summarizer.summarize(message)).toBe(FALLBACK);
  });

  it('spaces generator calls by the minimum interval', async () => {
    const generator = new FakeGenerator('Summary.');
    const { clock, summarizer } = setup(generator);

    await summarizer.summarize(message);
    await summarizer.summarize({ ...message, id: 'm2' });

    expect(generator.calls).toHaveLength(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('skips the wait after the rate limit is reset', async () => {
    const generator = new FakeGenerator('Summary.');
    const { clock, summarizer } = setup(generator);

    await summarizer.summarize(message);
    summarizer.resetRateLimit();
    await summarizer.summarize({ ...message, id: 'm2' });

    expect(clock.sleeps).toEqual([]);
  });

  it('regenerates after the cache is cleared', async () => {
    const generator = new FakeGenerator().enqueue('First.', 'Second.');
    const { summarizer } = setup(generator);

    expect(await summarizer.summarize(message)).toBe('First.');
    summarizer.clearCache();
    expect(await summarizer.summarize(message)).toBe('Second.');
  });
});

describe('Summarizer cache state', () => {
  it('does not store a summary whose generation started before a clear', async () => {
    let release: (text: string) => void = () => undefined;
    const generator: TextGenerator = {
      generate: () => new Promise<string>((resolve) => {
        release = resolve;
      }),
    };
    const { cache, summarizer } = setup(generator);

    const pending = summarizer.summarize(message);
    await new Promise((resolve) => setImmediate(resolve));
    summarizer.clearCache();
    release('Late summary.');

    expect(await pending).toBe('Late summary.');
    expect(cache.size).toBe(0);
    expect(summarizer.cachedCount()).toBe(0);
  });

  it('reports the cached count and the last generation time', async () => {
    const { summarizer } = setup(new FakeGenerator('Summary.'));

    expect(summarizer.lastGenerationAt()).toBeNull();
    await summarizer.summarize(message);

    expect(summarizer.cachedCount()).toBe(1);
    expect(summarizer.lastGenerationAt()?.toISOString()).toBe('2023-11-14T22:13:20.000Z');
  });
});

describe('Summarizer.summarizeInbox', () => {
  const messages = [
    message,
    classifiedMessage({ id: 'm2', sender: 'bob@example.com', priorityScore: 0.9, hasTasks: true, isImportant: true }),
  ];

  it('reports an empty inbox without calling the generator', async () => {
    const generator = new FakeGenerator();
    const { summarizer } = setup(generator);

    expect(await summarizer.summarizeInbox([])).toEqual({
      text: 'No emails to summarize.',
      generatedWithAi: false,
      totalEmails: 0,
      highPriority: 0,
      withTasks: 0,
      important: 0,
    });
    expect(generator.calls).toHaveLength(0);
  });

  it('accepts a generated brief that has every section', async () => {
    const generator = new FakeGenerator().enqueue(COMPLETE_BRIEF);
    const { summarizer } = setup(generator);

    const brief = await summarizer.summarizeInbox(messages);

    expect(brief).toEqual({
      text: COMPLETE_BRIEF,
      generatedWithAi: true,
      totalEmails: 2,
      highPriority: 1,
      withTasks: 1,
      important: 1,
    });
    expect(generator.calls[0].options).toEqual(BRIEF_OPTIONS);
  });

  it('composes the brief when the generated one misses a section', async () => {
    const generator = new FakeGenerator().enqueue('**Executive Overview**: All quiet.');
    const { summarizer } = setup(generator);

    const brief = await summarizer.summarizeInbox(messages);

    expect(brief.generatedWithAi).toBe(false);
    expect(brief.text.split('\n')[0]).toBe(
      '**Executive Overview**: You have 2 emails with 1 high-priority items requiring attention.'
    );
  });

  it('composes the brief when generation fails', async () => {
    const generator = new FakeGenerator().enqueue(new Error('500 internal error'));
    const { summarizer } = setup(generator);

    const brief = await summarizer.summarizeInbox(messages);

    expect(brief.generatedWithAi).toBe(false);
    expect(brief.text).toContain('**Sender Analysis**: Alice Smith (1) • bob (1)');
  });

  it('composes the brief without a generator', async () => {
    const { summarizer } = setup(null);

    const brief = await summarizer.summarizeInbox(messages);

    expect(brief.generatedWithAi).toBe(false);
    expect(brief.text).toContain('**Task Summary**: 1 emails contain actionable items');
  });
});
