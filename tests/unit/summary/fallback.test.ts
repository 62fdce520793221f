/**
 * Unit tests for deterministic summaries.
 */

import { describe, expect, it } from 'vitest';
import {
  composeBrief,
  countBrief,
  fallbackMessageSummary,
  topCounts,
} from '../../../src/domains/summary/service/fallback.js';
import { classifiedMessage } from '../../helpers/fakes.js';

describe('fallbackMessageSummary', () => {
  it('uses the action template when the content asks for something', () => {
    const summary = fallbackMessageSummary({
      id: 'm1',
      sender: 'Alice Smith <alice@example.com>',
      subject: 'Quarterly Review',
      body: 'Please review the attached report before Friday.',
    });

    expect(summary).toBe(
      'This email from Alice Smith is about quarterly review. Based on the content, it appears to require some action or response from you. The email discusses Please review the attached report before Friday.'
    );
  });

  it('uses the informational template otherwise', () => {
    const summary = fallbackMessageSummary({
      id: 'm2',
      sender: 'news@example.com',
      subject: 'Weekly Digest',
      body: 'Here are the highlights from this week.',
    });

    expect(summary).toBe(
      'This is an informational email from news regarding weekly digest. The message covers Here are the highlights from this week.'
    );
  });

  it('shortens long excerpts with an ellipsis', () => {
    const summary = fallbackMessageSummary({
      id: 'm3',
      sender: 'Bot <bot@example.com>',
      subject: 'Log',
      body: 'x'.repeat(150),
    });

    expect(summary).toBe(`This is an informational email from Bot regarding log. The message covers ${'x'.repeat(100)}...`);
  });

  it('cuts the excerpt on character boundaries', () => {
    const summary = fallbackMessageSummary({
      id: 'm5',
      sender: 'Bot <bot@example.com>',
      subject: 'Log',
      body: '😀'.repeat(150),
    });

    expect(summary).toBe(`This is an informational email from Bot regarding log. The message covers ${'😀'.repeat(100)}...`);
  });

  it('only scans the first 400 characters for action terms', () => {
    const summary = fallbackMessageSummary({
      id: 'm4',
      sender: 'Bot <bot@example.com>',
      subject: 'Log',
      body: `${'x'.repeat(400)} please`,
    });

    expect(summary.startsWith('This is an informational email from Bot')).toBe(true);
  });
});

describe('topCounts', () => {
  it('orders by count and breaks ties by first appearance', () => {
    expect(topCounts(['b', 'a', 'b', 'c', 'a', 'd'])).toEqual([
      ['b', 2],
      ['a', 2],
      ['c', 1],
    ]);
  });
});

describe('countBrief', () => {
  it('counts high-priority, task and important messages', () => {
    const counts = countBrief([
      classifiedMessage({ id: 'a', priorityScore: 0.9, hasTasks: true, isImportant: true }),
      classifiedMessage({ id: 'b', priorityScore: 0.7, isImportant: true }),
      classifiedMessage({ id: 'c', priorityScore: 0.2 }),
    ]);

    expect(counts).toEqual({ totalEmails: 3, highPriority: 1, withTasks: 1, important: 2 });
  });
});

describe('composeBrief', () => {
  it('renders every section from the counts', () => {
    const brief = composeBrief([
      classifiedMessage({
        id: 'a',
        sender: 'Alice Smith <alice@example.com>',
        subject: 'Contract renewal deadline',
        priorityScore: 0.9,
        labels: ['high-priority', 'business'],
        isImportant: true,
        hasTasks: true,
      }),
      classifiedMessage({
        id: 'b',
        sender: 'bob@example.com',
        subject: 'Team sync',
        priorityScore: 0.7,
        labels: ['scheduling'],
        isImportant: true,
        hasTasks: true,
      }),
      classifiedMessage({
        id: 'c',
        sender: 'Alice Smith <alice@example.com>',
        subject: 'Lunch',
      }),
    ]);

    expect(brief).toBe([
      '**Executive Overview**: You have 3 emails with 1 high-priority items requiring attention.',
      '',
      '**Priority Actions**:',
      '• 1 high-priority emails need immediate review',
      '• 2 emails marked as important',
      '• Urgent: Contract renewal deadline',
      '',
      '**Key Themes**: high-priority (1) • business (1) • scheduling (1)',
      '',
      '**Task Summary**: 2 emails contain actionable items including meetings, deadlines, or follow-ups.',
      '',
      '**Sender Analysis**: Alice Smith (2) • bob (1)',
    ].join('\n'));
  });

  it('truncates long urgent subjects and notes quiet inboxes', () => {
    const urgent = composeBrief([
      classifiedMessage({
        id: 'a',
        subject: 'Team meeting moved to Thursday afternoon session',
        priorityScore: 0.85,
      }),
    ]);
    expect(urgent).toContain('• Urgent: Team meeting moved to Thursday afternoon...');

    const quiet = composeBrief([classifiedMessage({ id: 'b', sender: 'carol@example.com' })]);
    expect(quiet.split('\n')).toEqual([
      '**Executive Overview**: You have 1 emails with 0 high-priority items requiring attention.',
      '',
      '**Priority Actions**:',
      '• 0 high-priority emails need immediate review',
      '• 0 emails marked as important',
      '• No urgent items',
      '',
      '**Key Themes**: General correspondence',
      '',
      '**Task Summary**: 0 emails contain actionable items including meetings, deadlines, or follow-ups.',
      '',
      '**Sender Analysis**: carol (1)',
    ]);
  });

  it('lists at most three urgent items', () => {
    const brief = composeBrief(
      ['One', 'Two', 'Three', 'Four'].map((subject, i) =>
        classifiedMessage({ id: `u${i}`, subject, priorityScore: 1 })
      )
    );

    expect(brief.split('\n').filter((line) => line.startsWith('• Urgent:'))).toEqual([
      '• Urgent: One',
      '• Urgent: Two',
      '• Urgent: Three',
    ]);
  });

  it('falls back to placeholder themes and senders for an empty list', () => {
    const brief = composeBrief([]);

    expect(brief).toContain('**Key Themes**: General correspondence');
    expect(brief).toContain('**Sender Analysis**: Various senders');
  });
});
