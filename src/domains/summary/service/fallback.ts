/**
 * @fileoverview Deterministic summaries used when no generative backend is
 * configured or a generated summary could not be produced.
 */

import { HIGH_PRIORITY_THRESHOLD } from '../../inbox/service/classifier.js';
import type { ClassifiedMessage } from '../../inbox/types.js';
import { charLength, truncateChars } from '../../../utils/text.js';
import type { SummarizableMessage } from '../types.js';
import { sectionHeading, senderDisplayName } from './format.js';

const ACTION_SCAN_LIMIT = 400;
const EXCERPT_LIMIT = 100;
const URGENT_THRESHOLD = 0.8;
const TOP_N = 3;
const SUBJECT_PREVIEW_LIMIT = 40;

export const ACTION_TERMS = [
  'please', 'need', 'request', 'action', 'review',
  'approve', 'sign', 'meeting', 'call', 'schedule',
] as const;

export const EMPTY_INBOX_SUMMARY = 'No emails to summarize.';

export function fallbackMessageSummary(message: SummarizableMessage): string {
  const content = truncateChars(message.body, ACTION_SCAN_LIMIT);
  const lower = content.toLowerCase();
  const needsAction = ACTION_TERMS.some((term) => lower.includes(term));

  const name = senderDisplayName(message.sender);
  const subject = message.subject.toLowerCase();
  const excerpt = `${truncateChars(content, EXCERPT_LIMIT).trim()}${charLength(content) > EXCERPT_LIMIT ? '...' : ''}`;

  if (needsAction) {
    return `This email from ${name} is about ${subject}. Based on the content, it appears to require some action or response from you. The email discusses ${excerpt}`;
  }
  return `This is an informational email from ${name} regarding ${subject}. The message covers ${excerpt}`;
}

export type BriefCounts = {
  totalEmails: number;
  highPriority: number;
  withTasks: number;
  important: number;
};

export function countBrief(messages: readonly ClassifiedMessage[]): BriefCounts {
  return {
    totalEmails: messages.length,
    highPriority: messages.filter((m) => m.priorityScore > HIGH_PRIORITY_THRESHOLD).length,
    withTasks: messages.filter((m) => m.hasTasks).length,
    important: messages.filter((m) => m.isImportant).length,
  };
}

/**
 * Most frequent keys, ties broken by first appearance.
 */
export function topCounts(keys: readonly string[], limit: number = TOP_N): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

function subjectPreview(subject: string): string {
  return charLength(subject) > SUBJECT_PREVIEW_LIMIT
    ? `${truncateChars(subject, SUBJECT_PREVIEW_LIMIT)}...`
    : subject;
}

function formatCounts(entries: Array<[string, number]>, whenEmpty: string): string {
  if (entries.length === 0) return whenEmpty;
  return entries.map(([key, count]) => `${key} (${count})`).join(' • ');
}

/**
 * Compose the executive brief from counts alone. Uses the same headings as
 * the generated brief.
 */
export function composeBrief(messages: readonly ClassifiedMessage[]): string {
  const counts = countBrief(messages);
  const topSenders = topCounts(messages.map((m) => senderDisplayName(m.sender)));
  const topLabels = topCounts(messages.flatMap((m) => m.labels));
  const urgent = messages.filter((m) => m.priorityScore > URGENT_THRESHOLD).slice(0, TOP_N);

  const urgentLines = urgent.length > 0
    ? urgent.map((m) => `• Urgent: ${subjectPreview(m.subject)}`)
    : ['• No urgent items'];

  return [
    `${sectionHeading('Executive Overview')} You have ${counts.totalEmails} emails with ${counts.highPriority} high-priority items requiring attention.`,
    '',
    sectionHeading('Priority Actions'),
    `• ${counts.highPriority} high-priority emails need immediate review`,
    `• ${counts.important} emails marked as important`,
    ...urgentLines,
    '',
    `${sectionHeading('Key Themes')} ${formatCounts(topLabels, 'General correspondence')}`,
    '',
    `${sectionHeading('Task Summary')} ${counts.withTasks} emails contain actionable items including meetings, deadlines, or follow-ups.`,
    '',
    `${sectionHeading('Sender Analysis')} ${formatCounts(topSenders, 'Various senders')}`,
  ].join('\n');
}
