/**
 * @fileoverview Actionable-content detection.
 *
 * Plain substring matching: "calls" and "recall" both contain "call".
 */

export const TASK_TERMS = [
  'meeting',
  'call',
  'schedule',
  'appointment',
  'deadline',
  'due date',
  'task',
  'action item',
  'follow up',
  'reminder',
] as const;

/** True when the text mentions any scheduling or action term. */
export function hasTasks(text: string): boolean {
  const lower = text.toLowerCase();
  return TASK_TERMS.some((term) => lower.includes(term));
}
