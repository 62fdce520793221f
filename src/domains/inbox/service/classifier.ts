/**
 * @fileoverview Rule-based priority classifier.
 *
 * Scores a message from fixed keyword tables. Each term counts once,
 * however often it occurs, and matching is by substring.
 */

import type { Classification } from '../types.js';

export const BASELINE_SCORE = 0.5;
export const IMPORTANCE_WEIGHT = 0.2;
export const DEMOTION_WEIGHT = 0.3;
export const HIGH_PRIORITY_THRESHOLD = 0.7;
export const IMPORTANT_THRESHOLD = 0.6;

export const IMPORTANCE_TERMS = [
  'urgent', 'asap', 'deadline', 'meeting', 'call', 'interview',
  'contract', 'proposal', 'budget', 'revenue', 'client', 'customer',
] as const;

export const DEMOTION_TERMS = [
  'newsletter', 'unsubscribe', 'promotion', 'sale', 'offer',
  'marketing', 'spam', 'advertisement',
] as const;

const SCHEDULING_TERMS = ['meeting', 'call'] as const;
const BUSINESS_TERMS = ['client', 'customer', 'proposal'] as const;

/**
 * Sum every keyword adjustment, then clamp once. Clamping per term would
 * change results for mixed messages (e.g. four boosts and one demotion).
 */
export function rawScore(text: string): number {
  let score = BASELINE_SCORE;
  for (const term of IMPORTANCE_TERMS) {
    if (text.includes(term)) score += IMPORTANCE_WEIGHT;
  }
  for (const term of DEMOTION_TERMS) {
    if (text.includes(term)) score -= DEMOTION_WEIGHT;
  }
  return score;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Classify a message by subject and content.
 *
 * `sender` is part of the contract but does not influence the score.
 */
export function classify(_sender: string, subject: string, content: string): Classification {
  const text = `${subject} ${content}`.toLowerCase();
  const score = clamp(rawScore(text), 0, 1);

  const labels: string[] = [];
  if (score > HIGH_PRIORITY_THRESHOLD) {
    labels.push('high-priority');
  }
  if (SCHEDULING_TERMS.some((term) => text.includes(term))) {
    labels.push('scheduling');
  }
  if (BUSINESS_TERMS.some((term) => text.includes(term))) {
    labels.push('business');
  }

  return {
    score,
    labels,
    isImportant: score > IMPORTANT_THRESHOLD,
  };
}
