/**
 * @fileoverview Ranking pipeline.
 *
 * Decodes, classifies and orders one fetch cycle's messages. Every code path
 * that produces a classified list goes through `compareClassified`.
 */

import { decodeBody } from './body-decoder.js';
import { classify } from './classifier.js';
import { hasTasks } from './task-detector.js';
import type { ClassifiedMessage, RawMessage } from '../types.js';

/**
 * Task-bearing messages first, then by descending priority score.
 * Array#sort is stable, so equal keys keep their fetch order.
 */
export function compareClassified(a: ClassifiedMessage, b: ClassifiedMessage): number {
  if (a.hasTasks !== b.hasTasks) {
    return a.hasTasks ? -1 : 1;
  }
  return b.priorityScore - a.priorityScore;
}

export function classifyMessage(raw: RawMessage): ClassifiedMessage {
  const body = decodeBody(raw.rawBody);
  const { score, labels, isImportant } = classify(raw.sender, raw.subject, body);

  return {
    id: raw.id,
    sender: raw.sender,
    subject: raw.subject,
    date: raw.date,
    body,
    priorityScore: score,
    labels,
    isImportant,
    hasTasks: hasTasks(body),
  };
}

export function sortClassified(messages: ClassifiedMessage[]): ClassifiedMessage[] {
  return [...messages].sort(compareClassified);
}

/** Produce the ordered classified list for one fetch cycle. */
export function rankMessages(messages: readonly RawMessage[]): ClassifiedMessage[] {
  return sortClassified(messages.map(classifyMessage));
}
