/**
 * @fileoverview Calendar event payload derived from a classified message.
 *
 * The slot is fixed: tomorrow at the current wall-clock time in the
 * configured zone, one hour long.
 */

import { DateTime } from 'luxon';
import { truncateChars } from '../../../utils/text.js';
import type { CalendarEventPayload, ClassifiedMessage } from '../types.js';

export const EVENT_DESCRIPTION_EXCERPT = 500;

function toIso(dateTime: DateTime): string {
  const iso = dateTime.toISO();
  if (!iso) {
    throw new Error(`Invalid calendar time: ${dateTime.invalidExplanation ?? 'unknown reason'}`);
  }
  return iso;
}

export function buildCalendarEvent(
  message: Pick<ClassifiedMessage, 'subject' | 'sender' | 'body'>,
  now: Date,
  timeZone: string
): CalendarEventPayload {
  const start = DateTime.fromJSDate(now, { zone: timeZone }).plus({ days: 1 });
  const end = start.plus({ hours: 1 });

  return {
    title: `Task: ${message.subject}`,
    description: `From: ${message.sender}\n\n${truncateChars(message.body, EVENT_DESCRIPTION_EXCERPT)}`,
    start: toIso(start),
    end: toIso(end),
    timeZone,
  };
}
