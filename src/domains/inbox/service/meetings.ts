/**
 * @fileoverview Meeting time suggestions.
 *
 * Offers fixed business-hour slots on the weekdays following `now`.
 */

import { DateTime } from 'luxon';

const SLOT_HOURS = [9, 11, 14, 16] as const;
const LOOKAHEAD_DAYS = 5;
const MAX_SUGGESTIONS = 5;

/**
 * ISO start times for the first five weekday slots within the next five days.
 */
export function suggestMeetingTimes(now: Date, timeZone: string): string[] {
  const today = DateTime.fromJSDate(now, { zone: timeZone }).startOf('day');
  const suggestions: string[] = [];

  for (let offset = 1; offset <= LOOKAHEAD_DAYS; offset++) {
    const day = today.plus({ days: offset });
    // Luxon weekdays: 1 = Monday ... 7 = Sunday
    if (day.weekday > 5) continue;

    for (const hour of SLOT_HOURS) {
      const iso = day.set({ hour, minute: 0, second: 0, millisecond: 0 }).toISO();
      if (iso) suggestions.push(iso);
    }
  }

  return suggestions.slice(0, MAX_SUGGESTIONS);
}
