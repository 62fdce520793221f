/**
 * @fileoverview Google Calendar writer.
 */

import { google, calendar_v3 } from 'googleapis';
import { createLogger } from '../../../utils/observability/index.js';
import { safeExecute } from '../../../utils/errors.js';
import type { CalendarEventPayload, CalendarWriter } from '../types.js';
import { getAuthenticatedClient, type GoogleAuthClient } from './google-auth.js';

const log = createLogger({ domain: 'google-calendar' });

export class GoogleCalendarWriter implements CalendarWriter {
  private readonly calendar: calendar_v3.Calendar;

  constructor(auth: GoogleAuthClient, private readonly calendarId: string = 'primary') {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  async createEvent(event: CalendarEventPayload): Promise<boolean> {
    const result = await safeExecute(
      () => this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: event.title,
          description: event.description,
          start: { dateTime: event.start, timeZone: event.timeZone },
          end: { dateTime: event.end, timeZone: event.timeZone },
        },
      }),
      'calendar_event_insert'
    );

    if (!result.success) {
      return false;
    }

    log.info('calendar_event_created', { eventId: result.data.data.id ?? '' });
    return true;
  }
}

/** Calendar writer from configured credentials. */
export function createCalendarWriter(): GoogleCalendarWriter {
  return new GoogleCalendarWriter(getAuthenticatedClient('calendar'));
}
