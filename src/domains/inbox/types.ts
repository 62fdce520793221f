/**
 * @fileoverview Inbox domain type definitions.
 *
 * Shared types for the fetch cycle, body decoding, classification and
 * ranking, plus the collaborator interfaces the domain depends on.
 */

/**
 * Provider-native nested body structure. Mirrors Gmail's MessagePart so
 * `gmail_v1.Schema$MessagePart` is assignable without conversion.
 */
export type MessagePart = {
  mimeType?: string | null;
  body?: { data?: string | null } | null;
  parts?: MessagePart[] | null;
};

export type MessageHeader = {
  name?: string | null;
  value?: string | null;
};

/** Message detail as returned by the mail collaborator. */
export type MessageDetail = {
  headers: MessageHeader[];
  body: MessagePart;
};

/** A fetched message, before decoding and classification. */
export type RawMessage = Readonly<{
  id: string;
  sender: string;
  subject: string;
  rawBody: MessagePart;
  date: string;
}>;

/** Output of the priority classifier. */
export type Classification = {
  score: number;
  labels: string[];
  isImportant: boolean;
};

/** A message after decoding, scoring and task detection. */
export type ClassifiedMessage = {
  id: string;
  sender: string;
  subject: string;
  date: string;
  body: string;
  priorityScore: number;
  labels: string[];
  isImportant: boolean;
  hasTasks: boolean;
};

/** Outcome of one fetch cycle. */
export type FetchResult = {
  messages: RawMessage[];
  listedCount: number;
  errorCount: number;
  durationMs: number;
};

/** Mail listing/get collaborator. Any thrown error is treated as transient. */
export interface MailClient {
  list(maxResults: number, query?: string): Promise<string[]>;
  get(messageId: string): Promise<MessageDetail>;
}

/** Event payload handed to the calendar collaborator. */
export type CalendarEventPayload = {
  title: string;
  description: string;
  /** ISO 8601 with offset */
  start: string;
  /** ISO 8601 with offset */
  end: string;
  timeZone: string;
};

/** Calendar-write collaborator. Resolves false when the write was rejected. */
export interface CalendarWriter {
  createEvent(event: CalendarEventPayload): Promise<boolean>;
}
