/**
 * @fileoverview Email body decoding.
 *
 * Turns a provider-native body structure into bounded plain text. Never
 * throws: failures become one of two sentinel strings.
 */

import { createLogger } from '../../../utils/observability/index.js';
import { truncateChars } from '../../../utils/text.js';
import type { MessagePart } from '../types.js';

const log = createLogger({ domain: 'body-decoder' });

export const MAX_BODY_LENGTH = 1000;
export const NO_CONTENT = 'No content available';
export const EXTRACTION_FAILED = 'Could not extract email content';

/**
 * Tag stripping is a plain regex, not a parser: anything shaped like `<...>`
 * goes, including text that merely looks like a tag.
 */
const TAG_PATTERN = /<[^<]+?>/g;

/**
 * Decode base64url body data. Invalid UTF-8 sequences become U+FFFD.
 */
function decodeBodyData(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

export function stripHtmlTags(html: string): string {
  return html.replace(TAG_PATTERN, '');
}

function hasData(part: MessagePart): part is MessagePart & { body: { data: string } } {
  return typeof part.body?.data === 'string' && part.body.data.length > 0;
}

/**
 * Flatten nested containers depth-first so document order is preserved.
 */
function leafParts(parts: MessagePart[]): MessagePart[] {
  const leaves: MessagePart[] = [];
  for (const part of parts) {
    if (Array.isArray(part.parts)) {
      leaves.push(...leafParts(part.parts));
    } else {
      leaves.push(part);
    }
  }
  return leaves;
}

function extractText(payload: MessagePart): string {
  if (Array.isArray(payload.parts)) {
    const leaves = leafParts(payload.parts);

    const plain = leaves.find((part) => part.mimeType === 'text/plain' && hasData(part));
    if (plain?.body?.data) {
      return decodeBodyData(plain.body.data);
    }

    const html = leaves.find((part) => part.mimeType === 'text/html' && hasData(part));
    if (html?.body?.data) {
      return stripHtmlTags(decodeBodyData(html.body.data));
    }

    return '';
  }

  if (!hasData(payload)) return '';

  if (payload.mimeType === 'text/plain') {
    return decodeBodyData(payload.body.data);
  }
  if (payload.mimeType === 'text/html') {
    return stripHtmlTags(decodeBodyData(payload.body.data));
  }
  return '';
}

/**
 * Decode a message body into plain text of at most 1000 characters.
 *
 * Multi-part payloads prefer the first text/plain part and fall back to the
 * first text/html part with tags removed.
 */
export function decodeBody(payload: MessagePart | null | undefined): string {
  let text: string;
  try {
    text = payload ? extractText(payload) : '';
  } catch (error) {
    log.warn('body_decode_failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return EXTRACTION_FAILED;
  }

  const trimmed = text.trim();
  return trimmed ? truncateChars(trimmed, MAX_BODY_LENGTH) : NO_CONTENT;
}
