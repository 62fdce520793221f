/**
 * @fileoverview Prompts and sampling settings for generated summaries.
 */

import type { ClassifiedMessage } from '../../inbox/types.js';
import { truncateChars } from '../../../utils/text.js';
import type { GenerationOptions, SummarizableMessage } from '../types.js';
import { BRIEF_SECTIONS, sectionHeading, senderDisplayName } from './format.js';

export const PROMPT_BODY_LIMIT = 1000;
export const BRIEF_MESSAGE_LIMIT = 10;
const BRIEF_PREVIEW_LIMIT = 200;

export const MESSAGE_SUMMARY_OPTIONS: GenerationOptions = {
  temperature: 0.3,
  maxOutputTokens: 200,
  topP: 0.8,
  topK: 40,
};

export const BRIEF_OPTIONS: GenerationOptions = {
  temperature: 0.3,
  maxOutputTokens: 250,
  topP: 0.8,
  topK: 40,
};

export function buildMessageSummaryPrompt(message: SummarizableMessage): string {
  return `Summarize this email in under 150 words of plain, natural prose, the way you would describe it to a colleague.

Subject: ${message.subject}
From: ${message.sender}
Content: ${truncateChars(message.body, PROMPT_BODY_LIMIT)}

Do not use headings, bullet points, numbered lists or labels such as "Main Topic" or "Action Required". Say what the email is about and what, if anything, the reader needs to do.`;
}

export function buildBriefPrompt(messages: readonly ClassifiedMessage[]): string {
  const digest = messages.slice(0, BRIEF_MESSAGE_LIMIT).map((message) => ({
    subject: message.subject,
    sender: senderDisplayName(message.sender),
    priority: message.priorityScore,
    hasTasks: message.hasTasks,
    labels: message.labels,
    preview: truncateChars(message.body, BRIEF_PREVIEW_LIMIT),
  }));

  const sections = BRIEF_SECTIONS.map(sectionHeading).join('\n');

  return `You are preparing an executive brief of an inbox holding ${messages.length} emails. The highest-ranked ones are:

${JSON.stringify(digest, null, 2)}

Write the brief under 200 words using exactly these five sections, in this order, each starting with its heading as shown:
${sections}

Executive Overview: the overall situation in the inbox. Priority Actions: what needs immediate attention. Key Themes: the main topics. Task Summary: meetings, deadlines and action items. Sender Analysis: who the key people reaching out are.`;
}
