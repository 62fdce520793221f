/**
 * @fileoverview Summary domain type definitions.
 */

import type { ClassifiedMessage } from '../inbox/types.js';

/** Sampling parameters passed through to the generative backend. */
export type GenerationOptions = {
  temperature: number;
  maxOutputTokens: number;
  topP: number;
  topK: number;
};

/**
 * Generative-text collaborator. Rejections may carry rate-limit or quota
 * signals in their message text.
 */
export interface TextGenerator {
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

/** The fields a per-message summary reads. */
export type SummarizableMessage = Pick<ClassifiedMessage, 'id' | 'sender' | 'subject' | 'body'>;

/** Aggregate inbox brief with the counts it was built from. */
export type InboxBrief = {
  text: string;
  generatedWithAi: boolean;
  totalEmails: number;
  highPriority: number;
  withTasks: number;
  important: number;
};

export class GeminiNotConfiguredError extends Error {
  constructor() {
    super('GEMINI_API_KEY is not configured');
    this.name = 'GeminiNotConfiguredError';
  }
}
