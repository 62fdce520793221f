/**
 * @fileoverview Gemini text generation.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { createLogger } from '../../../utils/observability/index.js';
import { errorMessage } from '../../../utils/errors.js';
import { GeminiNotConfiguredError, type GenerationOptions, type TextGenerator } from '../types.js';

const log = createLogger({ domain: 'gemini' });

/** Keys copied from a template are treated as absent. */
const PLACEHOLDER_KEY_PREFIX = 'your_gem';

export function isUsableGeminiKey(apiKey: string | undefined): boolean {
  return apiKey !== undefined && apiKey !== '' && !apiKey.startsWith(PLACEHOLDER_KEY_PREFIX);
}

export class GeminiTextGenerator implements TextGenerator {
  private readonly model: GenerativeModel;

  constructor(apiKey: string, private readonly modelName: string) {
    if (!isUsableGeminiKey(apiKey)) {
      throw new GeminiNotConfiguredError();
    }
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
  }

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    const startTime = Date.now();
    try {
      const result = await this.model.generateContent({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens,
          topP: options.topP,
          topK: options.topK,
        },
      });
      const text = result.response.text();

      log.debug('gemini_generation_complete', {
        model: this.modelName,
        responseLength: text.length,
        durationMs: Date.now() - startTime,
      });
      return text;
    } catch (error) {
      log.debug('gemini_generation_failed', {
        model: this.modelName,
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      });
      throw error;
    }
  }
}

/**
 * Build the generator from configuration, or null when no usable key is set.
 */
export function createGeminiGenerator(apiKey: string | undefined, modelName: string): GeminiTextGenerator | null {
  if (apiKey === undefined || !isUsableGeminiKey(apiKey)) {
    log.warn('gemini_not_configured', { fallback: 'deterministic summaries' });
    return null;
  }
  log.info('gemini_configured', { model: modelName });
  return new GeminiTextGenerator(apiKey, modelName);
}
