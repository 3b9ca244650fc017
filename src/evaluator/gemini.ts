/**
 * Gemini AI provider for follow-up necessity evaluation
 */

import { GoogleGenAI } from '@google/genai';
import type { EvaluatorOptions, NecessityEvaluator } from './types.js';
import {
  buildNecessityPrompt,
  parseVerdict,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from './prompts.js';
import { log } from '../logger.js';

const DEFAULT_MODEL = 'gemini-2.5-flash';

export class GeminiEvaluator implements NecessityEvaluator {
  readonly name = 'gemini' as const;
  private client: GoogleGenAI;
  private model: string;
  private options: EvaluatorOptions;

  constructor(apiKey: string, options: EvaluatorOptions) {
    this.client = new GoogleGenAI({ apiKey });
    this.model = options.model ?? DEFAULT_MODEL;
    this.options = options;
    log.info(`Gemini evaluator initialized with model: ${this.model}`);
  }

  async evaluate(context: string, signal?: AbortSignal): Promise<boolean> {
    const prompt = buildNecessityPrompt(this.options.prompt, context);

    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
          maxOutputTokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
          abortSignal: signal,
        },
      });

      const text = response.text;
      if (!text) {
        log.error('Gemini returned no text content');
        return false;
      }

      log.debug(`Gemini verdict: ${text}`);
      return parseVerdict(text);
    } catch (error) {
      if (signal?.aborted) {
        log.debug('Gemini evaluation aborted');
        return false;
      }
      log.error('Gemini API error:', error);
      return false;
    }
  }
}
