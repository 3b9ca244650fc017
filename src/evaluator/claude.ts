/**
 * Claude AI provider for follow-up necessity evaluation
 */

import Anthropic from '@anthropic-ai/sdk';
import type { EvaluatorOptions, NecessityEvaluator } from './types.js';
import {
  buildNecessityPrompt,
  parseVerdict,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from './prompts.js';
import { log } from '../logger.js';

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

export class ClaudeEvaluator implements NecessityEvaluator {
  readonly name = 'claude' as const;
  private client: Anthropic;
  private model: string;
  private options: EvaluatorOptions;

  constructor(apiKey: string, options: EvaluatorOptions) {
    this.client = new Anthropic({ apiKey });
    this.model = options.model ?? DEFAULT_MODEL;
    this.options = options;
    log.info(`Claude evaluator initialized with model: ${this.model}`);
  }

  async evaluate(context: string, signal?: AbortSignal): Promise<boolean> {
    const prompt = buildNecessityPrompt(this.options.prompt, context);

    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
          messages: [
            {
              role: 'user',
              content: prompt,
            },
          ],
        },
        { signal }
      );

      // Extract text from response
      const textContent = response.content.find((block) => block.type === 'text');
      if (textContent?.type !== 'text') {
        log.error('Claude returned no text content');
        return false;
      }

      log.debug(`Claude verdict: ${textContent.text}`);
      return parseVerdict(textContent.text);
    } catch (error) {
      if (signal?.aborted) {
        log.debug('Claude evaluation aborted');
        return false;
      }
      log.error('Claude API error:', error);
      return false;
    }
  }
}
