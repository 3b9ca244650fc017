/**
 * Evaluator module exports
 */

export type {
  AIProvider,
  EvaluatorOptions,
  NecessityEvaluator,
} from './types.js';

export { ClaudeEvaluator } from './claude.js';
export { GeminiEvaluator } from './gemini.js';
export { buildNecessityPrompt, parseVerdict } from './prompts.js';

import type { AIProvider, EvaluatorOptions, NecessityEvaluator } from './types.js';
import { ClaudeEvaluator } from './claude.js';
import { GeminiEvaluator } from './gemini.js';

/**
 * Factory function to create a necessity evaluator based on provider
 */
export function createEvaluator(
  provider: AIProvider,
  apiKey: string,
  options: EvaluatorOptions
): NecessityEvaluator {
  switch (provider) {
    case 'claude':
      return new ClaudeEvaluator(apiKey, options);
    case 'gemini':
      return new GeminiEvaluator(apiKey, options);
    default:
      throw new Error(`Unknown AI provider: ${String(provider)}`);
  }
}
