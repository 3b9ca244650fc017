/**
 * Type definitions for the evaluator module
 */

import type { AIProvider } from '../config.js';

export type { AIProvider };

/**
 * Decides from the text of a follow-up window whether the bot should reply.
 * Implementations may reject; callers treat a rejection as "no reply needed".
 */
export interface NecessityEvaluator {
  /** Provider name, used in logs */
  readonly name: string;

  evaluate(context: string, signal?: AbortSignal): Promise<boolean>;
}

export interface EvaluatorOptions {
  /** Instruction placed before the conversation text */
  prompt: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}
