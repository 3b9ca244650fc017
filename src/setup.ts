/**
 * Builds a follow-up manager from configuration
 */

import { getConfig, type Config, type FollowUpConfig } from './config.js';
import { createEvaluator, type NecessityEvaluator } from './evaluator/index.js';
import { FollowUpManager, type Clock, type FollowUpSettings } from './follow-up/index.js';
import { WillingnessRegistry, type WillingnessSink } from './willingness/index.js';
import { log, setLogLevel } from './logger.js';

export interface SetupOverrides {
  evaluator?: NecessityEvaluator;
  willingness?: WillingnessSink;
  clock?: Clock;
}

export function toFollowUpSettings(config: FollowUpConfig): FollowUpSettings {
  return {
    enabled: config.enabled,
    timeoutMs: config.timeoutSeconds * 1000,
    maxMessages: config.maxMessages,
    maxRestarts: config.maxRestarts,
    pollIntervalMs: config.pollIntervalMs,
    replyWillingness: config.replyWillingness,
  };
}

function getApiKey(config: Config): string {
  const apiKey = config.aiProvider === 'claude' ? config.anthropicApiKey : config.geminiApiKey;
  if (!apiKey) {
    throw new Error(`No API key configured for AI provider "${config.aiProvider}"`);
  }
  return apiKey;
}

export function createFollowUpManager(
  config: Config = getConfig(),
  overrides: SetupOverrides = {}
): FollowUpManager {
  setLogLevel(config.logLevel);

  const evaluator =
    overrides.evaluator ??
    createEvaluator(config.aiProvider, getApiKey(config), {
      prompt: config.followUp.prompt,
      model: config.followUp.model,
    });

  const manager = new FollowUpManager(toFollowUpSettings(config.followUp), {
    evaluator,
    willingness: overrides.willingness ?? new WillingnessRegistry(),
    clock: overrides.clock,
  });

  if (!config.followUp.enabled) {
    log.info('[follow-up] Follow-up tracking is disabled');
  }

  return manager;
}
