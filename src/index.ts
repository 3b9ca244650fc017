/**
 * Follow-up Watch
 *
 * Watches a chat conversation for a short while after the bot speaks and
 * decides, with an LLM, whether the messages that follow deserve another
 * reply.
 */

export {
  FollowUpManager,
  FollowUpTracker,
  buildFollowUpContext,
  systemClock,
  type Clock,
  type FollowUpManagerDeps,
  type FollowUpMessage,
  type FollowUpSettings,
  type FollowUpTrackerOptions,
  type MessageSender,
  type TaskRunner,
  type TrackerState,
  type WindowOutcome,
  type WindowSettings,
} from './follow-up/index.js';

export {
  ClaudeEvaluator,
  GeminiEvaluator,
  buildNecessityPrompt,
  createEvaluator,
  parseVerdict,
  type AIProvider,
  type EvaluatorOptions,
  type NecessityEvaluator,
} from './evaluator/index.js';

export { WillingnessRegistry, type WillingnessSink } from './willingness/index.js';

export {
  getConfig,
  loadConfig,
  DEFAULT_FOLLOW_UP_PROMPT,
  type Config,
  type FollowUpConfig,
  type LogLevel,
} from './config.js';

export { log, setLogLevel } from './logger.js';
export { createFollowUpManager, toFollowUpSettings, type SetupOverrides } from './setup.js';
