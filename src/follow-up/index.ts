/**
 * Follow-up module exports
 */

export { FollowUpManager, type FollowUpManagerDeps } from './manager.js';
export { FollowUpTracker, type FollowUpTrackerOptions } from './tracker.js';
export { systemClock, type Clock } from './clock.js';
export { buildFollowUpContext } from './context.js';
export type {
  FollowUpMessage,
  FollowUpSettings,
  MessageSender,
  TaskRunner,
  TrackerState,
  WindowOutcome,
  WindowSettings,
} from './types.js';
