/**
 * Follow-up manager
 *
 * Owns the one live tracker per conversation. The ingestion pipeline calls
 * `start()` right after the bot sends a message and `feed()` for every
 * inbound message; each tracker then runs its own background loop until its
 * window is closed for good.
 *
 * Background loops only touch the registry after checking that their tracker
 * is still the registered instance. A newer `start()` or an explicit `stop()`
 * may replace or remove it while the evaluator is running, and whoever did so
 * owns the cleanup.
 */

import type { NecessityEvaluator } from '../evaluator/types.js';
import type { WillingnessSink } from '../willingness/registry.js';
import { systemClock, type Clock } from './clock.js';
import { previewMessage } from './context.js';
import { FollowUpTracker } from './tracker.js';
import type { FollowUpMessage, FollowUpSettings, WindowOutcome } from './types.js';
import { log } from '../logger.js';

export interface FollowUpManagerDeps {
  evaluator: NecessityEvaluator;
  willingness: WillingnessSink;
  clock?: Clock;
}

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;

export class FollowUpManager {
  private trackers = new Map<string, FollowUpTracker>();
  private trackedMessageIds = new Set<string>();
  private settings: FollowUpSettings;
  private evaluator: NecessityEvaluator;
  private willingness: WillingnessSink;
  private clock: Clock;

  constructor(settings: FollowUpSettings, deps: FollowUpManagerDeps) {
    this.settings = settings;
    this.evaluator = deps.evaluator;
    this.willingness = deps.willingness;
    this.clock = deps.clock ?? systemClock;
  }

  get enabled(): boolean {
    return this.settings.enabled;
  }

  /** Number of conversations currently being watched */
  get size(): number {
    return this.trackers.size;
  }

  start(conversationId: string, anchorMessageId: string): void {
    if (!this.settings.enabled) {
      return;
    }

    if (this.trackers.has(conversationId)) {
      log.info(`[follow-up] Replacing existing tracker for ${conversationId}`);
      this.stop(conversationId);
    }

    const tracker = new FollowUpTracker({
      conversationId,
      anchorMessageId,
      settings: this.settings,
      evaluator: this.evaluator,
      willingness: this.willingness,
      clock: this.clock,
    });
    this.trackers.set(conversationId, tracker);
    this.trackedMessageIds.add(anchorMessageId);

    tracker.run((signal) => this.track(tracker, signal));
    log.info(
      `[follow-up] Watching ${conversationId} after message ${anchorMessageId}, timeout ${String(this.settings.timeoutMs)}ms`
    );
  }

  stop(conversationId: string): void {
    const tracker = this.trackers.get(conversationId);
    if (!tracker) {
      return;
    }

    tracker.deactivate();
    this.trackedMessageIds.delete(tracker.anchorMessageId);
    this.trackers.delete(conversationId);
    log.debug(`[follow-up] Stopped watching ${conversationId}`);
  }

  feed(conversationId: string, msg: FollowUpMessage): void {
    if (!this.settings.enabled) {
      return;
    }

    const tracker = this.trackers.get(conversationId);
    if (!tracker?.active) {
      return;
    }

    tracker.addMessage(msg);
    log.debug(
      `[follow-up] Added message to ${conversationId}, collected: ${String(tracker.collected.length)}, content: ${previewMessage(msg)}, window start: ${new Date(tracker.windowStart).toISOString()}`
    );
  }

  getTracker(conversationId: string): FollowUpTracker | undefined {
    return this.trackers.get(conversationId);
  }

  isTracking(conversationId: string): boolean {
    return this.trackers.has(conversationId);
  }

  isTrackedMessage(messageId: string): boolean {
    return this.trackedMessageIds.has(messageId);
  }

  /**
   * Stop every tracker and wait for their background tasks to finish, at most
   * `timeoutMs`. An evaluator that ignores its abort signal is left running.
   */
  async shutdown(timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<void> {
    const trackers = [...this.trackers.values()];
    for (const tracker of trackers) {
      this.stop(tracker.conversationId);
    }

    const timer = new AbortController();
    const settled = await Promise.race([
      Promise.all(trackers.map((tracker) => tracker.settled())).then(() => true),
      this.clock.sleep(timeoutMs, timer.signal).then(() => false),
    ]);
    timer.abort();

    if (settled) {
      log.info(`[follow-up] Shut down ${String(trackers.length)} tracker(s)`);
    } else {
      log.warn(`[follow-up] Shutdown timed out after ${String(timeoutMs)}ms with tasks still running`);
    }
  }

  private isCurrent(tracker: FollowUpTracker): boolean {
    return this.trackers.get(tracker.conversationId) === tracker;
  }

  private async track(tracker: FollowUpTracker, signal: AbortSignal): Promise<void> {
    while (!signal.aborted && tracker.shouldContinue()) {
      await this.clock.sleep(this.settings.pollIntervalMs, signal);
    }

    if (signal.aborted) {
      return;
    }

    let outcome: WindowOutcome;
    try {
      outcome = await tracker.evaluateAndRespond();
    } catch (error) {
      log.error(`[follow-up] Window close failed for ${tracker.conversationId}:`, error);
      tracker.deactivate();
      outcome = 'closed';
    }

    if (outcome === 'cancelled' || !this.isCurrent(tracker)) {
      return;
    }

    if (outcome === 'restart') {
      log.debug(`[follow-up] Restarting window for ${tracker.conversationId}`);
      tracker.restart((nextSignal) => this.track(tracker, nextSignal));
      return;
    }

    log.debug(`[follow-up] Cleaning up finished tracker for ${tracker.conversationId}`);
    this.stop(tracker.conversationId);
  }
}
