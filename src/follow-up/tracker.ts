/**
 * Follow-up tracker for a single conversation
 *
 * After the bot speaks, a tracker collects the messages that follow and,
 * once its window closes, asks the necessity evaluator whether they call for
 * another reply.
 *
 * Window lifecycle:
 *   collecting --(timeout or message cap)--> evaluating
 *   evaluating --(positive / empty / budget spent)--> terminated
 *   evaluating --(negative, restarts left)--> collecting (cleared window)
 *
 * `terminated` is absorbing: late messages are dropped and evaluation is a
 * no-op.
 */

import type { NecessityEvaluator } from '../evaluator/types.js';
import type { WillingnessSink } from '../willingness/registry.js';
import type { Clock } from './clock.js';
import { buildFollowUpContext } from './context.js';
import type {
  FollowUpMessage,
  TaskRunner,
  TrackerState,
  WindowOutcome,
  WindowSettings,
} from './types.js';
import { log } from '../logger.js';

export interface FollowUpTrackerOptions {
  conversationId: string;
  anchorMessageId: string;
  settings: WindowSettings;
  evaluator: NecessityEvaluator;
  willingness: WillingnessSink;
  clock: Clock;
}

interface BackgroundTask {
  controller: AbortController;
  done: Promise<void>;
}

export class FollowUpTracker {
  readonly conversationId: string;
  readonly anchorMessageId: string;

  private settings: WindowSettings;
  private evaluator: NecessityEvaluator;
  private willingness: WillingnessSink;
  private clock: Clock;

  private messages: FollowUpMessage[] = [];
  /** Messages that arrive while the current window is being evaluated */
  private held: FollowUpMessage[] = [];
  private startedAt: number;
  private currentState: TrackerState = 'collecting';
  private restartCount = 0;
  private task: BackgroundTask | null = null;

  constructor(options: FollowUpTrackerOptions) {
    this.conversationId = options.conversationId;
    this.anchorMessageId = options.anchorMessageId;
    this.settings = options.settings;
    this.evaluator = options.evaluator;
    this.willingness = options.willingness;
    this.clock = options.clock;
    this.startedAt = this.clock.now();
  }

  get active(): boolean {
    return this.currentState !== 'terminated';
  }

  get state(): TrackerState {
    return this.currentState;
  }

  get windowStart(): number {
    return this.startedAt;
  }

  get collected(): readonly FollowUpMessage[] {
    return this.messages;
  }

  get restarts(): number {
    return this.restartCount;
  }

  addMessage(msg: FollowUpMessage): void {
    switch (this.currentState) {
      case 'collecting':
        this.messages.push(msg);
        break;
      case 'evaluating':
        // The next window closes at the cap anyway
        if (this.held.length < this.settings.maxMessages) {
          this.held.push(msg);
        }
        break;
      case 'terminated':
        break;
    }
  }

  shouldContinue(): boolean {
    if (!this.active) {
      return false;
    }
    return !this.windowExhausted();
  }

  deactivate(): void {
    this.currentState = 'terminated';
    this.held = [];
    this.task?.controller.abort();
  }

  /**
   * Replace the background task. The previous task, if any, is aborted first.
   */
  run(runner: TaskRunner): void {
    this.task?.controller.abort();

    // Registered before the runner starts so its synchronous part already
    // sees the new signal
    const task: BackgroundTask = { controller: new AbortController(), done: Promise.resolve() };
    this.task = task;
    task.done = runner(task.controller.signal).catch((error: unknown) => {
      log.error(`[follow-up] Tracking task for ${this.conversationId} failed:`, error);
    });
  }

  /**
   * Resolves when the current background task has finished.
   */
  settled(): Promise<void> {
    return this.task?.done ?? Promise.resolve();
  }

  /**
   * Start a fresh window on the same tracker and spawn `runner` for it.
   * Returns false, and does nothing, once the tracker has terminated.
   */
  restart(runner: TaskRunner): boolean {
    if (!this.active) {
      return false;
    }

    this.startedAt = this.clock.now();
    this.messages = this.held;
    this.held = [];
    this.currentState = 'collecting';
    this.restartCount++;
    this.run(runner);
    return true;
  }

  /**
   * Close the current window. A `restart` outcome leaves the tracker in
   * `evaluating` until `restart()` is called.
   */
  async evaluateAndRespond(): Promise<WindowOutcome> {
    if (this.currentState !== 'collecting') {
      return 'cancelled';
    }

    if (this.messages.length === 0) {
      log.debug(`[follow-up] No follow-up messages for ${this.conversationId}, closing window`);
      this.deactivate();
      return 'closed';
    }

    this.currentState = 'evaluating';
    const context = buildFollowUpContext(this.messages);
    const needsReply = await this.checkNeedsReply(context);

    // Stopped or replaced while the evaluator was running
    if (!this.active) {
      return 'cancelled';
    }

    if (needsReply) {
      log.info(`[follow-up] Replying to follow-up messages in ${this.conversationId}`);
      try {
        this.willingness.setWillingness(this.conversationId, this.settings.replyWillingness);
      } catch (error) {
        log.error(`[follow-up] Failed to raise willingness for ${this.conversationId}:`, error);
      }
      this.deactivate();
      return 'will-reply';
    }

    if (this.canRestart()) {
      log.debug(`[follow-up] No reply needed, keep watching ${this.conversationId}`);
      return 'restart';
    }

    log.debug(
      `[follow-up] No reply needed and restart budget spent (${String(this.restartCount)}), closing ${this.conversationId}`
    );
    this.deactivate();
    return 'closed';
  }

  private windowExhausted(): boolean {
    const elapsed = this.clock.now() - this.startedAt;
    return elapsed >= this.settings.timeoutMs || this.messages.length >= this.settings.maxMessages;
  }

  private canRestart(): boolean {
    const { maxRestarts } = this.settings;
    return maxRestarts === null || this.restartCount < maxRestarts;
  }

  private async checkNeedsReply(context: string): Promise<boolean> {
    try {
      return await this.evaluator.evaluate(context, this.task?.controller.signal);
    } catch (error) {
      log.error(`[follow-up] ${this.evaluator.name} evaluation failed for ${this.conversationId}:`, error);
      return false;
    }
  }
}
