import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FollowUpManager } from './manager.js';
import type { FollowUpMessage, FollowUpSettings, MessageSender } from './types.js';
import type { NecessityEvaluator } from '../evaluator/types.js';
import type { WillingnessSink } from '../willingness/registry.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  const handle: { resolve: (value: T) => void } = { resolve: () => undefined };
  const promise = new Promise<T>((resolve) => {
    handle.resolve = resolve;
  });
  return { promise, resolve: (value: T) => handle.resolve(value) };
}

function message(displayName: string, plainText: string): FollowUpMessage {
  return { plainText, sender: { id: displayName.toLowerCase(), displayName } };
}

function setup(overrides: Partial<FollowUpSettings> = {}) {
  const evaluator = {
    name: 'stub',
    evaluate: vi.fn<NecessityEvaluator['evaluate']>(() => Promise.resolve(false)),
  };
  const willingness = {
    setWillingness: vi.fn<WillingnessSink['setWillingness']>(),
  };
  const manager = new FollowUpManager(
    {
      enabled: true,
      timeoutMs: 2_000,
      maxMessages: 3,
      maxRestarts: null,
      pollIntervalMs: 1_000,
      replyWillingness: 2,
      ...overrides,
    },
    { evaluator, willingness }
  );
  return { manager, evaluator, willingness };
}

describe('FollowUpManager', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('start()', () => {
    it('registers a tracker and its anchor message', () => {
      const { manager } = setup();

      manager.start('group-1', 'm1');

      expect(manager.size).toBe(1);
      expect(manager.isTracking('group-1')).toBe(true);
      expect(manager.isTrackedMessage('m1')).toBe(true);
      expect(manager.getTracker('group-1')?.anchorMessageId).toBe('m1');
    });

    it('does nothing when tracking is disabled', () => {
      const { manager } = setup({ enabled: false });

      manager.start('group-1', 'm1');
      manager.feed('group-1', message('Alice', 'hi'));

      expect(manager.size).toBe(0);
      expect(manager.isTrackedMessage('m1')).toBe(false);
    });

    it('replaces the tracker of a conversation that is already watched', async () => {
      const { manager, evaluator } = setup();
      manager.start('group-1', 'm1');
      const first = manager.getTracker('group-1');

      await vi.advanceTimersByTimeAsync(500);
      manager.start('group-1', 'm2');

      expect(first?.active).toBe(false);
      expect(manager.size).toBe(1);
      expect(manager.getTracker('group-1')?.anchorMessageId).toBe('m2');
      expect(manager.isTrackedMessage('m1')).toBe(false);
      expect(manager.isTrackedMessage('m2')).toBe(true);

      // The first tracker's window would have closed here
      await vi.advanceTimersByTimeAsync(1_500);
      expect(manager.getTracker('group-1')?.anchorMessageId).toBe('m2');

      // The second one closes empty without an evaluation
      await vi.advanceTimersByTimeAsync(1_000);
      expect(manager.size).toBe(0);
      expect(manager.isTrackedMessage('m2')).toBe(false);
      expect(evaluator.evaluate).not.toHaveBeenCalled();
    });

    it('keeps conversations independent', async () => {
      const { manager, evaluator, willingness } = setup();
      evaluator.evaluate.mockImplementation((context) =>
        Promise.resolve(context.includes('bot?'))
      );

      manager.start('group-1', 'm1');
      manager.start('group-2', 'm2');
      manager.feed('group-1', message('Alice', 'bot?'));
      manager.feed('group-2', message('Bob', 'nice weather'));

      await vi.advanceTimersByTimeAsync(2_000);

      expect(willingness.setWillingness).toHaveBeenCalledTimes(1);
      expect(willingness.setWillingness).toHaveBeenCalledWith('group-1', 2);
      expect(manager.isTracking('group-1')).toBe(false);
      expect(manager.getTracker('group-2')?.restarts).toBe(1);
    });
  });

  describe('stop()', () => {
    it('deactivates and forgets the tracker', () => {
      const { manager } = setup();
      manager.start('group-1', 'm1');
      const tracker = manager.getTracker('group-1');

      manager.stop('group-1');

      expect(tracker?.active).toBe(false);
      expect(manager.size).toBe(0);
      expect(manager.isTrackedMessage('m1')).toBe(false);
    });

    it('is idempotent', () => {
      const { manager } = setup();
      manager.start('group-1', 'm1');
      manager.start('group-2', 'm2');

      manager.stop('group-1');
      expect(() => manager.stop('group-1')).not.toThrow();

      expect(manager.size).toBe(1);
      expect(manager.isTrackedMessage('m2')).toBe(true);
    });

    it('discards the verdict of an evaluation that was in flight', async () => {
      const { manager, evaluator, willingness } = setup();
      const pending = deferred<boolean>();
      evaluator.evaluate.mockReturnValueOnce(pending.promise);
      manager.start('group-1', 'm1');
      manager.feed('group-1', message('Alice', 'hello?'));

      await vi.advanceTimersByTimeAsync(2_000);
      expect(evaluator.evaluate).toHaveBeenCalledTimes(1);
      expect(evaluator.evaluate.mock.calls[0]?.[1]?.aborted).toBe(false);

      manager.stop('group-1');
      expect(evaluator.evaluate.mock.calls[0]?.[1]?.aborted).toBe(true);
      pending.resolve(true);
      await vi.advanceTimersByTimeAsync(0);

      expect(willingness.setWillingness).not.toHaveBeenCalled();
      expect(manager.size).toBe(0);
    });
  });

  describe('feed()', () => {
    it('ignores conversations without a tracker', () => {
      const { manager } = setup();
      expect(() => manager.feed('group-9', message('Alice', 'hi'))).not.toThrow();
      expect(manager.size).toBe(0);
    });

    it('collects every message fed while the tracker is active', () => {
      const { manager } = setup({ maxMessages: 10 });
      manager.start('group-1', 'm1');

      manager.feed('group-1', message('Alice', 'one'));
      manager.feed('group-1', message('Bob', 'two'));
      manager.feed('group-1', message('Alice', 'three'));

      expect(manager.getTracker('group-1')?.collected.map((m) => m.plainText)).toEqual([
        'one',
        'two',
        'three',
      ]);
    });

    it('does not reach a stopped tracker', () => {
      const { manager } = setup();
      manager.start('group-1', 'm1');
      const tracker = manager.getTracker('group-1');
      manager.feed('group-1', message('Alice', 'one'));

      manager.stop('group-1');
      manager.feed('group-1', message('Alice', 'two'));

      expect(tracker?.collected).toHaveLength(1);
    });
  });

  describe('background loop', () => {
    it('re-arms on a negative verdict and replies after the message cap is hit', async () => {
      const { manager, evaluator, willingness } = setup();
      evaluator.evaluate.mockResolvedValueOnce(false).mockResolvedValueOnce(true);
      const t0 = Date.now();

      manager.start('group-1', 'm1');
      const tracker = manager.getTracker('group-1');

      await vi.advanceTimersByTimeAsync(500);
      manager.feed('group-1', message('Alice', 'anyone here?'));

      await vi.advanceTimersByTimeAsync(1_500);
      expect(evaluator.evaluate).toHaveBeenCalledTimes(1);
      expect(evaluator.evaluate.mock.calls[0]?.[0]).toBe('Alice: anyone here?');
      expect(manager.getTracker('group-1')).toBe(tracker);
      expect(tracker?.collected).toEqual([]);
      expect(tracker?.windowStart).toBe(t0 + 2_000);
      expect(tracker?.restarts).toBe(1);

      manager.feed('group-1', message('Bob', 'first'));
      await vi.advanceTimersByTimeAsync(100);
      manager.feed('group-1', message('Carol', 'second'));
      await vi.advanceTimersByTimeAsync(100);
      manager.feed('group-1', message('Bob', 'third'));

      await vi.advanceTimersByTimeAsync(700);
      expect(evaluator.evaluate).toHaveBeenCalledTimes(1);

      // Next poll sees the cap, well before the 2s timeout
      await vi.advanceTimersByTimeAsync(100);
      expect(evaluator.evaluate).toHaveBeenCalledTimes(2);
      expect(evaluator.evaluate.mock.calls[1]?.[0]).toBe('Bob: first\nCarol: second\nBob: third');
      expect(willingness.setWillingness).toHaveBeenCalledWith('group-1', 2);
      expect(tracker?.active).toBe(false);
      expect(manager.size).toBe(0);
      expect(manager.isTrackedMessage('m1')).toBe(false);
    });

    it('closes an empty window without evaluating', async () => {
      const { manager, evaluator } = setup();
      manager.start('group-1', 'm1');

      await vi.advanceTimersByTimeAsync(2_000);

      expect(evaluator.evaluate).not.toHaveBeenCalled();
      expect(manager.size).toBe(0);
    });

    it('closes after one evaluation when restarts are disabled', async () => {
      const { manager, evaluator, willingness } = setup({ maxRestarts: 0 });
      manager.start('group-1', 'm1');
      manager.feed('group-1', message('Alice', 'lol'));

      await vi.advanceTimersByTimeAsync(2_000);

      expect(evaluator.evaluate).toHaveBeenCalledTimes(1);
      expect(willingness.setWillingness).not.toHaveBeenCalled();
      expect(manager.size).toBe(0);
    });

    it('stops re-arming once the restart budget is spent', async () => {
      const { manager, evaluator } = setup({ maxRestarts: 1 });
      manager.start('group-1', 'm1');
      manager.feed('group-1', message('Alice', 'one'));

      await vi.advanceTimersByTimeAsync(2_000);
      expect(manager.getTracker('group-1')?.restarts).toBe(1);

      manager.feed('group-1', message('Alice', 'two'));
      await vi.advanceTimersByTimeAsync(2_000);

      expect(evaluator.evaluate).toHaveBeenCalledTimes(2);
      expect(manager.size).toBe(0);
    });

    it('survives an evaluator failure and keeps watching', async () => {
      const { manager, evaluator, willingness } = setup();
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      evaluator.evaluate.mockRejectedValueOnce(new Error('upstream timeout'));
      manager.start('group-1', 'm1');
      manager.feed('group-1', message('Alice', 'hello?'));

      await vi.advanceTimersByTimeAsync(2_000);

      expect(error).toHaveBeenCalledTimes(1);
      expect(willingness.setWillingness).not.toHaveBeenCalled();
      expect(manager.getTracker('group-1')?.active).toBe(true);
      expect(manager.getTracker('group-1')?.restarts).toBe(1);
    });

    it('removes the tracker when the willingness sink throws', async () => {
      const { evaluator } = setup();
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      evaluator.evaluate.mockResolvedValue(true);
      const manager = new FollowUpManager(
        {
          enabled: true,
          timeoutMs: 2_000,
          maxMessages: 3,
          maxRestarts: null,
          pollIntervalMs: 1_000,
          replyWillingness: 2,
        },
        {
          evaluator,
          willingness: {
            setWillingness: () => {
              throw new Error('willingness store offline');
            },
          },
        }
      );
      manager.start('group-1', 'm1');
      const tracker = manager.getTracker('group-1');
      manager.feed('group-1', message('Alice', 'bot?'));

      await vi.advanceTimersByTimeAsync(2_000);
      for (let i = 0; i < 10; i++) {
        manager.feed('group-1', message('Alice', `again ${String(i)}`));
      }

      expect(error).toHaveBeenCalledTimes(1);
      expect(manager.size).toBe(0);
      expect(manager.isTrackedMessage('m1')).toBe(false);
      expect(tracker?.state).toBe('terminated');
      expect(tracker?.collected).toHaveLength(1);
    });

    it('removes the tracker when closing the window throws', async () => {
      const { manager, evaluator } = setup();
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const broken: FollowUpMessage = {
        plainText: 'hello?',
        get sender(): MessageSender {
          throw new Error('sender lookup failed');
        },
      };
      manager.start('group-1', 'm1');
      const tracker = manager.getTracker('group-1');
      manager.feed('group-1', broken);

      await vi.advanceTimersByTimeAsync(2_000);

      expect(error).toHaveBeenCalledTimes(1);
      expect(evaluator.evaluate).not.toHaveBeenCalled();
      expect(tracker?.active).toBe(false);
      expect(manager.size).toBe(0);
      expect(manager.isTrackedMessage('m1')).toBe(false);
    });

    it('leaves the newer tracker alone when replaced during evaluation', async () => {
      const { manager, evaluator, willingness } = setup();
      const pending = deferred<boolean>();
      evaluator.evaluate.mockReturnValueOnce(pending.promise);
      manager.start('group-1', 'm1');
      manager.feed('group-1', message('Alice', 'hello?'));

      await vi.advanceTimersByTimeAsync(2_000);
      manager.start('group-1', 'm2');
      const replacement = manager.getTracker('group-1');

      pending.resolve(true);
      await vi.advanceTimersByTimeAsync(0);

      expect(willingness.setWillingness).not.toHaveBeenCalled();
      expect(manager.getTracker('group-1')).toBe(replacement);
      expect(replacement?.active).toBe(true);
      expect(manager.isTrackedMessage('m2')).toBe(true);
    });
  });

  describe('shutdown()', () => {
    it('stops every tracker', async () => {
      const { manager } = setup();
      manager.start('group-1', 'm1');
      manager.start('group-2', 'm2');
      const trackers = [manager.getTracker('group-1'), manager.getTracker('group-2')];

      await manager.shutdown();

      expect(manager.size).toBe(0);
      expect(trackers.map((tracker) => tracker?.active)).toEqual([false, false]);
    });

    it('gives up waiting on an evaluator that ignores its abort signal', async () => {
      const { manager, evaluator } = setup();
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      evaluator.evaluate.mockReturnValueOnce(new Promise<boolean>(() => undefined));
      manager.start('group-1', 'm1');
      manager.feed('group-1', message('Alice', 'hello?'));
      await vi.advanceTimersByTimeAsync(2_000);
      expect(evaluator.evaluate).toHaveBeenCalledTimes(1);

      let done = false;
      const shutdown = manager.shutdown(1_000).then(() => {
        done = true;
      });
      await vi.advanceTimersByTimeAsync(999);
      expect(done).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await shutdown;

      expect(manager.size).toBe(0);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });
});
