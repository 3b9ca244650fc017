/**
 * Type definitions for follow-up tracking
 */

export interface MessageSender {
  id: string;
  displayName: string;
}

/**
 * An inbound message as seen by a follow-up window. Messages without text or
 * sender still count toward the window's message cap.
 */
export interface FollowUpMessage {
  messageId?: string;
  plainText?: string;
  sender?: MessageSender;
}

export type TrackerState = 'collecting' | 'evaluating' | 'terminated';

/**
 * Result of closing a window:
 * - `closed`: no reply needed, tracker terminated
 * - `will-reply`: willingness raised, tracker terminated
 * - `restart`: no reply needed yet, window should be re-armed
 * - `cancelled`: nothing was decided (tracker stopped or not collecting)
 */
export type WindowOutcome = 'closed' | 'will-reply' | 'restart' | 'cancelled';

export interface WindowSettings {
  timeoutMs: number;
  maxMessages: number;
  /** Re-arms allowed after a negative verdict; null means no limit */
  maxRestarts: number | null;
  replyWillingness: number;
}

export interface FollowUpSettings extends WindowSettings {
  enabled: boolean;
  pollIntervalMs: number;
}

export type TaskRunner = (signal: AbortSignal) => Promise<void>;
