/**
 * Builds the conversation text handed to the necessity evaluator
 */

import type { FollowUpMessage } from './types.js';

/**
 * One `sender: content` line per message, in arrival order. Messages with no
 * text or no sender are left out of the text.
 */
export function buildFollowUpContext(messages: readonly FollowUpMessage[]): string {
  const lines: string[] = [];

  for (const msg of messages) {
    if (msg.plainText === undefined || !msg.sender) {
      continue;
    }
    lines.push(`${msg.sender.displayName}: ${msg.plainText}`);
  }

  return lines.join('\n');
}

export function previewMessage(msg: FollowUpMessage, length = 30): string {
  const text = msg.plainText ?? '';
  return text.length > length ? `${text.substring(0, length)}...` : text;
}
