/**
 * Per-conversation reply willingness
 *
 * The follow-up watcher only writes to this signal. Whatever decides to
 * generate a reply reads it for the conversation the next message arrives on.
 */

export interface WillingnessSink {
  setWillingness(conversationId: string, value: number): void;
}

export class WillingnessRegistry implements WillingnessSink {
  private values = new Map<string, number>();

  constructor(private readonly defaultValue = 0) {}

  setWillingness(conversationId: string, value: number): void {
    this.values.set(conversationId, value);
  }

  getWillingness(conversationId: string): number {
    return this.values.get(conversationId) ?? this.defaultValue;
  }

  reset(conversationId: string): void {
    this.values.delete(conversationId);
  }

  clear(): void {
    this.values.clear();
  }
}
