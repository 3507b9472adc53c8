import type { ConversationMessage, MessageRole } from '../../types/index.js';

/**
 * ConversationWindow - bounded per-session conversation memory
 *
 * - In-memory only
 * - Holds at most `maxMessages` messages; the oldest is evicted first
 */
export class ConversationWindow {
  private messages: ConversationMessage[] = [];

  constructor(public readonly maxMessages: number = 20) {
    if (maxMessages < 1) {
      throw new Error(`ConversationWindow needs room for at least one message (got ${maxMessages})`);
    }
  }

  add(role: MessageRole, content: string, timestamp: number = Date.now()): void {
    this.messages.push({ role, content, timestamp });
    if (this.messages.length > this.maxMessages) {
      this.messages.splice(0, this.messages.length - this.maxMessages);
    }
  }

  /**
   * Most recent messages, oldest first.
   * @param limit - Only the last `limit` messages
   */
  recent(limit?: number): ConversationMessage[] {
    const copy = this.messages.map(message => ({ ...message }));
    if (limit === undefined || limit >= copy.length) return copy;
    return copy.slice(copy.length - limit);
  }

  get size(): number {
    return this.messages.length;
  }
}
