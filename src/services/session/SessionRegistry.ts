/**
 * SessionRegistry - in-memory store of conversation contexts keyed by session id
 *
 * Injected wherever it is needed; there is no process-wide instance.
 * Mutation of a single session is serialized through `runExclusive`.
 */

import { randomUUID } from 'crypto';
import {
  ConversationState,
  type ContextSnapshot,
  type ConversationContext,
} from '../../types/index.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { SessionLock } from '../concurrency/SessionLock.js';
import { ConversationWindow } from '../memory/ConversationWindow.js';

export interface SessionRegistryOptions {
  historyLimit?: number;
  logger?: Logger;
  now?: () => number;
}

export class SessionRegistry {
  private contexts = new Map<string, ConversationContext>();
  private lock = new SessionLock();
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.historyLimit = options.historyLimit ?? 20;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  get(sessionId: string): ConversationContext | undefined {
    return this.contexts.get(sessionId);
  }

  getOrCreate(sessionId: string): ConversationContext {
    const existing = this.contexts.get(sessionId);
    if (existing) return existing;

    const timestamp = this.now();
    const context: ConversationContext = {
      sessionId,
      state: ConversationState.INITIAL,
      history: new ConversationWindow(this.historyLimit),
      currentAvailableSlots: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.contexts.set(sessionId, context);
    this.logger.debug(`🆕 Session created: ${sessionId}`);
    return context;
  }

  /** Register a context under a freshly generated id. */
  create(): ConversationContext {
    return this.getOrCreate(randomUUID());
  }

  delete(sessionId: string): boolean {
    const removed = this.contexts.delete(sessionId);
    if (removed) {
      this.logger.debug(`🗑️ Session cleared: ${sessionId}`);
    }
    return removed;
  }

  has(sessionId: string): boolean {
    return this.contexts.has(sessionId);
  }

  get size(): number {
    return this.contexts.size;
  }

  /**
   * Run `fn` against the session's context with exclusive access.
   * The context is created on first use.
   */
  runExclusive<T>(sessionId: string, fn: (context: ConversationContext) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(sessionId, async () => {
      const context = this.getOrCreate(sessionId);
      try {
        return await fn(context);
      } finally {
        context.updatedAt = this.now();
      }
    });
  }

  /**
   * Drop sessions idle for longer than `maxAgeMs`. Sessions with a turn in
   * flight are skipped.
   * @returns number of sessions removed
   */
  pruneIdle(maxAgeMs: number): number {
    const cutoff = this.now() - maxAgeMs;
    let removed = 0;

    for (const [sessionId, context] of this.contexts.entries()) {
      if (context.updatedAt < cutoff && !this.lock.isLocked(sessionId)) {
        this.contexts.delete(sessionId);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.info(`🧹 Pruned ${removed} idle session(s)`);
    }
    return removed;
  }

  snapshot(sessionId: string): ContextSnapshot | undefined {
    const context = this.contexts.get(sessionId);
    return context ? toSnapshot(context) : undefined;
  }
}

export function toSnapshot(context: ConversationContext): ContextSnapshot {
  return {
    sessionId: context.sessionId,
    state: context.state,
    meetingRequest: context.meetingRequest ? { ...context.meetingRequest } : undefined,
    history: context.history.recent(),
    currentAvailableSlots: [...context.currentAvailableSlots],
    lastUserInput: context.lastUserInput,
  };
}
