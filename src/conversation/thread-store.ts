/**
 * In-memory conversation threads keyed by (userId, sessionId), evicted after a
 * period of inactivity.
 *
 * Every method is synchronous, so each one runs to completion on the event loop
 * and the periodic sweep never interleaves with a request's read or append.
 * The sweep scans the whole map in one pass; that is fine for the bounded
 * number of live sessions one process holds.
 */

import { createLogger, type Logger } from "../logger.js";
import type { ConversationThread, ThreadMessage } from "./types.js";

export interface ThreadStoreOptions {
  /** Idle time after which a thread is evicted */
  ttlSeconds?: number;
  /** Clock, in epoch ms; injectable for tests */
  now?: () => number;
  logger?: Logger;
}

export const DEFAULT_THREAD_TTL_SECONDS = 3600;

function threadKey(userId: string, sessionId: string): string {
  return JSON.stringify([userId, sessionId]);
}

export class ThreadStore {
  private readonly threads = new Map<string, ConversationThread>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: ThreadStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_THREAD_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger("threads");
  }

  /** Return the thread for the key, creating it if absent; either way marks it accessed */
  getOrCreate(userId: string, sessionId: string): ConversationThread {
    const key = threadKey(userId, sessionId);
    const now = this.now();
    const existing = this.threads.get(key);
    if (existing) {
      existing.lastAccess = now;
      return existing;
    }
    const thread: ConversationThread = { userId, sessionId, createdAt: now, lastAccess: now, messages: [] };
    this.threads.set(key, thread);
    this.log.debug({ userId, sessionId }, "thread created");
    return thread;
  }

  /**
   * Append messages in order and mark the thread accessed. A thread evicted
   * since it was read is recreated; it loses its history but nothing else.
   */
  appendAndTouch(userId: string, sessionId: string, ...messages: ThreadMessage[]): ConversationThread {
    const thread = this.getOrCreate(userId, sessionId);
    thread.messages.push(...messages);
    return thread;
  }

  delete(userId: string, sessionId: string): boolean {
    return this.threads.delete(threadKey(userId, sessionId));
  }

  /** Evict threads idle longer than the TTL; returns how many were removed */
  sweep(now: number = this.now()): number {
    let evicted = 0;
    for (const [key, thread] of this.threads) {
      if (now - thread.lastAccess > this.ttlMs) {
        this.threads.delete(key);
        evicted++;
      }
    }
    if (evicted > 0) {
      this.log.info({ evicted, remaining: this.threads.size }, "threads swept");
    }
    return evicted;
  }

  /** Run sweep() every intervalSeconds; returns a function that stops it */
  startSweeper(intervalSeconds: number): () => void {
    const timer = setInterval(() => this.sweep(), intervalSeconds * 1000);
    timer.unref();
    return () => clearInterval(timer);
  }

  keys(): Array<{ userId: string; sessionId: string }> {
    return [...this.threads.values()].map((t) => ({ userId: t.userId, sessionId: t.sessionId }));
  }

  get size(): number {
    return this.threads.size;
  }
}
