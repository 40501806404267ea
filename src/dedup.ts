import { DEDUP_WINDOW } from './config.js';
import type { DropReason } from './events.js';
import type { InboundMessage } from './types.js';

export type DedupVerdict = { accept: true } | { accept: false; reason: DropReason };

function dedupKey({ threadId, timestamp }: Pick<InboundMessage, 'threadId' | 'timestamp'>): string {
  return `${threadId}:${timestamp}`;
}

/**
 * At-least-once delivery guard keyed by (thread id, transport timestamp).
 * Events older than the window are dropped as stale; a key already seen
 * inside the window is dropped as a duplicate.
 */
export class InboundDeduplicator {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly windowMs: number = DEDUP_WINDOW,
    private readonly now: () => number = Date.now,
  ) {}

  check(message: Pick<InboundMessage, 'threadId' | 'timestamp'>): DedupVerdict {
    const now = this.now();
    this.evict(now);

    if (now - message.timestamp > this.windowMs) {
      return { accept: false, reason: 'stale' };
    }
    const key = dedupKey(message);
    if (this.seen.has(key)) {
      return { accept: false, reason: 'duplicate' };
    }
    this.seen.set(key, now);
    return { accept: true };
  }

  /** Release a key so a redelivery of the same event is accepted again. */
  forget(message: Pick<InboundMessage, 'threadId' | 'timestamp'>): void {
    this.seen.delete(dedupKey(message));
  }

  get size(): number {
    return this.seen.size;
  }

  private evict(now: number): void {
    for (const [key, acceptedAt] of this.seen) {
      if (now - acceptedAt > this.windowMs) this.seen.delete(key);
    }
  }
}
