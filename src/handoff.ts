/**
 * Human handoff: a thread goes PAUSED when an operator answers the user
 * directly on the transport, and returns to ACTIVE on an explicit resume or
 * once the operator has been quiet for the handoff timeout.
 */

import { HANDOFF_TIMEOUT } from './config.js';
import type { EventBus, HandoffReason } from './events.js';
import { logger } from './logger.js';
import type { ConversationMemory } from './memory/conversation-memory.js';
import type { ConversationMode } from './types.js';

export interface HandoffOptions {
  timeoutMs?: number;
  now?: () => number;
}

export interface HandoffStatus {
  mode: ConversationMode;
  pauseUntil: string | null;
}

export class HandoffController {
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly memory: ConversationMemory,
    private readonly bus?: EventBus,
    options: HandoffOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? HANDOFF_TIMEOUT;
    this.now = options.now ?? Date.now;
  }

  /**
   * Operator replied on the transport. Pauses the thread, or extends an
   * existing pause from this moment.
   */
  humanReplyDetected(threadId: string): HandoffStatus {
    const pauseUntil = new Date(this.now() + this.timeoutMs).toISOString();
    this.memory.setMode(threadId, 'PAUSED', pauseUntil);
    logger.info({ threadId, pauseUntil }, 'Thread paused for human operator');
    this.publish(threadId, 'PAUSED', pauseUntil, 'human_reply');
    return { mode: 'PAUSED', pauseUntil };
  }

  resume(threadId: string): HandoffStatus {
    this.memory.setMode(threadId, 'ACTIVE', null);
    logger.info({ threadId }, 'Thread resumed');
    this.publish(threadId, 'ACTIVE', null, 'resume');
    return { mode: 'ACTIVE', pauseUntil: null };
  }

  /**
   * Current mode, resuming the thread first if its pause has elapsed.
   */
  status(threadId: string): HandoffStatus {
    const state = this.memory.load(threadId);
    if (state.mode !== 'PAUSED') return { mode: 'ACTIVE', pauseUntil: null };

    const until = state.pauseUntil ? Date.parse(state.pauseUntil) : NaN;
    if (Number.isNaN(until) || until <= this.now()) {
      this.memory.setMode(threadId, 'ACTIVE', null);
      logger.info({ threadId }, 'Pause expired, thread resumed');
      this.publish(threadId, 'ACTIVE', null, 'timeout');
      return { mode: 'ACTIVE', pauseUntil: null };
    }
    return { mode: 'PAUSED', pauseUntil: state.pauseUntil };
  }

  isPaused(threadId: string): boolean {
    return this.status(threadId).mode === 'PAUSED';
  }

  private publish(
    threadId: string,
    mode: ConversationMode,
    pauseUntil: string | null,
    reason: HandoffReason,
  ): void {
    this.bus?.emit('handoff.changed', { threadId, mode, pauseUntil, reason });
  }
}
