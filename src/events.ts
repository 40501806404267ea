import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type {
  ConversationMode,
  CycleOutcome,
  CyclePhase,
  OutboundMessage,
  Task,
} from './types.js';

export type DropReason = 'duplicate' | 'stale' | 'backpressure';
export type HandoffReason = 'human_reply' | 'resume' | 'timeout';

export interface EngineEvents {
  'inbound.accepted': { threadId: string; timestamp: number };
  'inbound.dropped': { threadId: string; timestamp: number; reason: DropReason };
  'cycle.transition': { cycleId: string; threadId: string; from: CyclePhase; to: CyclePhase };
  'cycle.completed': CycleOutcome;
  outbound: OutboundMessage;
  'handoff.changed': {
    threadId: string;
    mode: ConversationMode;
    pauseUntil: string | null;
    reason: HandoffReason;
  };
  'task.flagged_urgent': { threadId: string; task: Task };
  'automation.completed': { threadId: string; taskId: number; ok: boolean; summary: string };
}

export type EventName = keyof EngineEvents;
export type EventListener<K extends EventName> = (payload: EngineEvents[K]) => void | Promise<void>;

type ListenerMap = { [K in EventName]?: Set<EventListener<K>> };

/**
 * In-process publish/subscribe. Listeners run synchronously in
 * subscription order; a throwing or rejecting listener is logged and never
 * reaches the publisher.
 */
export class EventBus {
  private readonly listeners: ListenerMap = {};

  on<K extends EventName>(event: K, listener: EventListener<K>): () => void {
    const listeners: { [P in K]?: Set<EventListener<P>> } = this.listeners;
    let set = listeners[event];
    if (!set) {
      set = new Set<EventListener<K>>();
      listeners[event] = set;
    }
    set.add(listener);
    return () => this.off(event, listener);
  }

  off<K extends EventName>(event: K, listener: EventListener<K>): void {
    this.listeners[event]?.delete(listener);
  }

  emit<K extends EventName>(event: K, payload: EngineEvents[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        const result = listener(payload);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            logger.error({ event, err: errorMessage(err) }, 'Event listener rejected');
          });
        }
      } catch (err) {
        logger.error({ event, err: errorMessage(err) }, 'Event listener threw');
      }
    }
  }

  listenerCount(event: EventName): number {
    return this.listeners[event]?.size ?? 0;
  }
}
