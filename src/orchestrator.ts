/**
 * Per-message processing cycle.
 *
 * RECEIVED → ROUTED → DISPATCHED → RESPONDED → PERSISTED, or ERRORED from
 * any non-terminal phase. Messages for one thread run one at a time on its
 * lane; threads run concurrently. Each cycle carries a deadline; a cycle
 * that misses it is abandoned, its late result discarded, and the user
 * gets a "try again" reply.
 */

import { CYCLE_DEADLINE, KNOWLEDGE_TOP_K } from './config.js';
import { InboundDeduplicator } from './dedup.js';
import {
  BackpressureError,
  DeadlineExceeded,
  errorMessage,
  FALLBACK_MESSAGES,
  HandlerFailure,
  isFatal,
  PersistenceFailure,
  RetrievalFailure,
} from './errors.js';
import type { EventBus } from './events.js';
import type { HandoffController } from './handoff.js';
import type { HandlerContext, HandlerRegistry, RetrievalOutcome } from './handlers/index.js';
import { ThreadLanes } from './lanes.js';
import { logger, preview } from './logger.js';
import type { ConversationMemory } from './memory/conversation-memory.js';
import type { Classification } from './router.js';
import type {
  CycleOutcome,
  CyclePhase,
  InboundMessage,
  Intent,
  RetrievalResult,
  Turn,
} from './types.js';

export interface IntentClassifier {
  classify(message: string, history: readonly Turn[], signal?: AbortSignal): Promise<Classification>;
}

export interface KnowledgeSearch {
  search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalResult[]>;
}

export interface OrchestratorDeps {
  memory: ConversationMemory;
  router: IntentClassifier;
  handlers: HandlerRegistry;
  handoff: HandoffController;
  knowledge: KnowledgeSearch;
  bus: EventBus;
  lanes?: ThreadLanes;
  dedup?: InboundDeduplicator;
  /** Fatal capability or configuration errors end up here after the fallback reply. */
  onFatal?: (err: Error) => void;
}

export interface OrchestratorOptions {
  deadlineMs?: number;
  topK?: number;
  now?: () => number;
}

const TRANSITIONS: Record<CyclePhase, readonly CyclePhase[]> = {
  RECEIVED: ['ROUTED', 'PERSISTED', 'ERRORED'],
  ROUTED: ['DISPATCHED', 'ERRORED'],
  DISPATCHED: ['RESPONDED', 'ERRORED'],
  RESPONDED: ['PERSISTED', 'ERRORED'],
  PERSISTED: [],
  ERRORED: [],
};

class Cycle {
  phase: CyclePhase = 'RECEIVED';
  intent: Intent | undefined;

  constructor(
    readonly id: string,
    readonly threadId: string,
    private readonly bus: EventBus,
  ) {}

  get terminal(): boolean {
    return this.phase === 'PERSISTED' || this.phase === 'ERRORED';
  }

  to(next: CyclePhase): void {
    const from = this.phase;
    if (!TRANSITIONS[from].includes(next)) {
      throw new Error(`Illegal cycle transition ${from} → ${next}`);
    }
    this.phase = next;
    logger.debug({ threadId: this.threadId, cycleId: this.id, from, to: next }, 'Cycle transition');
    this.bus.emit('cycle.transition', { cycleId: this.id, threadId: this.threadId, from, to: next });
  }
}

/** Settle with `work`, or reject with the signal's reason once it aborts. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

function newCycleId(): string {
  return `cyc-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

export class Orchestrator {
  private readonly lanes: ThreadLanes;
  private readonly dedup: InboundDeduplicator;
  private readonly deadlineMs: number;
  private readonly topK: number;
  private readonly now: () => number;
  private closed = false;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.lanes = deps.lanes ?? new ThreadLanes();
    this.dedup = deps.dedup ?? new InboundDeduplicator(undefined, this.now);
    this.deadlineMs = options.deadlineMs ?? CYCLE_DEADLINE;
    this.topK = options.topK ?? KNOWLEDGE_TOP_K;
  }

  /**
   * Accept an inbound event and run its cycle on the thread's lane.
   * Resolves null when the event is a duplicate, stale, or arrives after
   * shutdown began. Rejects with BackpressureError when the lane is full.
   * Events turned away by back-pressure or lost to a persistence failure
   * are forgotten by the deduplicator, so the transport may redeliver them.
   */
  async submit(message: InboundMessage): Promise<CycleOutcome | null> {
    const { threadId, timestamp } = message;
    if (this.closed) {
      logger.warn({ threadId }, 'Orchestrator shutting down, message ignored');
      return null;
    }

    const verdict = this.dedup.check(message);
    if (!verdict.accept) {
      logger.info({ threadId, timestamp, reason: verdict.reason }, 'Inbound message dropped');
      this.deps.bus.emit('inbound.dropped', { threadId, timestamp, reason: verdict.reason });
      return null;
    }
    this.deps.bus.emit('inbound.accepted', { threadId, timestamp });

    let outcome: CycleOutcome;
    try {
      outcome = await this.lanes.enqueue(threadId, () => this.runCycle(message));
    } catch (err) {
      if (err instanceof BackpressureError) {
        this.dedup.forget(message);
        this.deps.bus.emit('inbound.dropped', { threadId, timestamp, reason: 'backpressure' });
      }
      throw err;
    }
    // Nothing was stored, so a redelivery must get a fresh cycle
    if (outcome.phase === 'ERRORED' && outcome.error === 'persistence') {
      this.dedup.forget(message);
    }
    return outcome;
  }

  /** Stop accepting messages and wait for every lane to finish. */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.lanes.drain();
  }

  private async runCycle(message: InboundMessage): Promise<CycleOutcome> {
    const cycle = new Cycle(newCycleId(), message.threadId, this.deps.bus);
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new DeadlineExceeded(this.deadlineMs)),
      this.deadlineMs,
    );

    logger.info(
      { threadId: cycle.threadId, cycleId: cycle.id, text: preview(message.text) },
      'Processing message',
    );

    let outcome: CycleOutcome;
    try {
      const work = this.process(message, cycle, controller.signal);
      work.catch((err: unknown) => {
        if (controller.signal.aborted) {
          logger.debug({ cycleId: cycle.id, err: errorMessage(err) }, 'Abandoned cycle settled late');
        }
      });
      outcome = await raceAbort(work, controller.signal);
    } catch (err) {
      outcome = await this.fail(message, cycle, err);
    } finally {
      clearTimeout(timer);
    }

    this.deps.bus.emit('cycle.completed', outcome);

    if (outcome.phase === 'PERSISTED' && !outcome.paused) {
      await this.compact(cycle.threadId);
    }
    return outcome;
  }

  private async process(
    message: InboundMessage,
    cycle: Cycle,
    signal: AbortSignal,
  ): Promise<CycleOutcome> {
    const { threadId, text } = message;
    const receivedAt = new Date(message.timestamp).toISOString();
    const state = this.deps.memory.load(threadId);

    if (this.deps.handoff.isPaused(threadId)) {
      await this.deps.memory.append(threadId, {
        role: 'user',
        content: text,
        timestamp: receivedAt,
        agentUsed: 'none',
      });
      cycle.to('PERSISTED');
      logger.info({ threadId, cycleId: cycle.id }, 'Thread paused, message logged without reply');
      return { cycleId: cycle.id, threadId, phase: 'PERSISTED', paused: true };
    }

    const route = await this.deps.router.classify(text, state.turns, signal);
    cycle.intent = route.intent;
    cycle.to('ROUTED');
    logger.info(
      { threadId, cycleId: cycle.id, intent: route.intent, confidence: route.confidence, source: route.source },
      'Message routed',
    );

    const handler = this.deps.handlers[route.intent];
    cycle.to('DISPATCHED');
    const reply = await handler.handle(text, this.handlerContext(threadId, state, signal));
    cycle.to('RESPONDED');

    // A late reply from an abandoned cycle must not reach the log
    signal.throwIfAborted();
    await this.deps.memory.append(
      threadId,
      { role: 'user', content: text, timestamp: receivedAt, agentUsed: route.intent },
      {
        role: 'assistant',
        content: reply.text,
        timestamp: new Date(this.now()).toISOString(),
        agentUsed: route.intent,
      },
    );
    cycle.to('PERSISTED');

    this.deps.bus.emit('outbound', { threadId, text: reply.text });
    return {
      cycleId: cycle.id,
      threadId,
      phase: 'PERSISTED',
      intent: route.intent,
      response: reply.text,
    };
  }

  private handlerContext(
    threadId: string,
    state: HandlerContext['state'],
    signal: AbortSignal,
  ): HandlerContext {
    return {
      threadId,
      state,
      signal,
      bus: this.deps.bus,
      retrieve: async (query: string): Promise<RetrievalOutcome> => {
        try {
          return { results: await this.deps.knowledge.search(query, this.topK, signal), degraded: false };
        } catch (err) {
          if (!(err instanceof RetrievalFailure)) throw err;
          logger.warn({ threadId, err: err.message }, 'Knowledge store unavailable, continuing without it');
          return { results: [], degraded: true };
        }
      },
    };
  }

  private async fail(message: InboundMessage, cycle: Cycle, err: unknown): Promise<CycleOutcome> {
    const { threadId } = message;
    if (!cycle.terminal) cycle.to('ERRORED');
    const base = { cycleId: cycle.id, threadId, phase: 'ERRORED' as const, intent: cycle.intent };

    if (err instanceof PersistenceFailure) {
      logger.error({ threadId, cycleId: cycle.id, err: err.message }, 'Persistence failed, no reply sent');
      return { ...base, error: err.kind };
    }

    let reply: string;
    let kind: string;
    if (isFatal(err)) {
      logger.fatal({ threadId, cycleId: cycle.id, err: err.message }, 'Fatal error in cycle');
      this.deps.bus.emit('outbound', { threadId, text: FALLBACK_MESSAGES.fatal });
      this.deps.onFatal?.(err);
      return { ...base, response: FALLBACK_MESSAGES.fatal, error: err.kind };
    } else if (err instanceof DeadlineExceeded) {
      logger.warn({ threadId, cycleId: cycle.id, deadlineMs: err.deadlineMs }, 'Cycle deadline exceeded');
      reply = FALLBACK_MESSAGES.deadline;
      kind = err.kind;
    } else if (err instanceof HandlerFailure) {
      logger.warn({ threadId, cycleId: cycle.id, err: err.message }, 'Handler failed');
      reply = err.userMessage;
      kind = err.kind;
    } else {
      logger.error({ threadId, cycleId: cycle.id, err: errorMessage(err) }, 'Unexpected cycle error');
      reply = FALLBACK_MESSAGES.handler;
      kind = 'internal';
    }

    const agentUsed = cycle.intent ?? 'none';
    try {
      await this.deps.memory.append(
        threadId,
        {
          role: 'user',
          content: message.text,
          timestamp: new Date(message.timestamp).toISOString(),
          agentUsed,
        },
        { role: 'assistant', content: reply, timestamp: new Date(this.now()).toISOString(), agentUsed },
      );
    } catch (appendErr) {
      logger.warn({ threadId, err: errorMessage(appendErr) }, 'Could not log failed exchange');
    }

    this.deps.bus.emit('outbound', { threadId, text: reply });
    return { ...base, response: reply, error: kind };
  }

  /** Best-effort compaction, bounded by the cycle deadline so the lane moves on. */
  private async compact(threadId: string): Promise<void> {
    const signal = AbortSignal.timeout(this.deadlineMs);
    try {
      await raceAbort(this.deps.memory.summarizeIfNeeded(threadId, signal), signal);
    } catch (err) {
      if (isFatal(err)) {
        logger.fatal({ threadId, err: err.message }, 'Fatal error during summarization');
        this.deps.onFatal?.(err);
        return;
      }
      logger.warn({ threadId, err: errorMessage(err) }, 'Summarization failed');
    }
  }
}
