/**
 * Durable per-thread conversation log.
 *
 * All reads and writes go through SQLite; nothing about a conversation is
 * cached in process. `append` returns only after the transaction commits,
 * so a crash can always be recovered by re-reading the store.
 */

import type { CompletionCapability } from '../capabilities.js';
import { KEEP_RECENT_TURNS, MAX_HISTORY_TOKENS, SUMMARY_ENABLED } from '../config.js';
import { errorMessage, isFatal, PersistenceFailure } from '../errors.js';
import { logger } from '../logger.js';
import type { ConversationMode, ConversationState, Turn } from '../types.js';
import {
  compactTurns,
  ensureThread,
  getThread,
  getTurns,
  insertTurns,
  listThreads,
  openConversationDatabase,
  updateThreadMode,
  type ConversationDb,
  type StoredTurn,
  type ThreadRecord,
} from './db.js';

const TOKENS_PER_TURN_OVERHEAD = 4;

export interface ConversationMemoryOptions {
  maxHistoryTokens: number;
  keepRecentTurns: number;
  summaryEnabled: boolean;
}

/** Rough token count: 4 characters per token plus per-turn framing. */
export function estimateTokens(turns: readonly Turn[]): number {
  return turns.reduce(
    (sum, turn) => sum + Math.ceil(turn.content.length / 4) + TOKENS_PER_TURN_OVERHEAD,
    0,
  );
}

function formatTranscript(turns: readonly Turn[]): string {
  return turns.map((t) => `${t.role}: ${t.content}`).join('\n');
}

export class ConversationMemory {
  private readonly options: ConversationMemoryOptions;

  constructor(
    private readonly db: ConversationDb,
    private readonly completion: CompletionCapability,
    options: Partial<ConversationMemoryOptions> = {},
  ) {
    this.options = {
      maxHistoryTokens: options.maxHistoryTokens ?? MAX_HISTORY_TOKENS,
      keepRecentTurns: options.keepRecentTurns ?? KEEP_RECENT_TURNS,
      summaryEnabled: options.summaryEnabled ?? SUMMARY_ENABLED,
    };
  }

  static open(
    dbPath: string,
    completion: CompletionCapability,
    options?: Partial<ConversationMemoryOptions>,
  ): ConversationMemory {
    return new ConversationMemory(openConversationDatabase(dbPath), completion, options);
  }

  /**
   * Durably append turns in order. Rejects with PersistenceFailure if the
   * write does not commit.
   */
  async append(threadId: string, ...turns: Turn[]): Promise<void> {
    if (turns.length === 0) return;
    try {
      insertTurns(this.db, threadId, turns);
    } catch (err) {
      throw new PersistenceFailure(`Append to ${threadId} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Current state of a thread; the thread is created on first access. */
  load(threadId: string): ConversationState {
    try {
      ensureThread(this.db, threadId, new Date().toISOString());
      const thread = getThread(this.db, threadId);
      return {
        threadId,
        turns: getTurns(this.db, threadId),
        mode: thread?.mode ?? 'ACTIVE',
        pauseUntil: thread?.pauseUntil ?? null,
        summary: thread?.summary ?? '',
      };
    } catch (err) {
      throw new PersistenceFailure(`Load of ${threadId} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Like load, but null for a thread that has never been seen. */
  peek(threadId: string): ConversationState | null {
    const thread = getThread(this.db, threadId);
    if (!thread) return null;
    return {
      threadId,
      turns: getTurns(this.db, threadId),
      mode: thread.mode,
      pauseUntil: thread.pauseUntil,
      summary: thread.summary,
    };
  }

  threads(): ThreadRecord[] {
    return listThreads(this.db);
  }

  /** Sole writer of the handoff fields. */
  setMode(threadId: string, mode: ConversationMode, pauseUntil: string | null): void {
    try {
      ensureThread(this.db, threadId, new Date().toISOString());
      updateThreadMode(this.db, threadId, mode, pauseUntil);
    } catch (err) {
      throw new PersistenceFailure(`Mode update for ${threadId} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Compact the thread when its unsummarized turns exceed the token budget:
   * the previous summary and every unsummarized turn except the newest
   * `keepRecentTurns` become one summary turn. Returns whether it compacted.
   * Failures are logged and leave the history untouched.
   */
  async summarizeIfNeeded(threadId: string, signal?: AbortSignal): Promise<boolean> {
    if (!this.options.summaryEnabled) return false;

    const turns = getTurns(this.db, threadId);
    const live = turns.filter((t) => !t.isSummary);
    const tokens = estimateTokens(live);
    if (tokens <= this.options.maxHistoryTokens) return false;
    if (live.length <= this.options.keepRecentTurns) return false;

    const kept = new Set(live.slice(live.length - this.options.keepRecentTurns).map((t) => t.seq));
    const replaced = turns.filter((t) => !kept.has(t.seq));
    const previous = replaced.filter((t) => t.isSummary);
    const toSummarize = replaced.filter((t) => !t.isSummary);

    let summaryText: string;
    try {
      summaryText = await this.completion.complete(
        [
          'Summarize the earlier part of this conversation in a short paragraph.',
          'Keep names, dates, commitments and open questions. Write in the language of the conversation.',
          previous.length > 0
            ? `\nPrevious summary:\n${previous.map((t) => t.content).join('\n')}`
            : '',
          `\nConversation:\n${formatTranscript(toSummarize)}`,
        ].join('\n'),
        { signal },
      );
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.warn({ threadId, err: errorMessage(err) }, 'Summarization failed, keeping full history');
      return false;
    }
    if (signal?.aborted) {
      logger.warn({ threadId }, 'Summary arrived after its deadline, discarded');
      return false;
    }
    if (!summaryText) {
      logger.warn({ threadId }, 'Summarization returned nothing, keeping full history');
      return false;
    }

    const last: StoredTurn = replaced[replaced.length - 1];
    try {
      compactTurns(
        this.db,
        threadId,
        replaced.map((t) => t.seq),
        { role: 'system', content: summaryText, timestamp: last.timestamp, agentUsed: 'summary' },
      );
    } catch (err) {
      logger.warn({ threadId, err: errorMessage(err) }, 'Failed to store summary');
      return false;
    }

    logger.info(
      { threadId, replaced: replaced.length, kept: kept.size, tokensBefore: tokens },
      'Conversation compacted',
    );
    return true;
  }

  close(): void {
    this.db.close();
  }
}
