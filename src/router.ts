/**
 * Intent router: a keyword pass first, then a model classification when
 * the keywords are inconclusive.
 */

import { z } from 'zod';

import type { CompletionCapability } from './capabilities.js';
import { ROUTER_MODEL } from './config.js';
import { ClassificationFailure, errorMessage, isFatal } from './errors.js';
import { parseJsonReply } from './json-reply.js';
import { logger, preview } from './logger.js';
import { DEFAULT_ROUTING_CONFIG, type RoutingConfig } from './routing-config.js';
import { INTENTS, isIntent, type Intent, type Turn } from './types.js';

export type ClassificationSource = 'lexical' | 'semantic' | 'fallback';

export interface Classification {
  intent: Intent;
  confidence: number;
  source: ClassificationSource;
}

const INTENT_DESCRIPTIONS: Record<Intent, string> = {
  knowledge_query: 'a question the business knowledge base may answer (policies, prices, hours, FAQ)',
  schedule: 'create or change a meeting, appointment or calendar event',
  send_mail: 'write and send an email',
  search: 'look something up on the web or in the news',
  task: 'create, list, complete or delete to-do items and deadlines',
  general_chat: 'greetings, small talk, or anything else',
};

const SemanticReply = z.object({
  intent: z.string(),
  confidence: z.number().min(0).max(1),
});

/** Lower-case and strip diacritics so "Reunião" matches "reuniao". */
export function normalizeForMatch(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keyword: string): RegExp {
  const phrase = normalizeForMatch(keyword.trim())
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${phrase}(?![\\p{L}\\p{N}])`, 'u');
}

export class IntentRouter {
  private readonly patterns: Array<{ intent: Intent; pattern: RegExp }>;

  constructor(
    private readonly completion: CompletionCapability,
    private readonly config: RoutingConfig = DEFAULT_ROUTING_CONFIG,
    private readonly model: string = ROUTER_MODEL,
  ) {
    this.patterns = INTENTS.flatMap((intent) =>
      config.keywords[intent].map((keyword) => ({ intent, pattern: keywordPattern(keyword) })),
    );
  }

  /** Distinct intents whose keywords occur in the message, in declaration order. */
  lexicalMatches(message: string): Intent[] {
    const text = normalizeForMatch(message);
    const matched = new Set<Intent>();
    for (const { intent, pattern } of this.patterns) {
      if (pattern.test(text)) matched.add(intent);
    }
    return INTENTS.filter((intent) => matched.has(intent));
  }

  async classify(
    message: string,
    history: readonly Turn[],
    signal?: AbortSignal,
  ): Promise<Classification> {
    const candidates = this.config.lexicalEnabled ? this.lexicalMatches(message) : [];
    if (candidates.length === 1) {
      const confidence = this.config.lexicalConfidence;
      if (confidence < this.config.confidenceThreshold) {
        logger.debug({ raw: candidates[0], confidence }, 'Low-confidence lexical route, using general_chat');
        return { intent: 'general_chat', confidence, source: 'lexical' };
      }
      logger.debug({ intent: candidates[0], message: preview(message) }, 'Lexical route');
      return { intent: candidates[0], confidence, source: 'lexical' };
    }

    try {
      return await this.classifySemantic(message, history, candidates, signal);
    } catch (err) {
      if (isFatal(err) || signal?.aborted) throw err;
      const failure =
        err instanceof ClassificationFailure
          ? err
          : new ClassificationFailure(`Semantic classification failed: ${errorMessage(err)}`, {
              cause: err,
            });
      logger.warn(
        { err: failure.message, message: preview(message) },
        'Classification failed, defaulting to general_chat',
      );
      return { intent: 'general_chat', confidence: 0, source: 'fallback' };
    }
  }

  private async classifySemantic(
    message: string,
    history: readonly Turn[],
    candidates: Intent[],
    signal?: AbortSignal,
  ): Promise<Classification> {
    const reply = await this.completion.complete(this.buildPrompt(message, history, candidates), {
      model: this.model,
      system:
        'You classify chat messages for an assistant. Answer with one JSON object and nothing else.',
      signal,
    });

    const parsed = parseJsonReply(reply, SemanticReply);
    if (!parsed || !isIntent(parsed.intent)) {
      throw new ClassificationFailure(`Unusable classifier reply: ${preview(reply)}`);
    }

    if (parsed.confidence < this.config.confidenceThreshold) {
      logger.debug(
        { raw: parsed.intent, confidence: parsed.confidence },
        'Low-confidence route, using general_chat',
      );
      return { intent: 'general_chat', confidence: parsed.confidence, source: 'semantic' };
    }
    return { intent: parsed.intent, confidence: parsed.confidence, source: 'semantic' };
  }

  private buildPrompt(message: string, history: readonly Turn[], candidates: Intent[]): string {
    const recent = this.config.historyTurns > 0 ? history.slice(-this.config.historyTurns) : [];
    const historyBlock =
      recent.length > 0
        ? recent.map((t) => `<turn role="${t.role}">${t.content}</turn>`).join('\n')
        : 'No earlier turns.';
    const intentList = INTENTS.map((i) => `- "${i}": ${INTENT_DESCRIPTIONS[i]}`).join('\n');
    const hint =
      candidates.length > 1
        ? `\nKeyword hints point at several intents: ${candidates.join(', ')}.\n`
        : '';

    return `Available intents:
${intentList}

Recent conversation:
${historyBlock}
${hint}
Message to classify:
<message>${message}</message>

Reply with {"intent": "<one of the intents>", "confidence": <number between 0 and 1>}.`;
  }
}
