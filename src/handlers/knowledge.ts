import type { SearchHit } from '../capabilities.js';
import { errorMessage, isFatal } from '../errors.js';
import { logger } from '../logger.js';
import { retryCapability } from '../retry.js';
import { completeOrFail, historyBlock } from './shared.js';
import type { CapabilityHandler, HandlerContext, HandlerDeps, HandlerReply } from './types.js';

export const NO_KNOWLEDGE_REPLY =
  "I don't have information about that yet. Could you rephrase, or ask me something else?";

const WEB_FALLBACK_RESULTS = 3;

/**
 * Answers from the knowledge base; falls back to web search, then to an
 * honest "don't know". Never fails because the index is empty.
 */
export class KnowledgeHandler implements CapabilityHandler {
  readonly intent = 'knowledge_query' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async handle(message: string, context: HandlerContext): Promise<HandlerReply> {
    const { results, degraded } = await context.retrieve(message);

    if (results.length > 0) {
      const sources = results
        .map((r, i) => `<source n="${i + 1}" file="${r.chunk.sourcePath}">\n${r.chunk.text}\n</source>`)
        .join('\n');
      const prompt = `Knowledge base excerpts:
${sources}

Conversation so far:
${historyBlock(context.state, 3)}

Question:
<message>${message}</message>

Answer using only the excerpts. If they do not contain the answer, say so.`;
      const text = await completeOrFail(this.deps.completion, prompt, context, {
        system: 'You answer customer questions from the provided knowledge base excerpts. Be brief and precise.',
      });
      return { text, degraded };
    }

    const hits = await this.searchWeb(message, context);
    if (hits.length > 0) {
      const lines = hits.map((h) => `- ${h.title}: ${h.snippet} (${h.url})`);
      return {
        text: `I couldn't find this in our documents, but here is what I found online:\n${lines.join('\n')}`,
        degraded,
      };
    }

    return { text: NO_KNOWLEDGE_REPLY, degraded };
  }

  private async searchWeb(message: string, context: HandlerContext): Promise<SearchHit[]> {
    try {
      const result = await retryCapability(
        () =>
          this.deps.capabilities.search.query({
            query: message,
            kind: 'web',
            maxResults: WEB_FALLBACK_RESULTS,
          }),
        { signal: context.signal, label: 'web fallback' },
      );
      if (result.ok) return result.data;
      logger.debug({ threadId: context.threadId, summary: result.summary }, 'Web fallback unavailable');
      return [];
    } catch (err) {
      if (isFatal(err) || context.signal.aborted) throw err;
      logger.warn({ threadId: context.threadId, err: errorMessage(err) }, 'Web fallback failed');
      return [];
    }
  }
}
