import { z } from 'zod';

import { callCapability, completeOrFail, extractFields } from './shared.js';
import type { CapabilityHandler, HandlerContext, HandlerDeps, HandlerReply } from './types.js';

const MAX_RESULTS = 5;

const SearchFields = z.object({
  query: z.string().trim().min(1),
  kind: z.enum(['web', 'news']).default('web'),
  maxResults: z.number().int().min(1).max(MAX_RESULTS).default(3),
});

export class SearchHandler implements CapabilityHandler {
  readonly intent = 'search' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async handle(message: string, context: HandlerContext): Promise<HandlerReply> {
    const prompt = `Request:
<message>${message}</message>

Turn it into a search as JSON:
{"query": search terms, "kind": "web" or "news", "maxResults": 1-${MAX_RESULTS}}`;

    const fields = (await extractFields(this.deps.completion, prompt, SearchFields, context)) ?? {
      query: message,
      kind: 'web' as const,
      maxResults: 3,
    };

    const hits = await callCapability(
      'run the search',
      () => this.deps.capabilities.search.query(fields),
      context,
    );
    if (hits.length === 0) {
      return { text: `I couldn't find anything about "${fields.query}".` };
    }

    const listing = hits
      .map((h, i) => `<result n="${i + 1}" title="${h.title}">${h.snippet}</result>`)
      .join('\n');
    const summary = await completeOrFail(
      this.deps.completion,
      `Search results for "${fields.query}":
${listing}

Original request:
<message>${message}</message>

Summarize what the results say in a few sentences.`,
      context,
      { system: 'You summarize search results for a chat user. Be brief and neutral.' },
    );

    const sources = hits.map((h) => `- ${h.title}: ${h.url}`).join('\n');
    return { text: `${summary}\n\nSources:\n${sources}` };
  }
}
