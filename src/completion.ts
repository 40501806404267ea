/**
 * Completion capability backed by the Claude Agent SDK.
 *
 * Each call is a single tool-less turn: prompt in, final `result` text out.
 * SDK failures are sorted into transient (retried) and fatal (bad
 * credentials, refused access) before they leave this module.
 */

import { query } from '@anthropic-ai/claude-agent-sdk';

import type { CompletionCapability, CompletionContext } from './capabilities.js';
import { COMPLETION_MODEL, STORE_DIR } from './config.js';
import {
  errorMessage,
  FatalCapabilityError,
  TransientCapabilityError,
} from './errors.js';
import { logger } from './logger.js';
import { withRetry } from './retry.js';

const FATAL_PATTERNS = [
  /invalid api key/i,
  /authentication/i,
  /unauthori[sz]ed/i,
  /\b401\b/,
  /\b403\b/,
  /permission denied/i,
  /please run \/login/i,
];

export function classifyCompletionError(
  err: unknown,
): TransientCapabilityError | FatalCapabilityError {
  if (err instanceof FatalCapabilityError || err instanceof TransientCapabilityError) {
    return err;
  }
  const message = errorMessage(err);
  if (FATAL_PATTERNS.some((p) => p.test(message))) {
    return new FatalCapabilityError(`Completion rejected: ${message}`, { cause: err });
  }
  return new TransientCapabilityError(`Completion failed: ${message}`, { cause: err });
}

export class AgentSdkCompletion implements CompletionCapability {
  constructor(
    private readonly defaultModel: string = COMPLETION_MODEL,
    private readonly cwd: string = STORE_DIR,
  ) {}

  async complete(prompt: string, context: CompletionContext = {}): Promise<string> {
    return withRetry(() => this.runOnce(prompt, context), {
      signal: context.signal,
      label: 'completion',
    });
  }

  private async runOnce(prompt: string, context: CompletionContext): Promise<string> {
    const abortController = new AbortController();
    const onAbort = () => abortController.abort();
    context.signal?.addEventListener('abort', onAbort, { once: true });

    let resultText: string | null = null;
    try {
      for await (const message of query({
        prompt,
        options: {
          model: context.model ?? this.defaultModel,
          cwd: this.cwd,
          systemPrompt: context.system,
          allowedTools: [],
          settingSources: [],
          maxTurns: 1,
          abortController,
        },
      })) {
        if (message.type !== 'result') continue;
        if (message.subtype === 'success' && !message.is_error) {
          resultText = message.result;
        } else if (message.subtype === 'success') {
          throw classifyCompletionError(new Error(message.result));
        } else {
          throw new TransientCapabilityError(`Completion ended with ${message.subtype}`);
        }
      }
    } catch (err) {
      if (context.signal?.aborted) throw context.signal.reason;
      throw classifyCompletionError(err);
    } finally {
      context.signal?.removeEventListener('abort', onAbort);
    }

    if (resultText === null) {
      throw new TransientCapabilityError('Completion returned no result');
    }
    logger.debug({ length: resultText.length }, 'Completion received');
    return resultText.trim();
  }
}
