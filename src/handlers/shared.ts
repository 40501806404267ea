import type { z } from 'zod';

import type { CapabilityResult, CompletionCapability, CompletionContext } from '../capabilities.js';
import { TIMEZONE } from '../config.js';
import { errorMessage, FALLBACK_MESSAGES, HandlerFailure, isFatal } from '../errors.js';
import { parseJsonReply } from '../json-reply.js';
import { logger } from '../logger.js';
import { retryCapability } from '../retry.js';
import type { ConversationState } from '../types.js';
import type { HandlerContext } from './types.js';

/**
 * Failures other than fatal ones and aborts become HandlerFailure, so the
 * user gets an apology instead of the raw error.
 */
function asHandlerFailure(err: unknown, what: string, signal: AbortSignal): unknown {
  if (isFatal(err) || signal.aborted || err instanceof HandlerFailure) return err;
  return new HandlerFailure(`${what}: ${errorMessage(err)}`, FALLBACK_MESSAGES.handler, {
    cause: err,
  });
}

export async function completeOrFail(
  completion: CompletionCapability,
  prompt: string,
  context: HandlerContext,
  options: Omit<CompletionContext, 'signal'> = {},
): Promise<string> {
  try {
    return await completion.complete(prompt, { ...options, signal: context.signal });
  } catch (err) {
    throw asHandlerFailure(err, 'Completion failed', context.signal);
  }
}

/**
 * Ask the model for a JSON object and validate it. Null when the reply
 * holds no usable object.
 */
export async function extractFields<S extends z.ZodTypeAny>(
  completion: CompletionCapability,
  prompt: string,
  schema: S,
  context: HandlerContext,
): Promise<z.output<S> | null> {
  const reply = await completeOrFail(completion, prompt, context, {
    system: 'You extract structured fields from chat messages. Answer with one JSON object only.',
  });
  const fields = parseJsonReply(reply, schema);
  if (fields === null) {
    logger.debug({ threadId: context.threadId }, 'Extraction reply was not valid JSON');
  }
  return fields;
}

/**
 * Run a capability call and unwrap its data. Retryable failures are tried
 * again with backoff; a failure that persists, or a thrown error, becomes
 * HandlerFailure with a plain-language message.
 */
export async function callCapability<T>(
  action: string,
  call: () => Promise<CapabilityResult<T>>,
  context: HandlerContext,
): Promise<T> {
  let result: CapabilityResult<T>;
  try {
    result = await retryCapability(call, { signal: context.signal, label: action });
  } catch (err) {
    throw asHandlerFailure(err, `Capability call "${action}" threw`, context.signal);
  }
  if (result.ok) return result.data;

  logger.warn(
    { threadId: context.threadId, action, summary: result.summary, retryable: result.retryable },
    'Capability call failed',
  );
  const userMessage = result.retryable
    ? FALLBACK_MESSAGES.handler
    : `Sorry, I couldn't ${action}. ${result.summary}.`;
  throw new HandlerFailure(`${action}: ${result.summary}`, userMessage);
}

/** Rolling summary plus the last `count` non-system turns, as prompt text. */
export function historyBlock(state: Readonly<ConversationState>, count: number): string {
  const recent = state.turns.filter((t) => t.role !== 'system').slice(-count);
  const parts: string[] = [];
  if (state.summary) parts.push(`<summary>${state.summary}</summary>`);
  for (const turn of recent) {
    parts.push(`<turn role="${turn.role}">${turn.content}</turn>`);
  }
  return parts.length > 0 ? parts.join('\n') : 'No earlier conversation.';
}

export function formatDateTime(iso: string, timeZone: string = TIMEZONE): string {
  return new Date(iso).toLocaleString('en-US', {
    timeZone,
    dateStyle: 'medium',
    timeStyle: 'short',
  });
}

export function nowLine(now: number, timeZone: string = TIMEZONE): string {
  return `Current date and time: ${new Date(now).toISOString()} (user timezone ${timeZone}).`;
}

/** ISO string for a parseable date, else null. */
export function toIsoDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}
