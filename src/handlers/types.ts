import type { Capabilities, CompletionCapability } from '../capabilities.js';
import type { EventBus } from '../events.js';
import type { TaskStore } from '../memory/task-store.js';
import type { ConversationState, Intent, RetrievalResult } from '../types.js';

export interface RetrievalOutcome {
  results: RetrievalResult[];
  /** Knowledge store was unreachable; results are empty for that reason. */
  degraded: boolean;
}

export interface HandlerContext {
  readonly threadId: string;
  readonly state: Readonly<ConversationState>;
  readonly signal: AbortSignal;
  readonly bus: EventBus;
  retrieve(query: string): Promise<RetrievalOutcome>;
}

export interface HandlerReply {
  text: string;
  /** The handler asked the user for missing details instead of acting. */
  clarification?: boolean;
  degraded?: boolean;
}

export interface CapabilityHandler {
  readonly intent: Intent;
  handle(message: string, context: HandlerContext): Promise<HandlerReply>;
}

export interface HandlerDeps {
  completion: CompletionCapability;
  capabilities: Capabilities;
  tasks: TaskStore;
  now?: () => number;
}

export type HandlerRegistry = Record<Intent, CapabilityHandler>;
