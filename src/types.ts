export const INTENTS = [
  'knowledge_query',
  'schedule',
  'send_mail',
  'search',
  'task',
  'general_chat',
] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: string): value is Intent {
  return (INTENTS as readonly string[]).includes(value);
}

export type TurnRole = 'user' | 'assistant' | 'system';

// 'none' marks user turns logged while a human operator had the thread
export type AgentUsed = Intent | 'summary' | 'none';

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: string; // ISO
  readonly agentUsed: AgentUsed;
}

export type ConversationMode = 'ACTIVE' | 'PAUSED';

export interface ConversationState {
  threadId: string;
  turns: readonly Turn[];
  mode: ConversationMode;
  pauseUntil: string | null; // ISO
  summary: string;
}

export interface Attachment {
  mimeType: string;
  filename?: string;
  url?: string;
}

export interface InboundMessage {
  threadId: string;
  text: string;
  attachments?: Attachment[];
  timestamp: number; // epoch ms, as stamped by the transport
}

export interface OutboundMessage {
  threadId: string;
  text: string;
}

export interface KnowledgeChunk {
  id: string;
  sourcePath: string;
  chunkIndex: number;
  text: string;
  embedding: Float32Array;
  contentHash: string;
}

export interface RetrievalResult {
  chunk: KnowledgeChunk;
  similarity: number;
}

export type CyclePhase =
  | 'RECEIVED'
  | 'ROUTED'
  | 'DISPATCHED'
  | 'RESPONDED'
  | 'PERSISTED'
  | 'ERRORED';

export interface CycleOutcome {
  cycleId: string;
  threadId: string;
  phase: 'PERSISTED' | 'ERRORED';
  intent?: Intent;
  response?: string;
  paused?: boolean;
  error?: string;
}

export type TaskPriority = 'low' | 'medium' | 'high' | 'urgent';
export type TaskStatus = 'pending' | 'completed';

export interface Task {
  id: number;
  threadId: string;
  title: string;
  description: string | null;
  priority: TaskPriority;
  status: TaskStatus;
  deadline: string | null; // ISO
  createdAt: string;
  completedAt: string | null;
}
