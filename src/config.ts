import path from 'path';

export const ASSISTANT_NAME = process.env.ASSISTANT_NAME || 'Threadline';

const PROJECT_ROOT = process.cwd();

export const STORE_DIR = path.resolve(PROJECT_ROOT, 'store');
export const CONVERSATION_DB_PATH =
  process.env.CONVERSATION_DB_PATH || path.join(STORE_DIR, 'conversations.db');
export const KNOWLEDGE_DB_PATH =
  process.env.KNOWLEDGE_DB_PATH || path.join(STORE_DIR, 'knowledge.db');
export const KNOWLEDGE_DIR = path.resolve(
  PROJECT_ROOT,
  process.env.KNOWLEDGE_DIR || 'knowledge_base',
);
export const ROUTING_CONFIG_PATH = path.resolve(
  PROJECT_ROOT,
  process.env.ROUTING_CONFIG_PATH || 'routing.yaml',
);

// Conversation memory
export const MAX_HISTORY_TOKENS = parseInt(
  process.env.MAX_HISTORY_TOKENS || '2000',
  10,
);
export const KEEP_RECENT_TURNS = parseInt(
  process.env.KEEP_RECENT_TURNS || '10',
  10,
);
export const SUMMARY_ENABLED = process.env.SUMMARY_ENABLED !== 'false'; // true by default

// Knowledge store
export const CHUNK_SIZE = parseInt(process.env.CHUNK_SIZE || '1000', 10);
export const CHUNK_OVERLAP = parseInt(process.env.CHUNK_OVERLAP || '200', 10);
export const KNOWLEDGE_TOP_K = parseInt(process.env.KNOWLEDGE_TOP_K || '3', 10);
export const MIN_RELEVANCE = parseFloat(process.env.MIN_RELEVANCE || '0.5');

// Human handoff: bot stays quiet this long after the operator's last message
export const HANDOFF_TIMEOUT = parseInt(
  process.env.HANDOFF_TIMEOUT || '60000',
  10,
);

// Orchestration
export const CYCLE_DEADLINE = parseInt(process.env.CYCLE_DEADLINE || '30000', 10);
export const DEDUP_WINDOW = parseInt(process.env.DEDUP_WINDOW || '30000', 10);
export const LANE_QUEUE_LIMIT = parseInt(
  process.env.LANE_QUEUE_LIMIT || '20',
  10,
);

// Retries for external calls (1s, 2s, 4s...)
export const RETRY_ATTEMPTS = parseInt(process.env.RETRY_ATTEMPTS || '3', 10);
export const RETRY_BACKOFF_BASE = parseInt(
  process.env.RETRY_BACKOFF_BASE || '1000',
  10,
);

// Models
export const COMPLETION_MODEL =
  process.env.COMPLETION_MODEL || 'claude-sonnet-4-5-20250929';
export const ROUTER_MODEL =
  process.env.ROUTER_MODEL || 'claude-haiku-4-5-20251001';
export const EMBEDDING_MODEL =
  process.env.EMBEDDING_MODEL || 'text-embedding-3-small';

// Transport bridge + HTTP API
export const BRIDGE_URL = process.env.BRIDGE_URL || 'ws://localhost:8765';
export const BRIDGE_ENABLED = process.env.BRIDGE_ENABLED !== 'false';
export const WEB_PORT = parseInt(process.env.WEB_PORT || '8000', 10);
export const API_TOKEN = process.env.API_TOKEN || '';

export const TIMEZONE =
  process.env.TZ || Intl.DateTimeFormat().resolvedOptions().timeZone;
