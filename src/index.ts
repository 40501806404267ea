import http from 'http';

import { UrgentTaskAutomation } from './automation.js';
import { BridgeTransport } from './bridge-transport.js';
import { disabledCapabilities } from './capabilities.js';
import { AgentSdkCompletion } from './completion.js';
import {
  API_TOKEN,
  ASSISTANT_NAME,
  BRIDGE_ENABLED,
  CHUNK_OVERLAP,
  CHUNK_SIZE,
  CONVERSATION_DB_PATH,
  KNOWLEDGE_DB_PATH,
  KNOWLEDGE_DIR,
  MIN_RELEVANCE,
  WEB_PORT,
} from './config.js';
import { errorMessage, isFatal } from './errors.js';
import { EventBus } from './events.js';
import { HandoffController } from './handoff.js';
import { createHandlers } from './handlers/index.js';
import { OpenAIEmbedder } from './knowledge/embeddings.js';
import { ingestDirectory, readDocuments } from './knowledge/ingest.js';
import { KnowledgeStore } from './knowledge/knowledge-store.js';
import { logger } from './logger.js';
import { ConversationMemory } from './memory/conversation-memory.js';
import { openConversationDatabase } from './memory/db.js';
import { TaskStore } from './memory/task-store.js';
import { Orchestrator } from './orchestrator.js';
import { IntentRouter } from './router.js';
import { loadRoutingConfig } from './routing-config.js';
import { startWebServer } from './web-server.js';

interface Runtime {
  orchestrator: Orchestrator;
  memory: ConversationMemory;
  knowledge: KnowledgeStore;
  bridge: BridgeTransport | null;
  automation: UrgentTaskAutomation;
  server: http.Server;
}

let runtime: Runtime | null = null;

async function syncKnowledge(knowledge: KnowledgeStore): Promise<void> {
  try {
    await ingestDirectory(knowledge, KNOWLEDGE_DIR);
  } catch (err) {
    // Without embeddings the engine still runs; knowledge queries fall back
    logger.warn({ err: errorMessage(err) }, 'Knowledge sync skipped');
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const completion = new AgentSdkCompletion();
  const knowledge = new KnowledgeStore(new OpenAIEmbedder(), {
    dbPath: KNOWLEDGE_DB_PATH,
    chunkSize: CHUNK_SIZE,
    chunkOverlap: CHUNK_OVERLAP,
    minRelevance: MIN_RELEVANCE,
  });
  knowledge.init();

  // One-shot index maintenance
  if (args.includes('--ingest') || args.includes('--rebuild-index')) {
    if (args.includes('--rebuild-index')) {
      const results = await knowledge.rebuild(readDocuments(KNOWLEDGE_DIR));
      logger.info({ sources: results.length, chunks: knowledge.size }, 'Knowledge index rebuilt');
    } else {
      await ingestDirectory(knowledge, KNOWLEDGE_DIR);
    }
    knowledge.close();
    process.exit(0);
  }

  logger.info({ assistant: ASSISTANT_NAME }, 'Starting');

  const routing = loadRoutingConfig();
  const db = openConversationDatabase(CONVERSATION_DB_PATH);
  const memory = new ConversationMemory(db, completion);
  const tasks = new TaskStore(db);
  const bus = new EventBus();
  const capabilities = disabledCapabilities();
  const handoff = new HandoffController(memory, bus);

  const automation = new UrgentTaskAutomation(bus, capabilities);
  automation.start();

  const orchestrator = new Orchestrator({
    memory,
    router: new IntentRouter(completion, routing),
    handlers: createHandlers({ completion, capabilities, tasks }),
    handoff,
    knowledge,
    bus,
    onFatal: (err) => {
      logger.fatal({ err: err.message }, 'Fatal error, shutting down');
      void gracefulShutdown('fatal', 1);
    },
  });

  await syncKnowledge(knowledge);

  const bridge = BRIDGE_ENABLED
    ? new BridgeTransport(bus, {
        onInbound: (message) => orchestrator.submit(message),
        onHumanReply: (threadId) => handoff.humanReplyDetected(threadId),
      })
    : null;
  bridge?.start();

  const server = startWebServer(WEB_PORT, {
    orchestrator,
    memory,
    handoff,
    knowledge,
    knowledgeDir: KNOWLEDGE_DIR,
    apiToken: API_TOKEN,
    bridgeConnected: () => bridge?.connected ?? false,
  });

  runtime = { orchestrator, memory, knowledge, bridge, automation, server };
  logger.info({ port: WEB_PORT, bridge: BRIDGE_ENABLED }, 'Ready');
}

// Graceful shutdown
async function gracefulShutdown(signal: string, exitCode = 0): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, stopping...');
  const current = runtime;
  runtime = null;
  if (current) {
    try {
      current.bridge?.stop();
      current.automation.stop();
      await current.orchestrator.shutdown();
      await new Promise<void>((resolve) => current.server.close(() => resolve()));
      current.knowledge.close();
      current.memory.close();
      logger.info('All services stopped');
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Error during shutdown');
    }
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err), fatal: isFatal(err) }, 'Failed to start');
  process.exit(1);
});
