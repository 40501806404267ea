import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { z } from 'zod';

import { BackpressureError, errorMessage, isFatal } from './errors.js';
import type { HandoffController } from './handoff.js';
import { ingestDirectory } from './knowledge/ingest.js';
import type { KnowledgeStore } from './knowledge/knowledge-store.js';
import { logger } from './logger.js';
import type { ConversationMemory } from './memory/conversation-memory.js';
import type { Orchestrator } from './orchestrator.js';

export interface WebServerDeps {
  orchestrator: Orchestrator;
  memory: ConversationMemory;
  handoff: HandoffController;
  knowledge: KnowledgeStore;
  knowledgeDir: string;
  apiToken: string;
  bridgeConnected?: () => boolean;
  now?: () => number;
}

export const ChatRequestSchema = z.object({
  threadId: z.string().trim().min(1).max(200),
  text: z.string().trim().min(1).max(10_000),
});

/** True when no token is configured or the header carries it. */
export function isAuthorized(header: string | undefined, apiToken: string): boolean {
  if (!apiToken) return true;
  if (!header?.startsWith('Bearer ')) return false;
  return header.slice('Bearer '.length).trim() === apiToken;
}

/**
 * Per-thread message stamps. Two API messages for one thread in the same
 * millisecond still get distinct, increasing stamps, so the inbound
 * deduplicator never mistakes the second for a redelivery.
 */
export function createTimestamper(now: () => number = Date.now): (threadId: string) => number {
  const last = new Map<string, number>();
  return (threadId) => {
    const stamp = Math.max(now(), (last.get(threadId) ?? 0) + 1);
    last.set(threadId, stamp);
    return stamp;
  };
}

function authMiddleware(apiToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!isAuthorized(req.headers.authorization, apiToken)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}

export function createApp(deps: WebServerDeps): express.Express {
  const app = express();
  const stamp = createTimestamper(deps.now);
  app.use(express.json({ limit: '256kb' }));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      bridge: deps.bridgeConnected?.() ?? false,
      knowledgeChunks: deps.knowledge.size,
    });
  });

  app.use('/api', authMiddleware(deps.apiToken));

  // Run one message through the engine and wait for the reply
  app.post('/api/chat', async (req, res, next) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'threadId and text are required' });
      return;
    }
    try {
      const outcome = await deps.orchestrator.submit({ ...parsed.data, timestamp: stamp(parsed.data.threadId) });
      if (!outcome) {
        res.status(409).json({ error: 'Message dropped as duplicate or stale' });
        return;
      }
      res.json({
        response: outcome.response ?? null,
        intent: outcome.intent ?? null,
        phase: outcome.phase,
        paused: outcome.paused ?? false,
      });
    } catch (err) {
      if (err instanceof BackpressureError) {
        res.status(429).json({ error: 'Too many pending messages for this thread' });
        return;
      }
      next(err);
    }
  });

  app.get('/api/threads', (_req, res) => {
    res.json({ threads: deps.memory.threads() });
  });

  app.get('/api/threads/:id', (req, res) => {
    const state = deps.memory.peek(req.params.id);
    if (!state) {
      res.status(404).json({ error: 'Thread not found' });
      return;
    }
    res.json({ ...state, mode: deps.handoff.status(req.params.id).mode });
  });

  app.post('/api/threads/:id/pause', (req, res) => {
    res.json(deps.handoff.humanReplyDetected(req.params.id));
  });

  app.post('/api/threads/:id/resume', (req, res) => {
    res.json(deps.handoff.resume(req.params.id));
  });

  app.post('/api/knowledge/reindex', async (_req, res, next) => {
    try {
      const report = await ingestDirectory(deps.knowledge, deps.knowledgeDir);
      res.json({ ...report, chunks: deps.knowledge.size });
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err: errorMessage(err) }, 'API request failed');
    const status = isFatal(err) ? 503 : 500;
    res.status(status).json({ error: 'Internal error' });
  });

  return app;
}

export function startWebServer(port: number, deps: WebServerDeps): http.Server {
  const server = http.createServer(createApp(deps));
  server.listen(port, () => {
    logger.info({ port }, 'HTTP API listening');
  });
  return server;
}
