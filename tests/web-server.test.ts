import fs from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { CompletionContext } from '../src/capabilities.js';
import { BackpressureError, FatalCapabilityError } from '../src/errors.js';
import {
  ChatRequestSchema,
  createApp,
  createTimestamper,
  isAuthorized,
} from '../src/web-server.js';
import { createTestEngine, FakeCompletion, ROUTER_TEST_MODEL, type EngineOptions } from './helpers/fakes.js';

const TOKEN = 'test-secret';
const CHAT_ROUTE = '{"intent": "general_chat", "confidence": 0.3}';

function echoCompletion(
  reply: (message: string, context: CompletionContext) => string | Promise<string> = (m) => `echo: ${m}`,
): FakeCompletion {
  return new FakeCompletion((prompt, context) =>
    context.model === ROUTER_TEST_MODEL
      ? CHAT_ROUTE
      : reply(prompt.match(/<message>([\s\S]*)<\/message>/)?.[1] ?? '', context),
  );
}

describe('isAuthorized', () => {
  it('allows everything when no token is configured', () => {
    expect(isAuthorized(undefined, '')).toBe(true);
  });

  it('requires the configured bearer token', () => {
    expect(isAuthorized('Bearer test-secret', 'test-secret')).toBe(true);
    expect(isAuthorized('Bearer wrong', 'test-secret')).toBe(false);
    expect(isAuthorized('test-secret', 'test-secret')).toBe(false);
    expect(isAuthorized(undefined, 'test-secret')).toBe(false);
  });
});

describe('ChatRequestSchema', () => {
  it('trims the thread id and text', () => {
    expect(ChatRequestSchema.parse({ threadId: ' web-1 ', text: ' Hello ' })).toEqual({
      threadId: 'web-1',
      text: 'Hello',
    });
  });

  it('rejects blank fields', () => {
    expect(ChatRequestSchema.safeParse({ threadId: 'web-1', text: '   ' }).success).toBe(false);
    expect(ChatRequestSchema.safeParse({ text: 'Hello' }).success).toBe(false);
  });
});

describe('createTimestamper', () => {
  it('keeps stamps increasing within a thread when the clock stands still', () => {
    const stamp = createTimestamper(() => 1_000);
    expect([stamp('a'), stamp('a'), stamp('b'), stamp('a')]).toEqual([1_000, 1_001, 1_000, 1_002]);
  });

  it('follows the clock once it moves past the last stamp', () => {
    let now = 1_000;
    const stamp = createTimestamper(() => now);
    stamp('a');
    stamp('a');
    now = 5_000;
    expect(stamp('a')).toBe(5_000);
  });
});

describe('HTTP API', () => {
  const servers: http.Server[] = [];
  const dirs: string[] = [];

  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(
      servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve()))),
    );
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  async function start(options: EngineOptions & { clock?: () => number } = {}) {
    const engine = createTestEngine({ completion: echoCompletion(), ...options });
    const knowledgeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'api-kb-'));
    dirs.push(knowledgeDir);
    const app = createApp({
      orchestrator: engine.orchestrator,
      memory: engine.memory,
      handoff: engine.handoff,
      knowledge: engine.knowledge,
      knowledgeDir,
      apiToken: TOKEN,
      now: options.clock,
    });

    const server = http.createServer(app);
    servers.push(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server did not bind a port');
    const baseUrl = `http://127.0.0.1:${address.port}`;

    const call = (route: string, init: { method?: string; body?: unknown; token?: string | null } = {}) => {
      const headers: Record<string, string> = { 'content-type': 'application/json' };
      const token = init.token === undefined ? TOKEN : init.token;
      if (token !== null) headers.authorization = `Bearer ${token}`;
      return fetch(`${baseUrl}${route}`, {
        method: init.method ?? (init.body === undefined ? 'GET' : 'POST'),
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
      });
    };
    const chat = (threadId: string, text: string) => call('/api/chat', { body: { threadId, text } });

    return { engine, knowledgeDir, call, chat };
  }

  it('answers the health check without a token', async () => {
    const { call } = await start();
    const res = await call('/api/health', { token: null });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', bridge: false, knowledgeChunks: 0 });
  });

  it('rejects requests without the bearer token', async () => {
    const { call } = await start();

    const missing = await call('/api/threads', { token: null });
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: 'Unauthorized' });

    const wrong = await call('/api/threads', { token: 'wrong' });
    expect(wrong.status).toBe(401);
  });

  it('runs a chat message through the engine', async () => {
    const { chat, engine } = await start();

    const res = await chat('web-1', 'Hello');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      response: 'echo: Hello',
      intent: 'general_chat',
      phase: 'PERSISTED',
      paused: false,
    });
    expect(engine.memory.load('web-1').turns.map((t) => t.content)).toEqual(['Hello', 'echo: Hello']);
  });

  it('accepts two messages for one thread sent in the same millisecond', async () => {
    const fixed = Date.now();
    const { chat, engine } = await start({ clock: () => fixed });

    const [first, second] = await Promise.all([chat('web-1', 'one'), chat('web-1', 'two')]);

    expect([first.status, second.status]).toEqual([200, 200]);
    const turns = engine.memory.load('web-1').turns;
    expect(turns).toHaveLength(4);
    expect(turns.filter((t) => t.role === 'user').map((t) => t.content).sort()).toEqual(['one', 'two']);
  });

  it('rejects a malformed chat body', async () => {
    const { call } = await start();
    const res = await call('/api/chat', { body: { threadId: 'web-1' } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'threadId and text are required' });
  });

  it('answers 409 when the engine drops the message', async () => {
    const { chat, engine } = await start({ clock: () => Date.now() - 120_000 });

    const res = await chat('web-1', 'Hello');

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: 'Message dropped as duplicate or stale' });
    expect(engine.memory.peek('web-1')).toBeNull();
  });

  it('answers 429 when the thread lane is full', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { chat, engine } = await start({
      completion: echoCompletion(async (message) => {
        await gate;
        return `echo: ${message}`;
      }),
      laneLimit: 1,
    });
    let accepted = 0;
    engine.bus.on('inbound.accepted', () => {
      accepted++;
    });

    const first = chat('web-1', 'one');
    await vi.waitFor(() => expect(accepted).toBe(1));
    const second = chat('web-1', 'two');
    await vi.waitFor(() => expect(accepted).toBe(2));

    const third = await chat('web-1', 'three');
    expect(third.status).toBe(429);
    expect(await third.json()).toEqual({ error: 'Too many pending messages for this thread' });

    release();
    expect((await first).status).toBe(200);
    expect((await second).status).toBe(200);
  });

  it('maps an unexpected failure to 500 and a fatal one to 503', async () => {
    const { chat, engine } = await start();
    vi.spyOn(engine.orchestrator, 'submit')
      .mockRejectedValueOnce(new Error('disk full'))
      .mockRejectedValueOnce(new FatalCapabilityError('bad credentials'));

    const failed = await chat('web-1', 'Hello');
    expect(failed.status).toBe(500);
    expect(await failed.json()).toEqual({ error: 'Internal error' });

    const fatal = await chat('web-1', 'Hello');
    expect(fatal.status).toBe(503);
    expect(await fatal.json()).toEqual({ error: 'Internal error' });
  });

  it('passes a back-pressure rejection from the engine through as 429', async () => {
    const { chat, engine } = await start();
    vi.spyOn(engine.orchestrator, 'submit').mockRejectedValueOnce(new BackpressureError('web-1', 1));

    const res = await chat('web-1', 'Hello');

    expect(res.status).toBe(429);
  });

  it('lists threads and returns one thread with its turns', async () => {
    const { call, chat } = await start();
    await chat('web-1', 'Hello');

    const list = await call('/api/threads');
    const { threads }: { threads: Array<{ threadId: string }> } = await list.json();
    expect(threads.map((t) => t.threadId)).toEqual(['web-1']);

    const one = await call('/api/threads/web-1');
    expect(one.status).toBe(200);
    const thread: { mode: string; turns: Array<{ content: string }> } = await one.json();
    expect(thread.mode).toBe('ACTIVE');
    expect(thread.turns.map((t) => t.content)).toEqual(['Hello', 'echo: Hello']);
  });

  it('answers 404 for a thread it has never seen', async () => {
    const { call } = await start();
    const res = await call('/api/threads/nobody');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Thread not found' });
  });

  it('pauses and resumes a thread', async () => {
    const { call, chat } = await start();

    const paused = await call('/api/threads/web-1/pause', { method: 'POST' });
    expect((await paused.json()).mode).toBe('PAUSED');

    const whilePaused = await chat('web-1', 'Anyone there?');
    expect(await whilePaused.json()).toEqual({
      response: null,
      intent: null,
      phase: 'PERSISTED',
      paused: true,
    });

    const resumed = await call('/api/threads/web-1/resume', { method: 'POST' });
    expect(await resumed.json()).toEqual({ mode: 'ACTIVE', pauseUntil: null });

    const afterResume = await chat('web-1', 'Hello again');
    expect((await afterResume.json()).response).toBe('echo: Hello again');
  });

  it('reindexes the knowledge directory', async () => {
    const { call, knowledgeDir } = await start();
    fs.writeFileSync(path.join(knowledgeDir, 'faq.md'), 'Refunds are processed within 7 days.');

    const first = await call('/api/knowledge/reindex', { method: 'POST' });
    expect(await first.json()).toEqual({ indexed: 1, unchanged: 0, removed: 0, failed: [], chunks: 1 });

    const again = await call('/api/knowledge/reindex', { method: 'POST' });
    expect(await again.json()).toEqual({ indexed: 0, unchanged: 1, removed: 0, failed: [], chunks: 1 });
  });
});
