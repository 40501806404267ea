import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';

import { FatalCapabilityError, RetrievalFailure, TransientCapabilityError } from '../src/errors.js';
import { KnowledgeStore } from '../src/knowledge/knowledge-store.js';
import { ConceptEmbedder, inMemoryKnowledge } from './helpers/fakes.js';

const REFUND_POLICY = 'Refunds are processed within 7 days.';
const SHIPPING = 'We ship worldwide. Delivery takes 3 to 5 business days.';
const HOURS = 'We are open from 9 to 5, closed on Sundays.';
const OLD_REFUND_POLICY = 'Old policy: refunds take 30 days.';

/** Holds back embeddings of texts starting with "Old" until released. */
class HeldEmbedder extends ConceptEmbedder {
  release: () => void = () => {};
  private readonly held = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async embed(text: string): Promise<Float32Array> {
    if (text.startsWith('Old')) await this.held;
    return super.embed(text);
  }
}

describe('KnowledgeStore', () => {
  it('returns the most relevant chunk first', async () => {
    const store = inMemoryKnowledge();
    await store.ingest('refund-policy.txt', REFUND_POLICY);
    await store.ingest('shipping.txt', SHIPPING);
    await store.ingest('hours.txt', HOURS);

    const results = await store.search('How long do refunds take?', 3);
    expect(results.map((r) => r.chunk.sourcePath)).toEqual(['refund-policy.txt', 'shipping.txt']);
    expect(results[0].similarity).toBeCloseTo(1, 6);
    expect(results[0].chunk.text).toBe(REFUND_POLICY);
    // [1,2,0,0,0] against [0,2,2,0,0]
    expect(results[1].similarity).toBeCloseTo(4 / Math.sqrt(40), 6);
  });

  it('honors topK', async () => {
    const store = inMemoryKnowledge();
    await store.ingest('refund-policy.txt', REFUND_POLICY);
    await store.ingest('shipping.txt', SHIPPING);

    const results = await store.search('How long do refunds take?', 1);
    expect(results.map((r) => r.chunk.sourcePath)).toEqual(['refund-policy.txt']);
    expect(await store.search('How long do refunds take?', 0)).toEqual([]);
  });

  it('drops chunks below the relevance threshold', async () => {
    const store = inMemoryKnowledge();
    await store.ingest('hours.txt', HOURS);
    expect(await store.search('How long do refunds take?', 3)).toEqual([]);
  });

  it('answers an empty index without embedding the query', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);
    expect(await store.search('anything at all', 3)).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it('does not embed a blank query', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);
    await store.ingest('refund-policy.txt', REFUND_POLICY);
    const before = embedder.calls;
    expect(await store.search('   ', 3)).toEqual([]);
    expect(embedder.calls).toBe(before);
  });

  it('skips re-embedding unchanged documents', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);

    expect(await store.ingest('refund-policy.txt', REFUND_POLICY)).toEqual({
      sourcePath: 'refund-policy.txt',
      status: 'indexed',
      chunks: 1,
    });
    expect(embedder.calls).toBe(1);

    expect(await store.ingest('refund-policy.txt', REFUND_POLICY)).toEqual({
      sourcePath: 'refund-policy.txt',
      status: 'unchanged',
      chunks: 1,
    });
    expect(embedder.calls).toBe(1);

    const forced = await store.ingest('refund-policy.txt', REFUND_POLICY, true);
    expect(forced.status).toBe('indexed');
    expect(embedder.calls).toBe(2);
  });

  it('replaces the chunks of a changed document', async () => {
    const store = inMemoryKnowledge();
    await store.ingest('policy.txt', REFUND_POLICY);
    await store.ingest('policy.txt', SHIPPING);

    expect(store.size).toBe(1);
    const results = await store.search('shipping', 3);
    expect(results.map((r) => r.chunk.text)).toEqual([SHIPPING]);
  });

  it('removes a source from the index', async () => {
    const store = inMemoryKnowledge();
    await store.ingest('refund-policy.txt', REFUND_POLICY);
    await store.ingest('shipping.txt', SHIPPING);

    expect(await store.remove('shipping.txt')).toBe(true);
    expect(await store.remove('shipping.txt')).toBe(false);
    expect(store.sources()).toEqual(['refund-policy.txt']);
    const results = await store.search('How long do refunds take?', 3);
    expect(results.map((r) => r.chunk.sourcePath)).toEqual(['refund-policy.txt']);
  });

  it('rebuilds the whole index from the given documents', async () => {
    const store = inMemoryKnowledge();
    await store.ingest('old.txt', HOURS);

    const results = await store.rebuild([
      { sourcePath: 'refund-policy.txt', text: REFUND_POLICY },
      { sourcePath: 'shipping.txt', text: SHIPPING },
    ]);

    expect(results.map((r) => r.status)).toEqual(['indexed', 'indexed']);
    expect(store.sources()).toEqual(['refund-policy.txt', 'shipping.txt']);
    expect(store.size).toBe(2);
  });

  it('keeps the previous index when a rebuild fails', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);
    await store.ingest('refund-policy.txt', REFUND_POLICY);

    embedder.failWith = new TransientCapabilityError('rate limited');
    await expect(
      store.rebuild([{ sourcePath: 'shipping.txt', text: SHIPPING }]),
    ).rejects.toThrow('rate limited');

    expect(store.size).toBe(1);
    expect(store.sources()).toEqual(['refund-policy.txt']);
    embedder.failWith = null;
    const results = await store.search('How long do refunds take?', 3);
    expect(results[0].chunk.text).toBe(REFUND_POLICY);
  });

  it('lets the newest of two overlapping ingests win', async () => {
    const embedder = new HeldEmbedder();
    const store = inMemoryKnowledge(embedder);

    const older = store.ingest('faq.txt', OLD_REFUND_POLICY);
    const newer = await store.ingest('faq.txt', REFUND_POLICY);
    embedder.release();

    expect(newer.status).toBe('indexed');
    expect(await older).toEqual({ sourcePath: 'faq.txt', status: 'superseded', chunks: 0 });
    expect(store.size).toBe(1);
    const results = await store.search('How long do refunds take?', 3);
    expect(results.map((r) => r.chunk.text)).toEqual([REFUND_POLICY]);
    expect(await store.ingest('faq.txt', REFUND_POLICY)).toMatchObject({ status: 'unchanged' });
  });

  it('does not bring back a source removed while it was being indexed', async () => {
    const embedder = new HeldEmbedder();
    const store = inMemoryKnowledge(embedder);

    const pending = store.ingest('faq.txt', OLD_REFUND_POLICY);
    expect(await store.remove('faq.txt')).toBe(false);
    embedder.release();

    expect((await pending).status).toBe('superseded');
    expect(store.sources()).toEqual([]);
    expect(store.size).toBe(0);
  });

  it('wraps embedding failures during search in RetrievalFailure', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);
    await store.ingest('refund-policy.txt', REFUND_POLICY);

    embedder.failWith = new Error('embedding service offline');
    await expect(store.search('refunds', 3)).rejects.toBeInstanceOf(RetrievalFailure);
  });

  it('lets fatal embedding errors through unchanged', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);
    await store.ingest('refund-policy.txt', REFUND_POLICY);

    embedder.failWith = new FatalCapabilityError('missing key');
    await expect(store.search('refunds', 3)).rejects.toBeInstanceOf(FatalCapabilityError);
  });

  it('serves concurrent searches while a document is being indexed', async () => {
    const store = inMemoryKnowledge();
    await store.ingest('refund-policy.txt', REFUND_POLICY);

    const [, results] = await Promise.all([
      store.ingest('shipping.txt', SHIPPING),
      store.search('How long do refunds take?', 3),
    ]);
    expect(results[0].chunk.sourcePath).toBe('refund-policy.txt');
  });

  describe('on disk', () => {
    let dir: string | null = null;

    afterEach(() => {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
      dir = null;
    });

    it('reloads the index after a restart', async () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'knowledge-'));
      const options = {
        dbPath: path.join(dir, 'knowledge.db'),
        chunkSize: 1000,
        chunkOverlap: 200,
        minRelevance: 0.5,
      };

      const first = new KnowledgeStore(new ConceptEmbedder(), options);
      first.init();
      await first.ingest('refund-policy.txt', REFUND_POLICY);
      first.close();

      const embedder = new ConceptEmbedder();
      const second = new KnowledgeStore(embedder, options);
      second.init();
      expect(second.size).toBe(1);
      expect(await second.ingest('refund-policy.txt', REFUND_POLICY)).toMatchObject({
        status: 'unchanged',
      });
      const results = await second.search('How long do refunds take?', 3);
      expect(results[0].chunk.text).toBe(REFUND_POLICY);
      expect(embedder.calls).toBe(1);
      second.close();
    });
  });
});
