import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FatalCapabilityError } from '../src/errors.js';
import { ingestDirectory, readDocuments, sourcePathFor } from '../src/knowledge/ingest.js';
import { ConceptEmbedder, inMemoryKnowledge } from './helpers/fakes.js';

let dir: string;

function write(relative: string, text: string): void {
  const file = path.join(dir, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text);
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kb-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('sourcePathFor', () => {
  it('uses forward slashes relative to the root', () => {
    expect(sourcePathFor('/kb', path.join('/kb', 'policies', 'refunds.md'))).toBe('policies/refunds.md');
  });
});

describe('readDocuments', () => {
  it('reads .txt and .md files recursively and skips the rest', () => {
    write('faq.txt', 'Opening hours are 9 to 5.');
    write('policies/refunds.md', '# Refunds');
    write('image.png', 'not text');
    write('.hidden.txt', 'secret');

    const docs = readDocuments(dir).sort((a, b) => a.sourcePath.localeCompare(b.sourcePath));
    expect(docs).toEqual([
      { sourcePath: 'faq.txt', text: 'Opening hours are 9 to 5.' },
      { sourcePath: 'policies/refunds.md', text: '# Refunds' },
    ]);
  });

  it('returns nothing for a missing directory', () => {
    expect(readDocuments(path.join(dir, 'missing'))).toEqual([]);
  });
});

describe('ingestDirectory', () => {
  it('indexes new files, skips unchanged ones and removes deleted ones', async () => {
    const store = inMemoryKnowledge();
    write('refunds.txt', 'Refunds are processed within 7 days.');
    write('shipping.txt', 'We ship worldwide.');

    expect(await ingestDirectory(store, dir)).toEqual({
      indexed: 2,
      unchanged: 0,
      removed: 0,
      failed: [],
    });

    fs.rmSync(path.join(dir, 'shipping.txt'));
    write('refunds.txt', 'Refunds are processed within 10 days.');
    write('hours.txt', 'We are open every day.');

    expect(await ingestDirectory(store, dir)).toEqual({
      indexed: 2,
      unchanged: 0,
      removed: 1,
      failed: [],
    });
    expect(store.sources()).toEqual(['hours.txt', 'refunds.txt']);

    expect(await ingestDirectory(store, dir)).toEqual({
      indexed: 0,
      unchanged: 2,
      removed: 0,
      failed: [],
    });
  });

  it('records files that fail to index and carries on', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);
    write('refunds.txt', 'Refunds are processed within 7 days.');
    embedder.failWith = new Error('rate limited');

    expect(await ingestDirectory(store, dir)).toEqual({
      indexed: 0,
      unchanged: 0,
      removed: 0,
      failed: ['refunds.txt'],
    });
    expect(store.size).toBe(0);
  });

  it('stops on fatal errors', async () => {
    const embedder = new ConceptEmbedder();
    const store = inMemoryKnowledge(embedder);
    write('refunds.txt', 'Refunds are processed within 7 days.');
    embedder.failWith = new FatalCapabilityError('OPENAI_API_KEY not set');

    await expect(ingestDirectory(store, dir)).rejects.toBeInstanceOf(FatalCapabilityError);
  });
});
