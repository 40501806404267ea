/**
 * Chunked-document index with cosine-similarity search.
 *
 * Vectors live in SQLite and in an in-memory snapshot. Writers build a new
 * snapshot and swap it in after the SQLite transaction commits, so a
 * concurrent search always sees either the old or the new index, never a
 * mix. Writes are serialized through a single mutex.
 *
 * Embedding runs outside the lock. Every ingest, removal and rebuild bumps
 * the generation of the sources it touches; an ingest whose generation has
 * moved on by the time it gets the lock is dropped as superseded, so the
 * last write to start is the one that sticks.
 */

import { Mutex } from 'async-mutex';

import type { EmbeddingCapability } from '../capabilities.js';
import { errorMessage, FatalCapabilityError, RetrievalFailure } from '../errors.js';
import { logger } from '../logger.js';
import type { KnowledgeChunk, RetrievalResult } from '../types.js';
import { chunkId, contentHash, splitIntoWindows } from './chunker.js';
import {
  checkpointWal,
  clearIndex,
  deleteSource,
  getAllChunks,
  getSource,
  listSourcePaths,
  openKnowledgeDatabase,
  replaceIndex,
  replaceSourceChunks,
  type KnowledgeDb,
} from './db.js';
import { cosineSimilarity } from './embeddings.js';

export interface KnowledgeStoreOptions {
  dbPath: string;
  chunkSize: number;
  chunkOverlap: number;
  minRelevance: number;
}

export type IngestStatus = 'indexed' | 'unchanged' | 'superseded';

export interface IngestResult {
  sourcePath: string;
  status: IngestStatus;
  chunks: number;
}

export class KnowledgeStore {
  private db: KnowledgeDb | null = null;
  private snapshot: readonly KnowledgeChunk[] = [];
  private readonly writeLock = new Mutex();
  private readonly generations = new Map<string, number>();

  constructor(
    private readonly embedder: EmbeddingCapability,
    private readonly options: KnowledgeStoreOptions,
  ) {}

  init(): void {
    this.db = openKnowledgeDatabase(this.options.dbPath);
    this.snapshot = getAllChunks(this.db);
    logger.info(
      { chunks: this.snapshot.length, sources: listSourcePaths(this.db).length },
      'Knowledge store loaded',
    );
  }

  get size(): number {
    return this.snapshot.length;
  }

  sources(): string[] {
    return listSourcePaths(this.requireDb());
  }

  /**
   * Top `topK` chunks scoring at least the relevance threshold, best first.
   * An empty index answers [] without embedding the query.
   */
  async search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalResult[]> {
    const chunks = this.snapshot;
    if (chunks.length === 0 || topK <= 0 || !query.trim()) return [];

    let queryEmbedding: Float32Array;
    try {
      queryEmbedding = await this.embedder.embed(query, signal);
    } catch (err) {
      if (err instanceof FatalCapabilityError) throw err;
      if (signal?.aborted) throw signal.reason;
      throw new RetrievalFailure(`Query embedding failed: ${errorMessage(err)}`, { cause: err });
    }

    return chunks
      .map((chunk) => ({ chunk, similarity: cosineSimilarity(queryEmbedding, chunk.embedding) }))
      .filter((r) => r.similarity >= this.options.minRelevance)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK);
  }

  /**
   * Index one document. Re-chunks and re-embeds only when its content hash
   * differs from the last indexed one (unless `force`).
   */
  async ingest(sourcePath: string, text: string, force = false): Promise<IngestResult> {
    const db = this.requireDb();
    const generation = this.bump(sourcePath);
    const hash = contentHash(text);
    const existing = getSource(db, sourcePath);
    if (!force && existing && existing.contentHash === hash) {
      return { sourcePath, status: 'unchanged', chunks: existing.chunkCount };
    }

    const chunks = await this.embedDocument(sourcePath, text, hash);

    const committed = await this.writeLock.runExclusive(() => {
      if (this.generations.get(sourcePath) !== generation) return false;
      replaceSourceChunks(db, sourcePath, hash, chunks);
      this.snapshot = [
        ...this.snapshot.filter((c) => c.sourcePath !== sourcePath),
        ...chunks,
      ];
      return true;
    });

    if (!committed) {
      logger.info({ sourcePath }, 'Newer write for knowledge source, result dropped');
      return { sourcePath, status: 'superseded', chunks: 0 };
    }
    logger.info({ sourcePath, chunks: chunks.length }, 'Knowledge source indexed');
    return { sourcePath, status: 'indexed', chunks: chunks.length };
  }

  async remove(sourcePath: string): Promise<boolean> {
    const db = this.requireDb();
    this.bump(sourcePath);
    return this.writeLock.runExclusive(() => {
      const removed = deleteSource(db, sourcePath);
      if (removed) {
        this.snapshot = this.snapshot.filter((c) => c.sourcePath !== sourcePath);
        logger.info({ sourcePath }, 'Knowledge source removed');
      }
      return removed;
    });
  }

  /**
   * Whole-index rebuild. Every document is embedded first; the old index is
   * replaced only once all of them succeeded, in one transaction, so a
   * failed rebuild leaves the previous index in place.
   */
  async rebuild(documents: Array<{ sourcePath: string; text: string }>): Promise<IngestResult[]> {
    const db = this.requireDb();
    for (const source of this.sources()) this.bump(source);
    for (const doc of documents) this.bump(doc.sourcePath);

    const prepared: Array<{ sourcePath: string; hash: string; chunks: KnowledgeChunk[] }> = [];
    for (const doc of documents) {
      const hash = contentHash(doc.text);
      prepared.push({
        sourcePath: doc.sourcePath,
        hash,
        chunks: await this.embedDocument(doc.sourcePath, doc.text, hash),
      });
    }

    await this.writeLock.runExclusive(() => {
      replaceIndex(db, prepared);
      this.snapshot = prepared.flatMap((p) => p.chunks);
    });

    logger.info({ sources: prepared.length, chunks: this.snapshot.length }, 'Knowledge index rebuilt');
    return prepared.map((p) => ({ sourcePath: p.sourcePath, status: 'indexed' as const, chunks: p.chunks.length }));
  }

  close(): void {
    if (this.db) {
      checkpointWal(this.db);
      this.db.close();
      this.db = null;
    }
  }

  private bump(sourcePath: string): number {
    const next = (this.generations.get(sourcePath) ?? 0) + 1;
    this.generations.set(sourcePath, next);
    return next;
  }

  private async embedDocument(sourcePath: string, text: string, hash: string): Promise<KnowledgeChunk[]> {
    const windows = splitIntoWindows(text, {
      size: this.options.chunkSize,
      overlap: this.options.chunkOverlap,
    });
    const chunks: KnowledgeChunk[] = [];
    for (const window of windows) {
      chunks.push({
        id: chunkId(sourcePath, hash, window.index),
        sourcePath,
        chunkIndex: window.index,
        text: window.text,
        contentHash: hash,
        embedding: await this.embedder.embed(window.text),
      });
    }
    return chunks;
  }

  private requireDb(): KnowledgeDb {
    if (!this.db) throw new Error('KnowledgeStore used before init()');
    return this.db;
  }
}
