import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import type { KnowledgeChunk } from '../types.js';
import { bufferToEmbedding, embeddingToBuffer } from './embeddings.js';

export type KnowledgeDb = Database.Database;

interface SourceRow {
  source_path: string;
  content_hash: string;
  chunk_count: number;
  indexed_at: string;
}

interface ChunkRow {
  id: string;
  source_path: string;
  chunk_index: number;
  text: string;
  content_hash: string;
  embedding: Buffer;
}

export interface KnowledgeSource {
  sourcePath: string;
  contentHash: string;
  chunkCount: number;
  indexedAt: string;
}

export function openKnowledgeDatabase(dbPath: string): KnowledgeDb {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS knowledge_sources (
      source_path   TEXT PRIMARY KEY,
      content_hash  TEXT NOT NULL,
      chunk_count   INTEGER NOT NULL,
      indexed_at    TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS knowledge_chunks (
      id            TEXT PRIMARY KEY,
      source_path   TEXT NOT NULL REFERENCES knowledge_sources(source_path) ON DELETE CASCADE,
      chunk_index   INTEGER NOT NULL,
      text          TEXT NOT NULL,
      content_hash  TEXT NOT NULL,
      embedding     BLOB NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_chunks_source ON knowledge_chunks(source_path, chunk_index);
  `);

  return db;
}

function toChunk(row: ChunkRow): KnowledgeChunk {
  return {
    id: row.id,
    sourcePath: row.source_path,
    chunkIndex: row.chunk_index,
    text: row.text,
    contentHash: row.content_hash,
    embedding: bufferToEmbedding(row.embedding),
  };
}

export function getSource(db: KnowledgeDb, sourcePath: string): KnowledgeSource | null {
  const row = db
    .prepare<[string], SourceRow>('SELECT * FROM knowledge_sources WHERE source_path = ?')
    .get(sourcePath);
  if (!row) return null;
  return {
    sourcePath: row.source_path,
    contentHash: row.content_hash,
    chunkCount: row.chunk_count,
    indexedAt: row.indexed_at,
  };
}

export function listSourcePaths(db: KnowledgeDb): string[] {
  const rows = db
    .prepare<[], { source_path: string }>(
      'SELECT source_path FROM knowledge_sources ORDER BY source_path',
    )
    .all();
  return rows.map((r) => r.source_path);
}

export function getAllChunks(db: KnowledgeDb): KnowledgeChunk[] {
  const rows = db
    .prepare<[], ChunkRow>('SELECT * FROM knowledge_chunks ORDER BY source_path, chunk_index')
    .all();
  return rows.map(toChunk);
}

/**
 * Replace every chunk of a source in one transaction.
 */
export function replaceSourceChunks(
  db: KnowledgeDb,
  sourcePath: string,
  hash: string,
  chunks: KnowledgeChunk[],
): void {
  const write = db.transaction(() => {
    db.prepare('DELETE FROM knowledge_chunks WHERE source_path = ?').run(sourcePath);
    db.prepare(
      `INSERT INTO knowledge_sources (source_path, content_hash, chunk_count, indexed_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(source_path) DO UPDATE SET
         content_hash = excluded.content_hash,
         chunk_count = excluded.chunk_count,
         indexed_at = excluded.indexed_at`,
    ).run(sourcePath, hash, chunks.length, new Date().toISOString());

    const insert = db.prepare(
      `INSERT INTO knowledge_chunks (id, source_path, chunk_index, text, content_hash, embedding)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    for (const chunk of chunks) {
      insert.run(
        chunk.id,
        sourcePath,
        chunk.chunkIndex,
        chunk.text,
        chunk.contentHash,
        embeddingToBuffer(chunk.embedding),
      );
    }
  });
  write();
}

export function deleteSource(db: KnowledgeDb, sourcePath: string): boolean {
  const remove = db.transaction(() => {
    db.prepare('DELETE FROM knowledge_chunks WHERE source_path = ?').run(sourcePath);
    return db.prepare('DELETE FROM knowledge_sources WHERE source_path = ?').run(sourcePath);
  });
  return remove().changes > 0;
}

export function clearIndex(db: KnowledgeDb): void {
  db.exec('DELETE FROM knowledge_chunks; DELETE FROM knowledge_sources;');
}

/** Swap the whole index for the given sources in one transaction. */
export function replaceIndex(
  db: KnowledgeDb,
  sources: Array<{ sourcePath: string; hash: string; chunks: KnowledgeChunk[] }>,
): void {
  const write = db.transaction(() => {
    clearIndex(db);
    for (const source of sources) {
      replaceSourceChunks(db, source.sourcePath, source.hash, source.chunks);
    }
  });
  write();
}

export function checkpointWal(db: KnowledgeDb): void {
  db.pragma('wal_checkpoint(TRUNCATE)');
}
