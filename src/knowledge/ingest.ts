import fs from 'fs';
import path from 'path';

import { errorMessage, isFatal } from '../errors.js';
import { logger } from '../logger.js';
import type { KnowledgeStore } from './knowledge-store.js';

const DOCUMENT_EXTENSIONS = new Set(['.txt', '.md']);

export interface IngestReport {
  indexed: number;
  unchanged: number;
  removed: number;
  failed: string[];
}

function listDocuments(root: string, dir: string = root): string[] {
  if (!fs.existsSync(dir)) return [];
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith('.')) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listDocuments(root, full));
    } else if (entry.isFile() && DOCUMENT_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
      files.push(full);
    }
  }
  return files;
}

/** Relative, forward-slashed path used as the source key. */
export function sourcePathFor(root: string, file: string): string {
  return path.relative(root, file).split(path.sep).join('/');
}

export function readDocuments(dir: string): Array<{ sourcePath: string; text: string }> {
  return listDocuments(dir).map((file) => ({
    sourcePath: sourcePathFor(dir, file),
    text: fs.readFileSync(file, 'utf-8'),
  }));
}

/**
 * Incrementally sync a directory of plain-text documents into the store.
 * Files whose content hash is unchanged are skipped; sources whose file
 * disappeared are removed.
 */
export async function ingestDirectory(store: KnowledgeStore, dir: string): Promise<IngestReport> {
  const report: IngestReport = { indexed: 0, unchanged: 0, removed: 0, failed: [] };
  const files = listDocuments(dir);
  const seen = new Set<string>();

  for (const file of files) {
    const sourcePath = sourcePathFor(dir, file);
    seen.add(sourcePath);
    try {
      const text = fs.readFileSync(file, 'utf-8');
      const result = await store.ingest(sourcePath, text);
      if (result.status === 'indexed') report.indexed++;
      else if (result.status === 'unchanged') report.unchanged++;
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.warn({ sourcePath, err: errorMessage(err) }, 'Failed to index knowledge source');
      report.failed.push(sourcePath);
    }
  }

  for (const sourcePath of store.sources()) {
    if (!seen.has(sourcePath) && (await store.remove(sourcePath))) {
      report.removed++;
    }
  }

  logger.info({ dir, ...report, failed: report.failed.length }, 'Knowledge directory synced');
  return report;
}
