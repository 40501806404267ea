import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import type {
  AgentUsed,
  ConversationMode,
  Task,
  TaskPriority,
  TaskStatus,
  Turn,
  TurnRole,
} from '../types.js';

export type ConversationDb = Database.Database;

interface ThreadRow {
  thread_id: string;
  mode: ConversationMode;
  pause_until: string | null;
  summary: string;
  created_at: string;
  last_activity: string;
}

interface TurnRow {
  thread_id: string;
  seq: number;
  role: TurnRole;
  content: string;
  timestamp: string;
  agent_used: AgentUsed;
  is_summary: number;
}

interface TaskRow {
  id: number;
  thread_id: string;
  title: string;
  description: string | null;
  priority: TaskPriority;
  status: TaskStatus;
  deadline: string | null;
  created_at: string;
  completed_at: string | null;
}

export interface ThreadRecord {
  threadId: string;
  mode: ConversationMode;
  pauseUntil: string | null;
  summary: string;
  createdAt: string;
  lastActivity: string;
}

export interface StoredTurn extends Turn {
  seq: number;
  isSummary: boolean;
}

export function openConversationDatabase(dbPath: string): ConversationDb {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS threads (
      thread_id      TEXT PRIMARY KEY,
      mode           TEXT NOT NULL DEFAULT 'ACTIVE' CHECK(mode IN ('ACTIVE','PAUSED')),
      pause_until    TEXT,
      summary        TEXT NOT NULL DEFAULT '',
      created_at     TEXT NOT NULL,
      last_activity  TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS turns (
      thread_id   TEXT NOT NULL REFERENCES threads(thread_id) ON DELETE CASCADE,
      seq         INTEGER NOT NULL,
      role        TEXT NOT NULL CHECK(role IN ('user','assistant','system')),
      content     TEXT NOT NULL,
      timestamp   TEXT NOT NULL,
      agent_used  TEXT NOT NULL,
      is_summary  INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (thread_id, seq)
    );

    CREATE TABLE IF NOT EXISTS tasks (
      id            INTEGER PRIMARY KEY AUTOINCREMENT,
      thread_id     TEXT NOT NULL,
      title         TEXT NOT NULL,
      description   TEXT,
      priority      TEXT NOT NULL DEFAULT 'medium' CHECK(priority IN ('low','medium','high','urgent')),
      status        TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending','completed')),
      deadline      TEXT,
      created_at    TEXT NOT NULL,
      completed_at  TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_tasks_thread ON tasks(thread_id, status);
  `);

  return db;
}

// ==================== Threads ====================

function toThread(row: ThreadRow): ThreadRecord {
  return {
    threadId: row.thread_id,
    mode: row.mode,
    pauseUntil: row.pause_until,
    summary: row.summary,
    createdAt: row.created_at,
    lastActivity: row.last_activity,
  };
}

export function getThread(db: ConversationDb, threadId: string): ThreadRecord | null {
  const row = db
    .prepare<[string], ThreadRow>('SELECT * FROM threads WHERE thread_id = ?')
    .get(threadId);
  return row ? toThread(row) : null;
}

export function ensureThread(db: ConversationDb, threadId: string, now: string): void {
  db.prepare(
    `INSERT INTO threads (thread_id, created_at, last_activity) VALUES (?, ?, ?)
     ON CONFLICT(thread_id) DO NOTHING`,
  ).run(threadId, now, now);
}

export function updateThreadMode(
  db: ConversationDb,
  threadId: string,
  mode: ConversationMode,
  pauseUntil: string | null,
): void {
  db.prepare('UPDATE threads SET mode = ?, pause_until = ? WHERE thread_id = ?').run(
    mode,
    pauseUntil,
    threadId,
  );
}

export function listThreads(db: ConversationDb): ThreadRecord[] {
  return db
    .prepare<[], ThreadRow>('SELECT * FROM threads ORDER BY last_activity DESC')
    .all()
    .map(toThread);
}

// ==================== Turns ====================

function toTurn(row: TurnRow): StoredTurn {
  return {
    seq: row.seq,
    role: row.role,
    content: row.content,
    timestamp: row.timestamp,
    agentUsed: row.agent_used,
    isSummary: row.is_summary === 1,
  };
}

export function getTurns(db: ConversationDb, threadId: string): StoredTurn[] {
  return db
    .prepare<[string], TurnRow>('SELECT * FROM turns WHERE thread_id = ? ORDER BY seq')
    .all(threadId)
    .map(toTurn);
}

/**
 * Append turns after the current tail, in one transaction.
 */
export function insertTurns(db: ConversationDb, threadId: string, turns: readonly Turn[]): void {
  const write = db.transaction(() => {
    const now = turns.length > 0 ? turns[turns.length - 1].timestamp : new Date().toISOString();
    ensureThread(db, threadId, now);

    const tail = db
      .prepare<[string], { max_seq: number | null }>(
        'SELECT MAX(seq) AS max_seq FROM turns WHERE thread_id = ?',
      )
      .get(threadId);
    let seq = tail?.max_seq ?? 0;

    const insert = db.prepare(
      `INSERT INTO turns (thread_id, seq, role, content, timestamp, agent_used, is_summary)
       VALUES (?, ?, ?, ?, ?, ?, 0)`,
    );
    for (const turn of turns) {
      seq += 1;
      insert.run(threadId, seq, turn.role, turn.content, turn.timestamp, turn.agentUsed);
    }
    db.prepare('UPDATE threads SET last_activity = ? WHERE thread_id = ?').run(now, threadId);
  });
  write();
}

/**
 * Swap the turns at `replacedSeqs` for one summary turn that takes the
 * lowest replaced seq, so the log keeps its order.
 */
export function compactTurns(
  db: ConversationDb,
  threadId: string,
  replacedSeqs: readonly number[],
  summary: Turn,
): void {
  if (replacedSeqs.length === 0) return;
  const position = Math.min(...replacedSeqs);
  const compact = db.transaction(() => {
    const remove = db.prepare('DELETE FROM turns WHERE thread_id = ? AND seq = ?');
    for (const seq of replacedSeqs) remove.run(threadId, seq);
    db.prepare(
      `INSERT INTO turns (thread_id, seq, role, content, timestamp, agent_used, is_summary)
       VALUES (?, ?, ?, ?, ?, ?, 1)`,
    ).run(threadId, position, summary.role, summary.content, summary.timestamp, summary.agentUsed);
    db.prepare('UPDATE threads SET summary = ? WHERE thread_id = ?').run(summary.content, threadId);
  });
  compact();
}

// ==================== Tasks ====================

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    threadId: row.thread_id,
    title: row.title,
    description: row.description,
    priority: row.priority,
    status: row.status,
    deadline: row.deadline,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

export interface NewTask {
  threadId: string;
  title: string;
  description?: string | null;
  priority?: TaskPriority;
  deadline?: string | null;
}

export function createTask(db: ConversationDb, task: NewTask): Task {
  const createdAt = new Date().toISOString();
  const result = db
    .prepare(
      `INSERT INTO tasks (thread_id, title, description, priority, deadline, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(
      task.threadId,
      task.title,
      task.description ?? null,
      task.priority ?? 'medium',
      task.deadline ?? null,
      createdAt,
    );
  const created = getTask(db, Number(result.lastInsertRowid));
  if (!created) throw new Error('Task vanished after insert');
  return created;
}

export function getTask(db: ConversationDb, id: number): Task | null {
  const row = db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
  return row ? toTask(row) : null;
}

export function listTasks(db: ConversationDb, threadId: string, status?: TaskStatus): Task[] {
  const rows = status
    ? db
        .prepare<[string, string], TaskRow>(
          'SELECT * FROM tasks WHERE thread_id = ? AND status = ? ORDER BY id',
        )
        .all(threadId, status)
    : db
        .prepare<[string], TaskRow>('SELECT * FROM tasks WHERE thread_id = ? ORDER BY id')
        .all(threadId);
  return rows.map(toTask);
}

export function completeTask(db: ConversationDb, threadId: string, id: number): Task | null {
  const result = db
    .prepare(
      `UPDATE tasks SET status = 'completed', completed_at = ?
       WHERE id = ? AND thread_id = ? AND status = 'pending'`,
    )
    .run(new Date().toISOString(), id, threadId);
  return result.changes > 0 ? getTask(db, id) : null;
}

export function deleteTask(db: ConversationDb, threadId: string, id: number): boolean {
  return db.prepare('DELETE FROM tasks WHERE id = ? AND thread_id = ?').run(id, threadId).changes > 0;
}

/** Pending tasks with a deadline between `from` and `until`, soonest first. */
export function tasksDueBetween(
  db: ConversationDb,
  threadId: string,
  from: string,
  until: string,
): Task[] {
  return db
    .prepare<[string, string, string], TaskRow>(
      `SELECT * FROM tasks
       WHERE thread_id = ? AND status = 'pending' AND deadline IS NOT NULL
         AND deadline >= ? AND deadline <= ?
       ORDER BY deadline`,
    )
    .all(threadId, from, until)
    .map(toTask);
}
