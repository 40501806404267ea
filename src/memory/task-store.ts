import { errorMessage, PersistenceFailure } from '../errors.js';
import type { Task, TaskStatus } from '../types.js';
import {
  completeTask,
  createTask,
  deleteTask,
  listTasks,
  tasksDueBetween,
  type ConversationDb,
  type NewTask,
} from './db.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Per-thread to-do list kept in the conversation database.
 */
export class TaskStore {
  constructor(
    private readonly db: ConversationDb,
    private readonly now: () => number = Date.now,
  ) {}

  create(task: NewTask): Task {
    return this.guard('create task', () => createTask(this.db, task));
  }

  list(threadId: string, status?: TaskStatus): Task[] {
    return this.guard('list tasks', () => listTasks(this.db, threadId, status));
  }

  complete(threadId: string, id: number): Task | null {
    return this.guard('complete task', () => completeTask(this.db, threadId, id));
  }

  delete(threadId: string, id: number): boolean {
    return this.guard('delete task', () => deleteTask(this.db, threadId, id));
  }

  /** Pending tasks due within the next `days` days. */
  upcomingDeadlines(threadId: string, days = 7): Task[] {
    const from = new Date(this.now()).toISOString();
    const until = new Date(this.now() + days * DAY_MS).toISOString();
    return this.guard('list deadlines', () => tasksDueBetween(this.db, threadId, from, until));
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new PersistenceFailure(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
