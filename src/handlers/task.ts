import { z } from 'zod';

import { errorMessage, HandlerFailure, PersistenceFailure } from '../errors.js';
import { logger } from '../logger.js';
import type { Task } from '../types.js';
import { extractFields, formatDateTime, historyBlock, nowLine, toIsoDate } from './shared.js';
import type { CapabilityHandler, HandlerContext, HandlerDeps, HandlerReply } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** High-priority tasks due this soon are announced as urgent. */
export const URGENT_WINDOW_DAYS = 7;

const TaskFields = z.object({
  action: z.enum(['create', 'list', 'complete', 'delete', 'deadlines']),
  title: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  priority: z.enum(['low', 'medium', 'high', 'urgent']).default('medium'),
  deadline: z.string().nullable().default(null),
  taskId: z.number().int().positive().nullable().default(null),
  days: z.number().int().positive().max(365).default(URGENT_WINDOW_DAYS),
});

type TaskFields = z.infer<typeof TaskFields>;

export function describeTask(task: Task): string {
  const due = task.deadline ? `, due ${formatDateTime(task.deadline)}` : '';
  return `#${task.id} ${task.title} (${task.priority}${due})`;
}

export class TaskHandler implements CapabilityHandler {
  readonly intent = 'task' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async handle(message: string, context: HandlerContext): Promise<HandlerReply> {
    const now = (this.deps.now ?? Date.now)();
    const prompt = `${nowLine(now)}

Conversation so far:
${historyBlock(context.state, 4)}

Request:
<message>${message}</message>

Describe what the user wants to do with their to-do list as JSON:
{"action": "create"|"list"|"complete"|"delete"|"deadlines", "title": string|null, "description": string|null, "priority": "low"|"medium"|"high"|"urgent", "deadline": ISO 8601 date-time|null, "taskId": number|null, "days": number}`;

    const fields = await extractFields(this.deps.completion, prompt, TaskFields, context);
    if (!fields) {
      return {
        text: 'What would you like to do with your tasks? I can add, list, complete or delete them.',
        clarification: true,
      };
    }

    try {
      return this.apply(fields, now, context);
    } catch (err) {
      if (!(err instanceof PersistenceFailure)) throw err;
      logger.error({ threadId: context.threadId, err: errorMessage(err) }, 'Task store failed');
      throw new HandlerFailure(err.message, "Sorry, I couldn't update your tasks right now.", {
        cause: err,
      });
    }
  }

  private apply(fields: TaskFields, now: number, context: HandlerContext): HandlerReply {
    const { tasks } = this.deps;
    const threadId = context.threadId;

    switch (fields.action) {
      case 'create': {
        const title = fields.title?.trim();
        if (!title) return { text: 'What should the task be called?', clarification: true };
        const deadline = toIsoDate(fields.deadline);
        if (fields.deadline && !deadline) {
          return {
            text: "I couldn't understand the deadline. When is it due?",
            clarification: true,
          };
        }

        const task = tasks.create({
          threadId,
          title,
          description: fields.description,
          priority: fields.priority,
          deadline,
        });
        if (isUrgent(task, now)) {
          logger.info({ threadId, taskId: task.id }, 'Task flagged urgent');
          context.bus.emit('task.flagged_urgent', { threadId, task });
        }
        return { text: `Task created: ${describeTask(task)}.` };
      }

      case 'list': {
        const pending = tasks.list(threadId, 'pending');
        if (pending.length === 0) return { text: 'You have no pending tasks.' };
        return { text: `Your pending tasks:\n${pending.map((t) => `- ${describeTask(t)}`).join('\n')}` };
      }

      case 'complete': {
        if (fields.taskId === null) {
          return { text: 'Which task number should I mark as done?', clarification: true };
        }
        const task = tasks.complete(threadId, fields.taskId);
        return task
          ? { text: `Marked as done: ${describeTask(task)}.` }
          : { text: `I couldn't find an open task #${fields.taskId}.` };
      }

      case 'delete': {
        if (fields.taskId === null) {
          return { text: 'Which task number should I delete?', clarification: true };
        }
        return tasks.delete(threadId, fields.taskId)
          ? { text: `Task #${fields.taskId} deleted.` }
          : { text: `I couldn't find task #${fields.taskId}.` };
      }

      case 'deadlines': {
        const due = tasks.upcomingDeadlines(threadId, fields.days);
        if (due.length === 0) return { text: `Nothing is due in the next ${fields.days} days.` };
        return {
          text: `Due in the next ${fields.days} days:\n${due.map((t) => `- ${describeTask(t)}`).join('\n')}`,
        };
      }
    }
  }
}

export function isUrgent(task: Task, now: number): boolean {
  if (task.priority !== 'high' && task.priority !== 'urgent') return false;
  if (!task.deadline) return false;
  const due = Date.parse(task.deadline);
  return due >= now && due <= now + URGENT_WINDOW_DAYS * DAY_MS;
}
