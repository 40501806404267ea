/**
 * Cross-handler automation: urgent tasks get a calendar reminder.
 *
 * Runs off the event bus, outside the cycle that created the task, so a
 * calendar failure never changes the reply the user already got.
 */

import type { Capabilities } from './capabilities.js';
import { errorMessage } from './errors.js';
import type { EngineEvents, EventBus } from './events.js';
import { logger } from './logger.js';
import { retryCapability } from './retry.js';

const REMINDER_LEAD_MINUTES = 30;
const REMINDER_DURATION_MINUTES = 30;

export function reminderStart(deadline: string): string | null {
  const due = Date.parse(deadline);
  if (Number.isNaN(due)) return null;
  return new Date(due - REMINDER_LEAD_MINUTES * 60_000).toISOString();
}

export class UrgentTaskAutomation {
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly bus: EventBus,
    private readonly capabilities: Capabilities,
  ) {}

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.on('task.flagged_urgent', (event) => this.onUrgentTask(event));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  async onUrgentTask({ threadId, task }: EngineEvents['task.flagged_urgent']): Promise<void> {
    const start = task.deadline ? reminderStart(task.deadline) : null;
    if (!start) {
      this.finish(threadId, task.id, false, 'Task has no usable deadline');
      return;
    }

    try {
      const result = await retryCapability(
        () =>
          this.capabilities.calendar.createEvent({
            summary: `Reminder: ${task.title}`,
            start,
            durationMinutes: REMINDER_DURATION_MINUTES,
            attendees: [],
            description: task.description ?? undefined,
          }),
        { label: 'urgent task reminder' },
      );
      this.finish(threadId, task.id, result.ok, result.summary);
    } catch (err) {
      this.finish(threadId, task.id, false, errorMessage(err));
    }
  }

  private finish(threadId: string, taskId: number, ok: boolean, summary: string): void {
    if (ok) {
      logger.info({ threadId, taskId }, 'Calendar reminder created for urgent task');
    } else {
      logger.warn({ threadId, taskId, summary }, 'Could not create reminder for urgent task');
    }
    this.bus.emit('automation.completed', { threadId, taskId, ok, summary });
  }
}
