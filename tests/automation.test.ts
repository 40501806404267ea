import { describe, expect, it } from 'vitest';

import { reminderStart, UrgentTaskAutomation } from '../src/automation.js';
import { EventBus, type EngineEvents } from '../src/events.js';
import type { Task } from '../src/types.js';
import { createTestEngine, fakeCapabilities } from './helpers/fakes.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

const task: Task = {
  id: 7,
  threadId: 't1',
  title: 'Pay rent',
  description: null,
  priority: 'high',
  status: 'pending',
  deadline: '2026-06-03T12:00:00.000Z',
  createdAt: '2026-06-01T12:00:00.000Z',
  completedAt: null,
};

function setup() {
  const bus = new EventBus();
  const capabilities = fakeCapabilities();
  const automation = new UrgentTaskAutomation(bus, capabilities);
  const completed: Array<EngineEvents['automation.completed']> = [];
  bus.on('automation.completed', (event) => {
    completed.push(event);
  });
  automation.start();
  return { bus, capabilities, automation, completed };
}

describe('reminderStart', () => {
  it('is thirty minutes before the deadline', () => {
    expect(reminderStart('2026-06-03T12:00:00.000Z')).toBe('2026-06-03T11:30:00.000Z');
    expect(reminderStart('not a date')).toBeNull();
  });
});

describe('UrgentTaskAutomation', () => {
  it('books a reminder for an urgent task', async () => {
    const { bus, capabilities, completed } = setup();
    bus.emit('task.flagged_urgent', { threadId: 't1', task });
    await tick();

    expect(capabilities.calendar.events).toEqual([
      {
        summary: 'Reminder: Pay rent',
        start: '2026-06-03T11:30:00.000Z',
        durationMinutes: 30,
        attendees: [],
        description: undefined,
      },
    ]);
    expect(completed).toEqual([{ threadId: 't1', taskId: 7, ok: true, summary: 'Event created' }]);
  });

  it('reports a calendar that refuses', async () => {
    const { bus, capabilities, completed } = setup();
    capabilities.calendar.failure = { summary: 'Calendar is not configured', retryable: false };
    bus.emit('task.flagged_urgent', { threadId: 't1', task });
    await tick();

    expect(completed).toEqual([
      { threadId: 't1', taskId: 7, ok: false, summary: 'Calendar is not configured' },
    ]);
  });

  it('tries again when the calendar is briefly unavailable', async () => {
    const { bus, capabilities, completed } = setup();
    capabilities.calendar.failures.push({ summary: 'Service unavailable', retryable: true });
    const done = new Promise<void>((resolve) => {
      bus.on('automation.completed', () => resolve());
    });
    bus.emit('task.flagged_urgent', { threadId: 't1', task });
    await done;

    expect(capabilities.calendar.calls).toBe(2);
    expect(completed).toEqual([{ threadId: 't1', taskId: 7, ok: true, summary: 'Event created' }]);
  });

  it('reports a task without a deadline', async () => {
    const { bus, capabilities, completed } = setup();
    bus.emit('task.flagged_urgent', { threadId: 't1', task: { ...task, deadline: null } });
    await tick();

    expect(capabilities.calendar.events).toEqual([]);
    expect(completed).toEqual([
      { threadId: 't1', taskId: 7, ok: false, summary: 'Task has no usable deadline' },
    ]);
  });

  it('stops listening after stop()', async () => {
    const { bus, capabilities, automation } = setup();
    automation.stop();
    bus.emit('task.flagged_urgent', { threadId: 't1', task });
    await tick();
    expect(capabilities.calendar.events).toEqual([]);
  });

  it('reacts to an urgent task created in conversation', async () => {
    const engine = createTestEngine();
    new UrgentTaskAutomation(engine.bus, engine.capabilities).start();
    const deadline = new Date(Date.now() + 2 * 24 * 60 * 60 * 1000).toISOString();
    engine.completion.enqueue(
      JSON.stringify({ action: 'create', title: 'Pay rent', priority: 'urgent', deadline }),
    );

    const outcome = await engine.orchestrator.submit({
      threadId: 't1',
      text: 'Remind me to pay the rent before Friday, it is urgent',
      timestamp: Date.now(),
    });
    await tick();

    expect(outcome?.intent).toBe('task');
    expect(engine.capabilities.calendar.events.map((e) => [e.summary, e.start])).toEqual([
      ['Reminder: Pay rent', reminderStart(deadline)],
    ]);
  });
});
