import { z } from 'zod';

import type { CalendarEvent } from '../capabilities.js';
import {
  callCapability,
  extractFields,
  formatDateTime,
  historyBlock,
  nowLine,
  toIsoDate,
} from './shared.js';
import type { CapabilityHandler, HandlerContext, HandlerDeps, HandlerReply } from './types.js';

const DEFAULT_DURATION_MINUTES = 60;
const DEFAULT_LIST_DAYS = 7;
const MINUTE_MS = 60_000;
const SLOT_STEP_MS = 30 * MINUTE_MS;
const SLOT_SEARCH_MS = 8 * 60 * MINUTE_MS;
const SUGGESTED_SLOTS = 3;

const EventFields = z.object({
  action: z.enum(['create', 'list']).catch('create'),
  summary: z.string().nullable().default(null),
  start: z.string().nullable().default(null),
  durationMinutes: z.number().int().positive().max(24 * 60).nullable().default(null),
  attendees: z.array(z.string()).default([]),
  description: z.string().nullable().default(null),
  days: z.number().int().positive().max(31).nullable().default(null),
  ignoreConflicts: z.boolean().default(false),
  missing: z.array(z.string()).default([]),
});

const email = z.string().email();

export const ASK_FOR_TIME =
  'When should I schedule it? Please tell me the date and time.';

export function overlaps(event: CalendarEvent, startMs: number, endMs: number): boolean {
  return Date.parse(event.start) < endMs && Date.parse(event.end) > startMs;
}

/**
 * Start times after `startMs`, on a half-hour grid, where an event of
 * `durationMs` fits between the busy ones.
 */
export function findFreeSlots(
  busy: readonly CalendarEvent[],
  startMs: number,
  durationMs: number,
  count = SUGGESTED_SLOTS,
): string[] {
  const slots: string[] = [];
  for (let t = startMs + SLOT_STEP_MS; t <= startMs + SLOT_SEARCH_MS && slots.length < count; t += SLOT_STEP_MS) {
    if (!busy.some((e) => overlaps(e, t, t + durationMs))) {
      slots.push(new Date(t).toISOString());
    }
  }
  return slots;
}

function conflictReply(summary: string, conflicts: readonly CalendarEvent[], slots: readonly string[]): string {
  const lines = ['That time clashes with:'];
  for (const event of conflicts) lines.push(`- ${event.summary} (${formatDateTime(event.start)})`);
  if (slots.length > 0) {
    lines.push('', `Free slots for "${summary}":`);
    slots.forEach((slot, i) => lines.push(`${i + 1}. ${formatDateTime(slot)}`));
  }
  lines.push('', 'Pick one, give me another time, or tell me to book it anyway.');
  return lines.join('\n');
}

export class ScheduleHandler implements CapabilityHandler {
  readonly intent = 'schedule' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async handle(message: string, context: HandlerContext): Promise<HandlerReply> {
    const now = (this.deps.now ?? Date.now)();
    const prompt = `${nowLine(now)}

Conversation so far:
${historyBlock(context.state, 4)}

Request:
<message>${message}</message>

Describe what the user wants to do with their calendar as JSON:
{"action": "create"|"list", "summary": string|null, "start": ISO 8601 date-time with offset|null, "durationMinutes": number|null, "attendees": [email addresses], "description": string|null, "days": number|null, "ignoreConflicts": boolean, "missing": [names of required fields the user did not give]}
Use "list" when the user asks what is on their calendar; "days" is how far ahead to look.
Resolve relative dates ("tomorrow at 3pm") against the current date. If the user picks one of the free slots offered earlier, use that slot as "start". Set "ignoreConflicts" only when the user asks to book despite a clash. Use null for anything not stated.`;

    const fields = await extractFields(this.deps.completion, prompt, EventFields, context);
    if (!fields) {
      return {
        text: "I couldn't work out the meeting details. What is it about, and when should it start?",
        clarification: true,
      };
    }

    if (fields.action === 'list') {
      return this.listUpcoming(now, fields.days ?? DEFAULT_LIST_DAYS, context);
    }

    const start = toIsoDate(fields.start);
    if (!start) {
      return { text: ASK_FOR_TIME, clarification: true };
    }

    const summary = fields.summary?.trim() || 'Meeting';
    const durationMinutes = fields.durationMinutes ?? DEFAULT_DURATION_MINUTES;
    const attendees = fields.attendees.filter((a) => email.safeParse(a).success);
    const calendar = this.deps.capabilities.calendar;

    if (!fields.ignoreConflicts) {
      const startMs = Date.parse(start);
      const durationMs = durationMinutes * MINUTE_MS;
      const until = new Date(startMs + SLOT_SEARCH_MS + durationMs).toISOString();
      const busy = await callCapability('check your calendar', () => calendar.listEvents(start, until), context);
      const conflicts = busy.filter((e) => overlaps(e, startMs, startMs + durationMs));
      if (conflicts.length > 0) {
        return {
          text: conflictReply(summary, conflicts, findFreeSlots(busy, startMs, durationMs)),
          clarification: true,
        };
      }
    }

    const created = await callCapability(
      'create the calendar event',
      () =>
        calendar.createEvent({
          summary,
          start,
          durationMinutes,
          attendees,
          description: fields.description ?? undefined,
        }),
      context,
    );

    const lines = [`Done! "${summary}" is scheduled for ${formatDateTime(start)} (${durationMinutes} min).`];
    if (attendees.length > 0) lines.push(`Invited: ${attendees.join(', ')}.`);
    if (created.link) lines.push(created.link);
    return { text: lines.join('\n') };
  }

  private async listUpcoming(now: number, days: number, context: HandlerContext): Promise<HandlerReply> {
    const from = new Date(now).toISOString();
    const until = new Date(now + days * 24 * 60 * MINUTE_MS).toISOString();
    const events = await callCapability(
      'read your calendar',
      () => this.deps.capabilities.calendar.listEvents(from, until),
      context,
    );

    const span = days === 1 ? 'the next day' : `the next ${days} days`;
    if (events.length === 0) return { text: `Your calendar is clear for ${span}.` };
    return {
      text: [`Coming up in ${span}:`, ...events.map((e) => `- ${e.summary} (${formatDateTime(e.start)})`)].join('\n'),
    };
  }
}
