import type { z } from 'zod';

/**
 * Pull the first JSON object out of a model reply (bare, or inside a
 * ```json fence) and validate it. Returns null when nothing valid is found.
 */
export function parseJsonReply<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : text;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(body.slice(start, end + 1));
  } catch {
    return null;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
