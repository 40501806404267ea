/**
 * Contracts for the external services the engine talks to. The engine only
 * looks at success/failure and the human-readable summary of a result.
 */

export interface CompletionContext {
  system?: string;
  model?: string;
  signal?: AbortSignal;
}

export interface CompletionCapability {
  complete(prompt: string, context?: CompletionContext): Promise<string>;
}

export interface EmbeddingCapability {
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;
}

export type CapabilityResult<T> =
  | { ok: true; summary: string; data: T }
  | { ok: false; summary: string; retryable: boolean };

export interface CalendarEventRequest {
  summary: string;
  start: string; // ISO
  durationMinutes: number;
  attendees: string[];
  description?: string;
}

export interface CalendarEvent {
  id: string;
  summary: string;
  start: string; // ISO
  end: string; // ISO
}

export interface CalendarCapability {
  createEvent(
    request: CalendarEventRequest,
  ): Promise<CapabilityResult<{ eventId: string; link?: string }>>;
  /** Events overlapping [from, until), earliest first. */
  listEvents(from: string, until: string): Promise<CapabilityResult<CalendarEvent[]>>;
}

export interface MailRequest {
  to: string;
  subject: string;
  body: string;
  cc?: string[];
}

export interface EmailCapability {
  sendMessage(
    request: MailRequest,
  ): Promise<CapabilityResult<{ messageId: string }>>;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchQuery {
  query: string;
  kind: 'web' | 'news';
  maxResults: number;
}

export interface SearchCapability {
  query(request: SearchQuery): Promise<CapabilityResult<SearchHit[]>>;
}

export interface Capabilities {
  calendar: CalendarCapability;
  email: EmailCapability;
  search: SearchCapability;
}

function notConfigured(name: string): { ok: false; summary: string; retryable: false } {
  return { ok: false, summary: `${name} is not configured`, retryable: false };
}

/** Providers that always report "not configured". */
export function disabledCapabilities(): Capabilities {
  return {
    calendar: {
      createEvent: async () => notConfigured('Calendar'),
      listEvents: async () => notConfigured('Calendar'),
    },
    email: { sendMessage: async () => notConfigured('Email') },
    search: { query: async () => notConfigured('Web search') },
  };
}
