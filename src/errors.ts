/**
 * Error taxonomy for the orchestration engine.
 *
 * Every class carries a `kind` discriminant so callers can switch on it
 * without instanceof chains across module boundaries.
 */

export const FALLBACK_MESSAGES = {
  handler: "Sorry, I couldn't complete that right now. Please try again in a moment.",
  deadline: 'Sorry, that took too long on my side. Please try again.',
  fatal: "Sorry, I'm having trouble right now. Please try again later.",
  notConfigured: "Sorry, that feature isn't set up yet.",
} as const;

export class ClassificationFailure extends Error {
  readonly kind = 'classification' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassificationFailure';
  }
}

export class HandlerFailure extends Error {
  readonly kind = 'handler' as const;
  /** Plain-language text safe to show the end user. */
  readonly userMessage: string;

  constructor(
    message: string,
    userMessage: string = FALLBACK_MESSAGES.handler,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HandlerFailure';
    this.userMessage = userMessage;
  }
}

export class PersistenceFailure extends Error {
  readonly kind = 'persistence' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceFailure';
  }
}

export class RetrievalFailure extends Error {
  readonly kind = 'retrieval' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RetrievalFailure';
  }
}

export class TransientCapabilityError extends Error {
  readonly kind = 'transient' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientCapabilityError';
  }
}

export class FatalCapabilityError extends Error {
  readonly kind = 'fatal' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalCapabilityError';
  }
}

export class ConfigurationError extends Error {
  readonly kind = 'configuration' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class DeadlineExceeded extends Error {
  readonly kind = 'deadline' as const;
  constructor(readonly deadlineMs: number) {
    super(`Processing cycle exceeded its ${deadlineMs}ms deadline`);
    this.name = 'DeadlineExceeded';
  }
}

export class BackpressureError extends Error {
  readonly kind = 'backpressure' as const;
  constructor(
    readonly threadId: string,
    readonly limit: number,
  ) {
    super(`Lane for ${threadId} already holds ${limit} pending messages`);
    this.name = 'BackpressureError';
  }
}

/** Errors that must reach the process boundary instead of being absorbed. */
export function isFatal(
  err: unknown,
): err is FatalCapabilityError | ConfigurationError {
  return err instanceof FatalCapabilityError || err instanceof ConfigurationError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
