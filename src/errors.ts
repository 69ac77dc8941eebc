export type SessionErrorKind = 'connection' | 'protocol' | 'timeout' | 'upstream' | 'cancelled';

/**
 * Failure scoped to a single agent's session. Never thrown across the
 * dispatcher; it travels inside a `failed` stream event instead.
 */
export class SessionError extends Error {
  readonly kind: SessionErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: SessionErrorKind, status?: number) {
    super(message);
    this.name = 'SessionError';
    this.kind = kind;
    this.status = status;
  }
}

/**
 * A condition that must hold before a round can start (credential present,
 * non-empty roster, pending user turn, no round already running).
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export function isSessionError(err: unknown): err is SessionError {
  return err instanceof SessionError;
}

/** Normalise an unknown throwable into a SessionError of the given kind. */
export function toSessionError(err: unknown, kind: SessionErrorKind): SessionError {
  if (err instanceof SessionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SessionError(message, kind);
}

/** The cause a session was aborted with, or a plain cancellation. */
export function causeFromSignal(signal: AbortSignal): SessionError {
  const reason: unknown = signal.reason;
  return isSessionError(reason) ? reason : new SessionError('Session cancelled', 'cancelled');
}

/** Human-readable time budget for timeout messages: "50ms", "1.5s", "60s". */
export function formatBudget(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${Number((ms / 1000).toFixed(1))}s`;
}
