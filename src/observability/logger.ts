import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * Pino logger writing JSON lines to stderr; stdout belongs to the rendered
 * discussion. Silent under Vitest or NODE_ENV=test.
 *
 * Reads LOG_LEVEL directly so it is safe to call at module scope.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isTestTooling = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';
  const level = process.env.LOG_LEVEL ?? 'warn';

  return pino(
    {
      level,
      enabled: !isTestTooling,
      base: { ...bindings, app: 'symposium' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** Disabled logger with the real type, for tests and library callers. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
