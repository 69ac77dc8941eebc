import { z } from 'zod';
import { PreconditionError } from '../errors.js';
import { DEFAULT_BASE_URL, ENV_KEYS } from './defaults.js';

const RuntimeEnvSchema = z.object({
  OPENAI_API_KEY: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined)),
  OPENAI_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
});

export type RuntimeEnv = z.infer<typeof RuntimeEnvSchema>;

/** Parse the process environment (or any record) into a typed runtime env. */
export function loadEnv(source: Record<string, string | undefined> = process.env): RuntimeEnv {
  const parsed = RuntimeEnvSchema.safeParse({
    OPENAI_API_KEY: source[ENV_KEYS.OPENAI_API_KEY],
    OPENAI_BASE_URL: source[ENV_KEYS.OPENAI_BASE_URL] || undefined,
    LOG_LEVEL: source[ENV_KEYS.LOG_LEVEL] || undefined,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new PreconditionError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function requireApiKey(env: RuntimeEnv): string {
  if (!env.OPENAI_API_KEY) {
    throw new PreconditionError(
      `${ENV_KEYS.OPENAI_API_KEY} environment variable not set. Add it to .env or export it.`,
    );
  }
  return env.OPENAI_API_KEY;
}
