export const DEFAULT_MODEL = 'gpt-4o-mini';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

/** Per-session budget in seconds, applied when a preset sets none. */
export const DEFAULT_AGENT_TIMEOUT_S = 60;

export const ENV_KEYS = {
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  OPENAI_BASE_URL: 'OPENAI_BASE_URL',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

/** Directory name for project-local and user-global settings. */
export const SETTINGS_DIR = '.symposium';
