import { describe, expect, it } from 'vitest';
import { loadEnv, requireApiKey } from '../../src/config/env.js';
import { PreconditionError } from '../../src/errors.js';

describe('loadEnv', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadEnv({})).toEqual({
      OPENAI_API_KEY: undefined,
      OPENAI_BASE_URL: 'https://api.openai.com/v1',
      LOG_LEVEL: 'warn',
    });
  });

  it('trims the API key and treats a blank one as missing', () => {
    expect(loadEnv({ OPENAI_API_KEY: '  test-secret  ' }).OPENAI_API_KEY).toBe('test-secret');
    expect(loadEnv({ OPENAI_API_KEY: '   ' }).OPENAI_API_KEY).toBeUndefined();
  });

  it('treats an empty base URL as unset', () => {
    expect(loadEnv({ OPENAI_BASE_URL: '' }).OPENAI_BASE_URL).toBe('https://api.openai.com/v1');
  });

  it('rejects a malformed base URL', () => {
    expect(() => loadEnv({ OPENAI_BASE_URL: 'not a url' })).toThrow(/^Invalid environment: OPENAI_BASE_URL: /);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(PreconditionError);
  });
});

describe('requireApiKey', () => {
  it('returns the key when present', () => {
    expect(requireApiKey(loadEnv({ OPENAI_API_KEY: 'test-secret' }))).toBe('test-secret');
  });

  it('names the missing variable', () => {
    expect(() => requireApiKey(loadEnv({}))).toThrow(
      'OPENAI_API_KEY environment variable not set. Add it to .env or export it.',
    );
  });
});
