import { describe, expect, it } from 'vitest';

import { allowedOrigins, readEnv, requireApiKey } from '@src/common/constants/ENV';
import { NodeEnvs } from '@src/common/constants';
import { ConfigurationError } from '@src/services/errors';

describe('readEnv', () => {
  it('applies defaults', () => {
    const env = readEnv({});

    expect(env.NODE_ENV).toBe(NodeEnvs.Dev);
    expect(env.PORT).toBe(3000);
    expect(env.OPENAI_MODEL).toBe('gpt-4o-mini');
    expect(env.COMPARATOR_TIMEOUT_MS).toBe(30000);
    expect(env.COMPARATOR_CONCURRENCY).toBe(1);
    expect(env.PROMPT_TEXT_LIMIT).toBe(3800);
    expect(env.MAX_UPLOAD_MB).toBe(10);
    expect(env.OPENAI_API_KEY).toBeUndefined();
  });

  it('coerces numeric variables', () => {
    const env = readEnv({ PORT: '8080', COMPARATOR_CONCURRENCY: '4', OPENAI_API_KEY: 'test-secret' });

    expect(env.PORT).toBe(8080);
    expect(env.COMPARATOR_CONCURRENCY).toBe(4);
    expect(env.OPENAI_API_KEY).toBe('test-secret');
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      readEnv({ PORT: 'abc', COMPARATOR_CONCURRENCY: '0', NODE_ENV: 'staging' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['NODE_ENV', 'PORT', 'COMPARATOR_CONCURRENCY']);
  });
});

describe('requireApiKey', () => {
  it('returns the configured key', () => {
    expect(requireApiKey({ OPENAI_API_KEY: 'test-secret' })).toBe('test-secret');
  });

  it('fails with a ConfigurationError when the key is missing or blank', () => {
    expect(() => requireApiKey({ OPENAI_API_KEY: undefined })).toThrow(ConfigurationError);
    expect(() => requireApiKey({ OPENAI_API_KEY: '' })).toThrow('OPENAI_API_KEY is not set');
  });
});

describe('allowedOrigins', () => {
  it('splits and trims the comma-separated list', () => {
    expect(allowedOrigins({ ALLOWED_ORIGINS: 'http://a.test, http://b.test ,' })).toEqual([
      'http://a.test',
      'http://b.test',
    ]);
  });
});
