import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseEnv } from './env.js';

const required = {
  DATABASE_URL: 'postgres://localhost:5432/mailpilot_test',
  GROQ_API_KEY: 'test-secret',
  OPENAI_API_KEY: 'test-secret',
};

describe('parseEnv', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies defaults for optional keys', () => {
    const env = parseEnv({ ...required });
    expect(env.NODE_ENV).toBe('development');
    expect(env.EMBEDDING_MODEL).toBe('text-embedding-3-small');
    expect(env.EMBEDDING_DIMENSION).toBe(1536);
    expect(env.OUTLOOK_USER_ID).toBe('me');
    expect(env.KNOWLEDGE_BASE_PATH).toBe('knowledge_base');
    expect(env.KNOWLEDGE_SEED_DIR).toBeUndefined();
  });

  it('coerces the embedding dimension from a string', () => {
    const env = parseEnv({ ...required, EMBEDDING_DIMENSION: '384' });
    expect(env.EMBEDDING_DIMENSION).toBe(384);
  });

  it('throws when a required key is missing', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(() => parseEnv({ DATABASE_URL: required.DATABASE_URL })).toThrow(
      'Invalid environment variables'
    );
  });

  it('rejects an unknown log level', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(() => parseEnv({ ...required, LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid environment variables'
    );
  });
});
