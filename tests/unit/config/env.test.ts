/**
 * Environment Configuration Tests
 */

import { describe, it, expect } from 'vitest';

import { loadEnv } from '@/config/env.js';

const REQUIRED = {
  OPENROUTER_API_KEY: 'test-secret',
  SERPER_API_KEY: 'test-secret',
  AUTH_ENABLED: 'false',
};

describe('loadEnv', () => {
  it('should apply defaults', () => {
    expect(loadEnv(REQUIRED)).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      AUTH_ENABLED: false,
      OPENROUTER_API_KEY: 'test-secret',
      LLM_BASE_URL: 'https://openrouter.ai/api/v1',
      LLM_MODEL: 'google/gemini-2.5-flash',
      SERPER_API_KEY: 'test-secret',
      MAX_ITERATIONS: 6,
      MAX_INPUT_TOKENS: 60000,
      MAX_OUTPUT_TOKENS: 4096,
      LLM_CALL_TIMEOUT_MS: 60000,
      TOOL_CALL_TIMEOUT_MS: 20000,
      LOCK_WAIT_MS: 30000,
      RATE_LIMIT_REQUESTS: 30,
      RATE_LIMIT_WINDOW_SECONDS: 60,
      ALLOWED_ORIGINS: ['http://localhost:5173', 'http://localhost:3000'],
    });
  });

  it('should treat blank values as unset', () => {
    const env = loadEnv({ ...REQUIRED, PORT: '', RUN_TIMEOUT_MS: '', SUPABASE_URL: '' });

    expect(env.PORT).toBe(3000);
    expect(env.RUN_TIMEOUT_MS).toBeUndefined();
    expect(env.SUPABASE_URL).toBeUndefined();
  });

  it('should coerce numbers and split origins', () => {
    const env = loadEnv({
      ...REQUIRED,
      PORT: '8080',
      RUN_TIMEOUT_MS: '90000',
      ALLOWED_ORIGINS: 'https://a.example.com, ,https://b.example.com',
    });

    expect(env.PORT).toBe(8080);
    expect(env.RUN_TIMEOUT_MS).toBe(90000);
    expect(env.ALLOWED_ORIGINS).toEqual(['https://a.example.com', 'https://b.example.com']);
  });

  it.each([
    ['true', true],
    ['1', true],
    ['0', false],
  ])('should read AUTH_ENABLED=%s', (value, expected) => {
    const env = loadEnv({
      ...REQUIRED,
      AUTH_ENABLED: value,
      SUPABASE_URL: 'https://db.example.com',
      SUPABASE_SERVICE_KEY: 'test-secret',
    });

    expect(env.AUTH_ENABLED).toBe(expected);
  });

  it('should require the API keys', () => {
    expect(() => loadEnv({ AUTH_ENABLED: 'false' })).toThrow(
      'Invalid environment configuration:\n  - OPENROUTER_API_KEY: Required\n  - SERPER_API_KEY: Required'
    );
  });

  it('should require Supabase when auth is enabled', () => {
    expect(() => loadEnv({ ...REQUIRED, AUTH_ENABLED: 'true' })).toThrow(
      '  - SUPABASE_URL: SUPABASE_URL and SUPABASE_SERVICE_KEY are required when AUTH_ENABLED is true'
    );
  });

  it('should require both Upstash settings together', () => {
    expect(() => loadEnv({ ...REQUIRED, UPSTASH_REDIS_URL: 'https://redis.example.com' })).toThrow(
      '  - UPSTASH_REDIS_URL: UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN must be set together'
    );
  });

  it('should reject an unknown flag value', () => {
    expect(() => loadEnv({ ...REQUIRED, AUTH_ENABLED: 'yes' })).toThrow(
      '  - AUTH_ENABLED: Invalid enum value'
    );
  });
});
