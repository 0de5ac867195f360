/**
 * Environment Configuration
 *
 * Parsed once at startup. The entry point loads `.env` through
 * `dotenv/config` before calling `loadEnv`.
 */

import { z } from 'zod';

/**
 * `.env` files leave unset keys as empty strings
 */
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const booleanFlag = (fallback: boolean) =>
  blankAsUnset(
    z
      .enum(['true', 'false', '1', '0'])
      .transform((value) => value === 'true' || value === '1')
      .optional()
      .transform((value) => value ?? fallback)
  );

const optionalString = blankAsUnset(z.string().optional());

const positiveInt = (fallback: number) =>
  blankAsUnset(z.coerce.number().int().positive().default(fallback));

const optionalPositiveInt = blankAsUnset(
  z.coerce.number().int().positive().optional()
);

export const envSchema = z
  .object({
    NODE_ENV: blankAsUnset(
      z.enum(['development', 'production', 'test']).default('development')
    ),
    PORT: positiveInt(3000),

    AUTH_ENABLED: booleanFlag(true),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,

    OPENROUTER_API_KEY: z.string().min(1, 'OPENROUTER_API_KEY is required'),
    LLM_BASE_URL: blankAsUnset(
      z.string().url().default('https://openrouter.ai/api/v1')
    ),
    LLM_MODEL: blankAsUnset(
      z.string().min(1).default('google/gemini-2.5-flash')
    ),
    LLM_SITE_URL: optionalString,
    LLM_SITE_NAME: optionalString,

    SERPER_API_KEY: z.string().min(1, 'SERPER_API_KEY is required'),
    IPGEOLOCATION_API_KEY: optionalString,

    UPSTASH_REDIS_URL: optionalString,
    UPSTASH_REDIS_TOKEN: optionalString,

    MAX_ITERATIONS: positiveInt(6),
    MAX_INPUT_TOKENS: positiveInt(60000),
    MAX_OUTPUT_TOKENS: positiveInt(4096),
    LLM_CALL_TIMEOUT_MS: positiveInt(60000),
    TOOL_CALL_TIMEOUT_MS: positiveInt(20000),
    RUN_TIMEOUT_MS: optionalPositiveInt,
    LOCK_WAIT_MS: positiveInt(30000),

    RATE_LIMIT_REQUESTS: positiveInt(30),
    RATE_LIMIT_WINDOW_SECONDS: positiveInt(60),

    ALLOWED_ORIGINS: blankAsUnset(
      z.string().default('http://localhost:5173,http://localhost:3000')
    ).transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  })
  .superRefine((env, ctx) => {
    if (env.AUTH_ENABLED && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message:
          'SUPABASE_URL and SUPABASE_SERVICE_KEY are required when AUTH_ENABLED is true',
      });
    }
    if (Boolean(env.UPSTASH_REDIS_URL) !== Boolean(env.UPSTASH_REDIS_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPSTASH_REDIS_URL'],
        message: 'UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN must be set together',
      });
    }
  });

export type Env = z.output<typeof envSchema>;

/**
 * Parse the environment, throwing with every issue listed
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return parsed.data;
}
