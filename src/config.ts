import { config } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LoadTestConfig } from './types.js';

config();

export const DEFAULT_MODEL = 'meta-llama/Llama-2-7b-chat-hf';

/**
 * Validation rules for a run. Numeric fields are coerced so that raw
 * environment variables and CLI option strings can be passed straight in.
 */
export const LoadTestConfigSchema = z
  .object({
    serviceUrl: z.string().url('must be a valid URL'),
    totalRequests: z.coerce.number().int().positive('must be greater than 0'),
    concurrency: z.coerce.number().int().min(1, 'must be at least 1'),
    timeoutMs: z.coerce.number().int().positive('must be greater than 0'),
    model: z.string().min(1, 'cannot be empty'),
    maxTokens: z.coerce.number().int().positive('must be greater than 0'),
    temperature: z.coerce.number().min(0).max(2),
    label: z.string().min(1, 'cannot be empty'),
  })
  .refine((c) => c.concurrency <= c.totalRequests, {
    message: 'must not exceed total requests',
    path: ['concurrency'],
  });

export type LoadTestConfigInput = { [K in keyof LoadTestConfig]?: string | number };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadTestConfigInput {
  return {
    serviceUrl: env.LLM_SERVICE_URL || 'http://localhost:8000',
    totalRequests: env.LOAD_TEST_REQUESTS || '100',
    concurrency: env.LOAD_TEST_CONCURRENCY || '20',
    timeoutMs: env.LOAD_TEST_TIMEOUT_MS || '30000',
    model: env.LLM_MODEL || DEFAULT_MODEL,
    maxTokens: env.LLM_MAX_TOKENS || '100',
    temperature: env.LLM_TEMPERATURE || '0.7',
    label: env.LOAD_TEST_LABEL || 'default',
  };
}

export function parseConfig(input: LoadTestConfigInput): Readonly<LoadTestConfig> {
  const result = LoadTestConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze(result.data);
}

/**
 * Fills gaps in `overrides` from the environment and validates the result.
 * Keys explicitly set to `undefined` fall back to the environment value.
 */
export function resolveConfig(
  overrides: LoadTestConfigInput,
  env: NodeJS.ProcessEnv = process.env
): Readonly<LoadTestConfig> {
  const merged = loadConfig(env);
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && isConfigKey(key, merged)) {
      merged[key] = value;
    }
  }
  return parseConfig(merged);
}

function isConfigKey(key: string, input: LoadTestConfigInput): key is keyof LoadTestConfig {
  return key in input;
}
