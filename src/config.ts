/**
 * Environment configuration.
 * Loads `.env` when present, validates everything once with zod and fails
 * with a ConfigError that lists every problem before any work starts.
 */

import { existsSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './providers/ILogProvider.js';
import { DEFAULT_URL_TEMPLATE } from './gateways/IpApiLookupGateway.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z
  .object({
    LOOKUP_PROVIDER: z.enum(['ip-api', 'censys']).default('ip-api'),
    LOOKUP_URL_TEMPLATE: z
      .string()
      .includes('{address}', { message: 'must contain {address}' })
      .default(DEFAULT_URL_TEMPLATE),
    LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    CENSYS_API_ID: z.string().optional(),
    CENSYS_API_SECRET: z.string().optional(),

    ASSESSMENT_API_KEY: z.string({ required_error: 'ASSESSMENT_API_KEY is required' }).min(1, 'ASSESSMENT_API_KEY is required'),
    ASSESSMENT_BASE_URL: z.string().url().optional(),
    ASSESSMENT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    ASSESSMENT_MAX_TOKENS: z.coerce.number().int().positive().default(300),
    ASSESSMENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    ASSESSMENT_STREAM: booleanFlag.default('true'),
    ASSESSMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    ASSESSMENT_RISK_SCORE: booleanFlag.default('false'),
    ASSESSMENT_REJECT_EMPTY: booleanFlag.default('false'),

    CONCURRENCY: z.coerce.number().int().min(1).default(3),
    PACING_MS: z.coerce.number().int().min(0).default(5_000),
    RETRY_PASSES: z.coerce.number().int().min(0).default(0),
    INPUT_DIR: z.string().min(1).default('data/input'),
    OUTPUT_DIR: z.string().min(1).default('data/output'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.LOOKUP_PROVIDER !== 'censys') return;
    for (const key of ['CENSYS_API_ID', 'CENSYS_API_SECRET'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when LOOKUP_PROVIDER is censys`,
        });
      }
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export type LookupConfig =
  | { provider: 'ip-api'; urlTemplate: string; timeoutMs: number }
  | { provider: 'censys'; apiId: string; apiSecret: string; timeoutMs: number };

export interface AppConfig {
  lookup: LookupConfig;
  assessment: {
    apiKey: string;
    baseURL?: string;
    model: string;
    maxTokens: number;
    temperature: number;
    stream: boolean;
    timeoutMs: number;
    includeRiskScore: boolean;
    rejectEmpty: boolean;
  };
  pool: {
    concurrency: number;
    pacingMs: number;
    retryPasses: number;
  };
  inputDir: string;
  outputDir: string;
  logLevel: LogLevel;
}

/**
 * Validate an environment and shape it into AppConfig.
 * Empty strings count as unset, so `KEY=` in a .env file falls back to the default.
 */
export function parseConfig(source: Record<string, string | undefined>): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(
      `Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`,
      { problems }
    );
  }

  const env = result.data;
  return {
    lookup: lookupConfig(env),
    assessment: {
      apiKey: env.ASSESSMENT_API_KEY,
      ...(env.ASSESSMENT_BASE_URL && { baseURL: env.ASSESSMENT_BASE_URL }),
      model: env.ASSESSMENT_MODEL,
      maxTokens: env.ASSESSMENT_MAX_TOKENS,
      temperature: env.ASSESSMENT_TEMPERATURE,
      stream: env.ASSESSMENT_STREAM,
      timeoutMs: env.ASSESSMENT_TIMEOUT_MS,
      includeRiskScore: env.ASSESSMENT_RISK_SCORE,
      rejectEmpty: env.ASSESSMENT_REJECT_EMPTY,
    },
    pool: {
      concurrency: env.CONCURRENCY,
      pacingMs: env.PACING_MS,
      retryPasses: env.RETRY_PASSES,
    },
    inputDir: env.INPUT_DIR,
    outputDir: env.OUTPUT_DIR,
    logLevel: env.LOG_LEVEL,
  };
}

function lookupConfig(env: Env): LookupConfig {
  if (env.LOOKUP_PROVIDER === 'censys' && env.CENSYS_API_ID && env.CENSYS_API_SECRET) {
    return {
      provider: 'censys',
      apiId: env.CENSYS_API_ID,
      apiSecret: env.CENSYS_API_SECRET,
      timeoutMs: env.LOOKUP_TIMEOUT_MS,
    };
  }
  return {
    provider: 'ip-api',
    urlTemplate: env.LOOKUP_URL_TEMPLATE,
    timeoutMs: env.LOOKUP_TIMEOUT_MS,
  };
}

/**
 * Load `.env` (if the file exists) into process.env and parse the result.
 * Returns whether a .env file was found so the caller can warn about it.
 */
export function loadConfig(envFile = '.env'): { config: AppConfig; envFileFound: boolean } {
  const envFileFound = existsSync(envFile);
  if (envFileFound) {
    dotenv.config({ path: envFile });
  }
  return { config: parseConfig(process.env), envFileFound };
}
