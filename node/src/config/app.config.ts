/** App configuration, validated once from the environment. */
import { z } from 'zod';
import type { LogType } from '@/services/logger';
import { ConfigError } from '@/utils/errors';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(4000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_TYPE: z.enum(['json', 'pretty', 'hidden']).default('pretty'),
    LOG_LEVEL: z.coerce.number().int().min(0).max(6).default(3),
    EMBEDDING_PROVIDER: z.enum(['openai', 'hashing']).default('hashing'),
    OPENAI_API_KEY: z.string().trim().optional(),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    VOUCHER_STORE: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    REDIS_KEY_PREFIX: z.string().min(1).default('voucher:'),
    INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    ANSWER_ENABLED: booleanFlag.default(false),
    ANSWER_MODEL: z.string().min(1).default('gpt-4o-mini'),
  })
  .superRefine((env, ctx) => {
    const needsKey = env.EMBEDDING_PROVIDER === 'openai' || env.ANSWER_ENABLED;
    if (needsKey && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required for the openai embedding provider or the answer composer',
      });
    }
  });

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  log: {
    type: LogType;
    minLevel: number;
  };
  embedding: {
    provider: 'openai' | 'hashing';
    apiKey?: string;
    model: string;
    dimension: number;
    timeoutMs: number;
  };
  store: {
    kind: 'memory' | 'redis';
    redisUrl: string;
    keyPrefix: string;
  };
  ingest: {
    concurrency: number;
  };
  answer: {
    enabled: boolean;
    model: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings from .env files mean "unset".
  const raw = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => ({
      path: e.path.join('.') || 'root',
      message: e.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => i.path).join(', ')}`,
      issues,
    );
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    log: {
      type: e.LOG_TYPE,
      minLevel: e.LOG_LEVEL,
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      apiKey: e.OPENAI_API_KEY,
      model: e.EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    store: {
      kind: e.VOUCHER_STORE,
      redisUrl: e.REDIS_URL,
      keyPrefix: e.REDIS_KEY_PREFIX,
    },
    ingest: {
      concurrency: e.INGEST_CONCURRENCY,
    },
    answer: {
      enabled: e.ANSWER_ENABLED,
      model: e.ANSWER_MODEL,
    },
  });
}
