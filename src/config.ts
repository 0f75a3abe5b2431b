/**
 * Environment-driven configuration
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import {
  DEFAULT_DEDUPE_CONFIG,
  DEFAULT_RERANK_CONFIG,
  type DedupeConfig,
  type EmbeddingModelType,
  type RerankConfig,
} from './types';

/** Numeric variable: a blank value is rejected instead of read as 0 */
function envNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    schema
  );
}

const unitInterval = envNumber(z.number().min(0).max(1));

/** Empty or "none" disables the fallback rerank pass */
const optionalUnitInterval = z.preprocess(
  (value) => (value === '' || value === 'none' ? null : value),
  unitInterval.nullable()
);

const envSchema = z
  .object({
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    EMBEDDING_MODEL: z
      .enum(['text-embedding-3-small', 'text-embedding-3-large', 'text-embedding-ada-002'])
      .default('text-embedding-3-small'),
    JUDGE_MODEL: z.string().min(1).default('gpt-4o-mini'),
    JUDGE_MAX_TOKENS: envNumber(z.number().int().positive()).default(1000),

    LLM_CACHE_TTL_SECONDS: envNumber(z.number()).default(3600),
    LLM_CACHE_MAX_ITEMS: envNumber(z.number().int()).default(1024),

    ARANGODB_URL: z.string().default('http://localhost:8529'),
    ARANGODB_DATABASE: z.string().default('_system'),
    ARANGODB_USERNAME: z.string().default('root'),
    ARANGODB_PASSWORD: z.string().default(''),

    DEDUPE_DISTANCE_THRESHOLD: unitInterval.default(DEFAULT_DEDUPE_CONFIG.looseDistance),
    DEDUPE_STRICT_DUPLICATE_DISTANCE_THRESHOLD: unitInterval.default(
      DEFAULT_DEDUPE_CONFIG.strictDistance
    ),
    DEDUPE_EMBEDDING_TYPE: z
      .enum(['title_ingredients', 'full_text'])
      .default(DEFAULT_DEDUPE_CONFIG.embeddingType),

    RERANK_MIN_SCORE: unitInterval.default(DEFAULT_RERANK_CONFIG.minScore),
    RERANK_FALLBACK_MIN_SCORE: optionalUnitInterval.default(
      DEFAULT_RERANK_CONFIG.fallbackMinScore
    ),
    RERANK_WEIGHT: unitInterval.default(DEFAULT_RERANK_CONFIG.weight),
    RERANK_CUISINE_BOOST: unitInterval.default(DEFAULT_RERANK_CONFIG.cuisineBoost),
    RERANK_FAMILY_BOOST: unitInterval.default(DEFAULT_RERANK_CONFIG.familyBoost),
    RERANK_INGREDIENT_PREVIEW: envNumber(z.number().int().positive()).default(
      DEFAULT_RERANK_CONFIG.ingredientPreviewLength
    ),

    CLEANUP_MIN_TEXT_LENGTH: envNumber(z.number().int().nonnegative()).default(50),

    SEARCH_CANDIDATE_POOL: envNumber(z.number().int().positive()).default(25),
    SEARCH_DEFAULT_LIMIT: envNumber(z.number().int().positive()).default(10),
  })
  .superRefine((env, ctx) => {
    if (env.DEDUPE_STRICT_DUPLICATE_DISTANCE_THRESHOLD > env.DEDUPE_DISTANCE_THRESHOLD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DEDUPE_STRICT_DUPLICATE_DISTANCE_THRESHOLD'],
        message: 'must be less than or equal to DEDUPE_DISTANCE_THRESHOLD',
      });
    }
  });

export interface AppConfig {
  openai: {
    apiKey?: string;
    baseURL?: string;
  };
  embeddingModel: EmbeddingModelType;
  judgeModel: string;
  judgeMaxTokens: number;
  cache: {
    /** Non-positive ttl or capacity disables the provider caches */
    ttlMs: number;
    maxItems: number;
  };
  arangodb: {
    url: string;
    databaseName: string;
    username: string;
    password: string;
  };
  dedupe: DedupeConfig;
  rerank: RerankConfig;
  extraction: {
    minCleanedLength: number;
  };
  search: {
    candidatePool: number;
    defaultLimit: number;
  };
}

/** Parse and validate configuration; throws ConfigError listing every bad field */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
    },
    embeddingModel: e.EMBEDDING_MODEL,
    judgeModel: e.JUDGE_MODEL,
    judgeMaxTokens: e.JUDGE_MAX_TOKENS,
    cache: {
      ttlMs: e.LLM_CACHE_TTL_SECONDS * 1000,
      maxItems: e.LLM_CACHE_MAX_ITEMS,
    },
    arangodb: {
      url: e.ARANGODB_URL,
      databaseName: e.ARANGODB_DATABASE,
      username: e.ARANGODB_USERNAME,
      password: e.ARANGODB_PASSWORD,
    },
    dedupe: {
      strictDistance: e.DEDUPE_STRICT_DUPLICATE_DISTANCE_THRESHOLD,
      looseDistance: e.DEDUPE_DISTANCE_THRESHOLD,
      embeddingType: e.DEDUPE_EMBEDDING_TYPE,
    },
    rerank: {
      minScore: e.RERANK_MIN_SCORE,
      fallbackMinScore: e.RERANK_FALLBACK_MIN_SCORE,
      weight: e.RERANK_WEIGHT,
      cuisineBoost: e.RERANK_CUISINE_BOOST,
      familyBoost: e.RERANK_FAMILY_BOOST,
      ingredientPreviewLength: e.RERANK_INGREDIENT_PREVIEW,
    },
    extraction: {
      minCleanedLength: e.CLEANUP_MIN_TEXT_LENGTH,
    },
    search: {
      candidatePool: e.SEARCH_CANDIDATE_POOL,
      defaultLimit: e.SEARCH_DEFAULT_LIMIT,
    },
  };
}
