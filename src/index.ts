/**
 * Recipe Semantic Matching
 *
 * Duplicate detection and search reranking over recipe embeddings, with
 * memoized embedding and judgment calls.
 */

export { ResponseCache, hashCacheKey } from './cache';
export { loadConfig, type AppConfig } from './config';
export { createContext, type AppContext, type ContextOverrides } from './context';
export {
  createDatabase,
  setupRecipeStore,
  dropRecipeStore,
  createVectorIndex,
  hasVectorIndex,
  vectorIndexDefinition,
  findVectorIndex,
  COLLECTIONS,
  VECTOR_INDEX_NAME,
  type VectorIndexOptions,
} from './db';
export { DedupeGate, buildDedupePrompt, DEDUPE_DECISION_SCHEMA } from './dedupe';
export {
  OpenAIEmbeddingProvider,
  buildTitleIngredientsText,
  recipeContentHash,
  cosineSimilarity,
  cosineDistance,
  EMBEDDING_MODELS,
  type EmbeddingsClient,
} from './embeddings';
export { ConfigError, ExtractionError, InvalidQueryError } from './errors';
export {
  RecipeExtractor,
  buildCleanupPrompt,
  CLEANUP_SCHEMA,
  EXTRACTION_SCHEMA,
  type ExtractorOptions,
} from './extraction';
export { RecipeIngestion, type IngestResult } from './ingestion';
export {
  OpenAIJudgmentProvider,
  type JudgmentProvider,
  type JudgmentSchema,
  type ChatClient,
  type JudgeOptions,
} from './judge';
export { logger } from './logger';
export { InMemoryRecipeStore } from './memory-store';
export {
  DEDUPLICATION_SYSTEM_PROMPT,
  SEARCH_RERANK_SYSTEM_PROMPT,
  CLEANUP_SYSTEM_PROMPT,
  EXTRACTION_SYSTEM_PROMPT,
} from './prompts';
export { ArangoRecipeStore } from './recipe-store';
export {
  Reranker,
  rankMatches,
  buildRerankPrompt,
  RERANK_RESPONSE_SCHEMA,
  type RankOptions,
  type RankOutcome,
} from './reranker';
export {
  normalizeSearchQuery,
  embeddingScoreFromDistance,
  lexicalBoosts,
  tokenize,
  clamp,
  toFloat,
  type BoostWeights,
  type LexicalBoost,
} from './scoring';
export { RecipeSearch, MIN_QUERY_CHARS, type RecipeSearchOptions, type SearchResponse } from './search';
export * from './types';
