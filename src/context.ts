/**
 * Composition root: one instance of every cache, provider and service
 */

import OpenAI from 'openai';
import { ResponseCache } from './cache';
import type { AppConfig } from './config';
import { createDatabase } from './db';
import { DedupeGate } from './dedupe';
import { OpenAIEmbeddingProvider } from './embeddings';
import { RecipeExtractor } from './extraction';
import { RecipeIngestion } from './ingestion';
import { OpenAIJudgmentProvider } from './judge';
import { ArangoRecipeStore } from './recipe-store';
import { Reranker } from './reranker';
import { RecipeSearch } from './search';
import type { EmbeddingVector, RecipeStore } from './types';

export interface AppContext {
  config: AppConfig;
  caches: {
    embeddings: ResponseCache<EmbeddingVector>;
    judgments: ResponseCache<unknown>;
  };
  store: RecipeStore;
  embeddings: OpenAIEmbeddingProvider;
  judge: OpenAIJudgmentProvider;
  dedupe: DedupeGate;
  extractor: RecipeExtractor;
  reranker: Reranker;
  search: RecipeSearch;
  ingestion: RecipeIngestion;
}

export interface ContextOverrides {
  openai?: OpenAI;
  store?: RecipeStore;
}

export function createContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  const openai =
    overrides.openai ?? new OpenAI({ apiKey: config.openai.apiKey, baseURL: config.openai.baseURL });
  const store = overrides.store ?? new ArangoRecipeStore(createDatabase(config.arangodb));

  const caches = {
    embeddings: new ResponseCache<EmbeddingVector>(config.cache.ttlMs, config.cache.maxItems),
    judgments: new ResponseCache<unknown>(config.cache.ttlMs, config.cache.maxItems),
  };

  const embeddings = new OpenAIEmbeddingProvider(openai, caches.embeddings, config.embeddingModel);
  const judge = new OpenAIJudgmentProvider(openai, caches.judgments, {
    model: config.judgeModel,
    maxTokens: config.judgeMaxTokens,
  });

  const dedupe = new DedupeGate(embeddings, judge, store, config.dedupe);
  const extractor = new RecipeExtractor(judge, config.extraction);
  const reranker = new Reranker(judge, store, config.rerank);
  const search = new RecipeSearch(embeddings, store, reranker, {
    embeddingType: config.dedupe.embeddingType,
    candidatePool: config.search.candidatePool,
    defaultLimit: config.search.defaultLimit,
  });
  const ingestion = new RecipeIngestion(
    dedupe,
    extractor,
    embeddings,
    store,
    config.dedupe.embeddingType
  );

  return {
    config,
    caches,
    store,
    embeddings,
    judge,
    dedupe,
    extractor,
    reranker,
    search,
    ingestion,
  };
}
