/**
 * Semantic recipe search: nearest-neighbour candidates, then reranking
 */

import { InvalidQueryError } from './errors';
import { logger } from './logger';
import type { Reranker } from './reranker';
import { normalizeSearchQuery } from './scoring';
import type { EmbeddingProvider, EmbeddingType, RecipeStore, SearchResult } from './types';

const log = logger.child({ module: 'search' });

/** Fewest non-whitespace characters a query may carry */
export const MIN_QUERY_CHARS = 2;

export interface RecipeSearchOptions {
  embeddingType: EmbeddingType;
  /** Nearest neighbours fetched before reranking */
  candidatePool: number;
  defaultLimit: number;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
}

export class RecipeSearch {
  private embeddings: EmbeddingProvider;
  private store: RecipeStore;
  private reranker: Reranker;
  private options: RecipeSearchOptions;

  constructor(
    embeddings: EmbeddingProvider,
    store: RecipeStore,
    reranker: Reranker,
    options: RecipeSearchOptions
  ) {
    this.embeddings = embeddings;
    this.store = store;
    this.reranker = reranker;
    this.options = options;
  }

  /** Throws InvalidQueryError for queries under MIN_QUERY_CHARS */
  async search(rawQuery: string, limit: number = this.options.defaultLimit): Promise<SearchResponse> {
    const query = normalizeSearchQuery(rawQuery);
    if (query.replace(/\s/g, '').length < MIN_QUERY_CHARS) {
      throw new InvalidQueryError(
        `Search query must contain at least ${MIN_QUERY_CHARS} non-whitespace characters`
      );
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidQueryError('Search limit must be a positive integer');
    }

    const queryVec = await this.embeddings.embed(query);
    const candidates = await this.store.findNearestEmbeddings(
      queryVec,
      this.options.embeddingType,
      Math.max(this.options.candidatePool, limit)
    );
    const results = await this.reranker.rerankAndFilter(query, candidates, limit);

    log.info(
      { query, candidates: candidates.length, results: results.length },
      'Semantic search complete'
    );
    return { query, results };
  }
}
