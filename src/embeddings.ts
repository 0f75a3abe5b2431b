/**
 * OpenAI Embeddings Integration
 */

import type { EmbeddingCreateParams } from 'openai/resources/embeddings';
import { hashCacheKey, ResponseCache } from './cache';
import { logger } from './logger';
import type { EmbeddingModelType, EmbeddingProvider, EmbeddingVector, Recipe } from './types';

const log = logger.child({ module: 'embeddings' });

/** Embedding model configurations */
export const EMBEDDING_MODELS: Record<EmbeddingModelType, { dimension: number }> = {
  'text-embedding-3-small': { dimension: 1536 },
  'text-embedding-3-large': { dimension: 3072 },
  'text-embedding-ada-002': { dimension: 1536 },
};

/** The slice of the OpenAI client this module calls */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: EmbeddingCreateParams
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

/** Text embedded for the `title_ingredients` embedding type */
export function buildTitleIngredientsText(title: string, ingredients: string[]): string {
  return `Title: ${title}\nIngredients: ${ingredients.join(', ')}`;
}

/** Content fingerprint backing the unique index on stored recipes */
export function recipeContentHash(recipe: Recipe): string {
  const normalize = (value: string) => value.trim().toLowerCase().split(/\s+/).join(' ');
  return hashCacheKey(
    'recipe',
    buildTitleIngredientsText(normalize(recipe.title), recipe.ingredients.map(normalize))
  );
}

/** Calculate cosine similarity between two vectors */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dotProduct / magnitude;
}

/** 1 - cosine similarity, clamped to [0, 1] */
export function cosineDistance(a: number[], b: number[]): number {
  return Math.min(Math.max(1 - cosineSimilarity(a, b), 0), 1);
}

/**
 * Embedding provider backed by the OpenAI embeddings endpoint, memoized per
 * (model, text).
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: EmbeddingsClient;
  private model: EmbeddingModelType;
  private cache: ResponseCache<EmbeddingVector>;

  constructor(
    client: EmbeddingsClient,
    cache: ResponseCache<EmbeddingVector>,
    model: EmbeddingModelType = 'text-embedding-3-small'
  ) {
    this.client = client;
    this.cache = cache;
    this.model = model;
  }

  get modelName(): EmbeddingModelType {
    return this.model;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const key = hashCacheKey('embedding', this.model, text);
    const cached = this.cache.get(key);
    if (cached) {
      log.debug({ model: this.model }, 'embedding cache hit');
      return cached;
    }

    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      encoding_format: 'float',
    });

    const first = response.data[0];
    if (!first) {
      throw new Error(`Embedding response from ${this.model} contained no vectors`);
    }

    this.cache.set(key, first.embedding);
    return first.embedding;
  }

  /** Batch embed multiple texts; cached texts are not re-sent */
  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    const keys = texts.map((text) => hashCacheKey('embedding', this.model, text));
    const results: Array<EmbeddingVector | undefined> = keys.map((key) => this.cache.get(key));
    const missing = texts
      .map((text, index) => ({ text, index }))
      .filter(({ index }) => results[index] === undefined);

    if (missing.length > 0) {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: missing.map((m) => m.text),
        encoding_format: 'float',
      });

      // Sort by index to maintain order
      const vectors = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);

      if (vectors.length !== missing.length) {
        throw new Error(
          `Embedding response from ${this.model} returned ${vectors.length} vectors for ${missing.length} inputs`
        );
      }

      missing.forEach(({ index }, i) => {
        results[index] = vectors[i];
        this.cache.set(keys[index], vectors[i]);
      });
    }

    return results.map((vector, index) => {
      if (!vector) throw new Error(`Missing embedding for input ${index}`);
      return vector;
    });
  }
}
