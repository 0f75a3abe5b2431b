/**
 * Recipe Semantic Matching Types
 */

/** Supported embedding models */
export type EmbeddingModelType =
  | 'text-embedding-3-small'
  | 'text-embedding-3-large'
  | 'text-embedding-ada-002';

/** Embedding vector, fixed dimensionality per embedding type */
export type EmbeddingVector = number[];

/** Label partitioning vectors into comparable families */
export type EmbeddingType = 'title_ingredients' | 'full_text';

/** Recipe as extracted from free text */
export interface Recipe {
  title: string;
  ingredients: string[];
  instructions: string[];
}

/** Recipe as persisted */
export interface StoredRecipe extends Recipe {
  id: string;
  sourceUrl?: string;
  createdAt: number;
}

/** Stored recipe document in ArangoDB */
export interface RecipeDocument {
  _key: string;
  _id?: string;
  _rev?: string;
  title: string;
  ingredients: string[];
  instructions: string[];
  content_hash: string;
  source_url?: string;
  created_at: number;
}

/** Stored embedding document in ArangoDB */
export interface RecipeEmbeddingDocument {
  _key?: string;
  _id?: string;
  _rev?: string;
  recipe_id: string;
  embedding_type: EmbeddingType;
  embedding: EmbeddingVector;
  created_at: number;
}

/** Single nearest neighbour of a new recipe */
export interface NearestEmbedding {
  recipeId: string;
  distance: number | null;
}

/** Distance-ranked hit from the vector store */
export interface SearchCandidate {
  id: string;
  name: string;
  distance: number | null;
}

/** Candidate enriched with an ingredient preview for the reranker */
export interface RerankCandidate extends SearchCandidate {
  ingredientsPreview: string[];
}

/** Relevance judgment for one candidate (best first) */
export interface RankedCandidate {
  id: string;
  score: number;
}

export type RerankMode = 'fallback';

/** Search hit, optionally carrying reranker scores */
export interface SearchResult extends SearchCandidate {
  rerankScore?: number;
  embeddingScore?: number;
  combinedScore?: number;
  rawRerankScore?: number;
  cuisineBoost?: number;
  familyBoost?: number;
  rerankMode?: RerankMode;
}

/** Outcome of a duplicate check */
export interface DuplicateCheck {
  isDuplicate: boolean;
  existingRecipeId: string | null;
  /** Embedding computed for the candidate, reusable on insert */
  embedding: EmbeddingVector | null;
}

/** Outcome of a store insert (an existing id when the content was already stored) */
export interface CreateRecipeResult {
  id: string;
  created: boolean;
}

/** Schema-validated judgment result */
export type JudgeResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** Text → vector */
export interface EmbeddingProvider {
  embed(text: string): Promise<EmbeddingVector>;
}

/** Recipe CRUD plus cosine-distance lookups within one embedding type */
export interface RecipeStore {
  createRecipe(recipe: Recipe, sourceUrl?: string): Promise<CreateRecipeResult>;
  createRecipeEmbedding(
    recipeId: string,
    embeddingType: EmbeddingType,
    embedding: EmbeddingVector
  ): Promise<void>;
  hasRecipeEmbedding(recipeId: string, embeddingType: EmbeddingType): Promise<boolean>;
  getFullRecipe(recipeId: string): Promise<StoredRecipe | null>;
  getIngredientPreviews(
    recipeIds: string[],
    maxIngredients: number
  ): Promise<Map<string, string[]>>;
  findNearestEmbedding(
    embedding: EmbeddingVector,
    embeddingType: EmbeddingType
  ): Promise<NearestEmbedding | null>;
  findNearestEmbeddings(
    embedding: EmbeddingVector,
    embeddingType: EmbeddingType,
    limit: number
  ): Promise<SearchCandidate[]>;
}

/** Three-zone dedupe thresholds over cosine distance */
export interface DedupeConfig {
  /** At or below: automatic duplicate */
  strictDistance: number;
  /** Above: automatic distinct */
  looseDistance: number;
  embeddingType: EmbeddingType;
}

/** Reranker thresholds, weights and lexical boosts */
export interface RerankConfig {
  minScore: number;
  /** Relaxed threshold for the second pass; null disables the pass */
  fallbackMinScore: number | null;
  /** Share of the judgment score in the blended score */
  weight: number;
  cuisineBoost: number;
  familyBoost: number;
  ingredientPreviewLength: number;
}

/** Default configuration values */
export const DEFAULT_DEDUPE_CONFIG: DedupeConfig = {
  strictDistance: 0.05,
  looseDistance: 0.15,
  embeddingType: 'title_ingredients',
};

export const DEFAULT_RERANK_CONFIG: RerankConfig = {
  minScore: 0.4,
  fallbackMinScore: 0.25,
  weight: 0.7,
  cuisineBoost: 0.15,
  familyBoost: 0.1,
  ingredientPreviewLength: 8,
};

