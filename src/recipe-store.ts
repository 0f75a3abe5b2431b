/**
 * ArangoDB-backed recipe and embedding store
 */

import { aql, type Database } from 'arangojs';
import { isArangoError } from 'arangojs/error';
import { COLLECTIONS } from './db';
import { recipeContentHash } from './embeddings';
import { logger } from './logger';
import type {
  CreateRecipeResult,
  EmbeddingType,
  EmbeddingVector,
  NearestEmbedding,
  Recipe,
  RecipeDocument,
  RecipeEmbeddingDocument,
  RecipeStore,
  SearchCandidate,
  StoredRecipe,
} from './types';

const log = logger.child({ module: 'recipe-store' });

/** ERROR_ARANGO_UNIQUE_CONSTRAINT_VIOLATED */
const UNIQUE_CONSTRAINT_VIOLATED = 1210;

/** Generate a ULID-like key */
export function generateKey(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${timestamp}${random}`.toUpperCase();
}

function toStoredRecipe(doc: RecipeDocument): StoredRecipe {
  return {
    id: doc._key,
    title: doc.title,
    ingredients: doc.ingredients,
    instructions: doc.instructions,
    ...(doc.source_url && { sourceUrl: doc.source_url }),
    createdAt: doc.created_at,
  };
}

export class ArangoRecipeStore implements RecipeStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  /**
   * Insert a recipe. A concurrent insert of the same content trips the
   * unique `content_hash` index; the existing recipe's id is returned.
   */
  async createRecipe(recipe: Recipe, sourceUrl?: string): Promise<CreateRecipeResult> {
    const recipesCol = this.db.collection<RecipeDocument>(COLLECTIONS.recipes);
    const contentHash = recipeContentHash(recipe);
    const doc: RecipeDocument = {
      _key: generateKey(),
      title: recipe.title,
      ingredients: recipe.ingredients,
      instructions: recipe.instructions,
      content_hash: contentHash,
      created_at: Date.now(),
      ...(sourceUrl && { source_url: sourceUrl }),
    };

    try {
      await recipesCol.save(doc);
      return { id: doc._key, created: true };
    } catch (err) {
      if (!isArangoError(err) || err.errorNum !== UNIQUE_CONSTRAINT_VIOLATED) {
        throw err;
      }
    }

    const cursor = await this.db.query<string>(aql`
      FOR r IN ${recipesCol}
        FILTER r.content_hash == ${contentHash}
        LIMIT 1
        RETURN r._key
    `);
    const existingId = await cursor.next();
    if (!existingId) {
      throw new Error(`Recipe with content hash ${contentHash} conflicted but was not found`);
    }
    log.info({ recipeId: existingId }, 'Recipe content already stored');
    return { id: existingId, created: false };
  }

  async createRecipeEmbedding(
    recipeId: string,
    embeddingType: EmbeddingType,
    embedding: EmbeddingVector
  ): Promise<void> {
    const embeddingsCol = this.db.collection<RecipeEmbeddingDocument>(COLLECTIONS.embeddings);
    await embeddingsCol.save({
      recipe_id: recipeId,
      embedding_type: embeddingType,
      embedding,
      created_at: Date.now(),
    });
  }

  async hasRecipeEmbedding(recipeId: string, embeddingType: EmbeddingType): Promise<boolean> {
    const embeddingsCol = this.db.collection(COLLECTIONS.embeddings);
    const cursor = await this.db.query<boolean>(aql`
      FOR e IN ${embeddingsCol}
        FILTER e.recipe_id == ${recipeId} AND e.embedding_type == ${embeddingType}
        LIMIT 1
        RETURN true
    `);
    return (await cursor.next()) === true;
  }

  async getFullRecipe(recipeId: string): Promise<StoredRecipe | null> {
    const recipesCol = this.db.collection(COLLECTIONS.recipes);
    const cursor = await this.db.query<RecipeDocument>(aql`
      FOR r IN ${recipesCol}
        FILTER r._key == ${recipeId}
        LIMIT 1
        RETURN r
    `);
    const doc = await cursor.next();
    return doc ? toStoredRecipe(doc) : null;
  }

  async getIngredientPreviews(
    recipeIds: string[],
    maxIngredients: number
  ): Promise<Map<string, string[]>> {
    if (recipeIds.length === 0) return new Map();

    const recipesCol = this.db.collection(COLLECTIONS.recipes);
    const cursor = await this.db.query<{ id: string; ingredients: string[] }>(aql`
      FOR r IN ${recipesCol}
        FILTER r._key IN ${recipeIds}
        RETURN { id: r._key, ingredients: SLICE(r.ingredients, 0, ${maxIngredients}) }
    `);
    const rows = await cursor.all();
    return new Map(rows.map((row) => [row.id, row.ingredients]));
  }

  async findNearestEmbedding(
    embedding: EmbeddingVector,
    embeddingType: EmbeddingType
  ): Promise<NearestEmbedding | null> {
    const embeddingsCol = this.db.collection(COLLECTIONS.embeddings);
    const cursor = await this.db.query<{ recipeId: string; distance: number | null }>(aql`
      FOR e IN ${embeddingsCol}
        FILTER e.embedding_type == ${embeddingType}
        FILTER e.embedding != null
        LET sim = COSINE_SIMILARITY(e.embedding, ${embedding})
        SORT sim DESC
        LIMIT 1
        RETURN { recipeId: e.recipe_id, distance: sim == null ? null : MIN([MAX([1 - sim, 0]), 1]) }
    `);
    return (await cursor.next()) ?? null;
  }

  async findNearestEmbeddings(
    embedding: EmbeddingVector,
    embeddingType: EmbeddingType,
    limit: number
  ): Promise<SearchCandidate[]> {
    const embeddingsCol = this.db.collection(COLLECTIONS.embeddings);
    const cursor = await this.db.query<SearchCandidate>(aql`
      FOR e IN ${embeddingsCol}
        FILTER e.embedding_type == ${embeddingType}
        FILTER e.embedding != null
        LET sim = COSINE_SIMILARITY(e.embedding, ${embedding})
        SORT sim DESC
        LIMIT ${limit}
        LET r = DOCUMENT(CONCAT(${COLLECTIONS.recipes}, '/', e.recipe_id))
        FILTER r != null
        RETURN { id: r._key, name: r.title, distance: sim == null ? null : MIN([MAX([1 - sim, 0]), 1]) }
    `);
    return cursor.all();
  }
}
