/**
 * In-process recipe store with brute-force cosine search. Backs tests and
 * local runs without ArangoDB.
 */

import { cosineDistance, recipeContentHash } from './embeddings';
import type {
  CreateRecipeResult,
  EmbeddingType,
  EmbeddingVector,
  NearestEmbedding,
  Recipe,
  RecipeStore,
  SearchCandidate,
  StoredRecipe,
} from './types';

interface StoredEmbedding {
  recipeId: string;
  embeddingType: EmbeddingType;
  embedding: EmbeddingVector;
}

export class InMemoryRecipeStore implements RecipeStore {
  private recipes = new Map<string, StoredRecipe>();
  private byContentHash = new Map<string, string>();
  private embeddings: StoredEmbedding[] = [];
  private nextId = 1;

  get recipeCount(): number {
    return this.recipes.size;
  }

  async createRecipe(recipe: Recipe, sourceUrl?: string): Promise<CreateRecipeResult> {
    const contentHash = recipeContentHash(recipe);
    const existingId = this.byContentHash.get(contentHash);
    if (existingId) {
      return { id: existingId, created: false };
    }

    const id = `recipe-${this.nextId++}`;
    this.recipes.set(id, {
      id,
      title: recipe.title,
      ingredients: [...recipe.ingredients],
      instructions: [...recipe.instructions],
      ...(sourceUrl && { sourceUrl }),
      createdAt: Date.now(),
    });
    this.byContentHash.set(contentHash, id);
    return { id, created: true };
  }

  async createRecipeEmbedding(
    recipeId: string,
    embeddingType: EmbeddingType,
    embedding: EmbeddingVector
  ): Promise<void> {
    this.embeddings = this.embeddings.filter(
      (e) => !(e.recipeId === recipeId && e.embeddingType === embeddingType)
    );
    this.embeddings.push({ recipeId, embeddingType, embedding: [...embedding] });
  }

  async hasRecipeEmbedding(recipeId: string, embeddingType: EmbeddingType): Promise<boolean> {
    return this.embeddings.some(
      (e) => e.recipeId === recipeId && e.embeddingType === embeddingType
    );
  }

  async getFullRecipe(recipeId: string): Promise<StoredRecipe | null> {
    return this.recipes.get(recipeId) ?? null;
  }

  async getIngredientPreviews(
    recipeIds: string[],
    maxIngredients: number
  ): Promise<Map<string, string[]>> {
    const previews = new Map<string, string[]>();
    for (const id of recipeIds) {
      const recipe = this.recipes.get(id);
      if (recipe) previews.set(id, recipe.ingredients.slice(0, maxIngredients));
    }
    return previews;
  }

  async findNearestEmbedding(
    embedding: EmbeddingVector,
    embeddingType: EmbeddingType
  ): Promise<NearestEmbedding | null> {
    const [nearest] = this.rank(embedding, embeddingType);
    return nearest ? { recipeId: nearest.recipeId, distance: nearest.distance } : null;
  }

  async findNearestEmbeddings(
    embedding: EmbeddingVector,
    embeddingType: EmbeddingType,
    limit: number
  ): Promise<SearchCandidate[]> {
    const candidates: SearchCandidate[] = [];
    for (const { recipeId, distance } of this.rank(embedding, embeddingType)) {
      if (candidates.length >= limit) break;
      const recipe = this.recipes.get(recipeId);
      if (recipe) candidates.push({ id: recipeId, name: recipe.title, distance });
    }
    return candidates;
  }

  private rank(
    embedding: EmbeddingVector,
    embeddingType: EmbeddingType
  ): Array<{ recipeId: string; distance: number }> {
    return this.embeddings
      .filter((e) => e.embeddingType === embeddingType && e.embedding.length === embedding.length)
      .map((e) => ({ recipeId: e.recipeId, distance: cosineDistance(e.embedding, embedding) }))
      .sort((a, b) => a.distance - b.distance);
  }
}
