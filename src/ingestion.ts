/**
 * Recipe ingestion: duplicate gate before insert
 */

import type { DedupeGate } from './dedupe';
import { buildTitleIngredientsText } from './embeddings';
import type { RecipeExtractor } from './extraction';
import { logger } from './logger';
import type { EmbeddingProvider, EmbeddingType, EmbeddingVector, Recipe, RecipeStore } from './types';

const log = logger.child({ module: 'ingestion' });

export type IngestResult =
  | { status: 'duplicate'; recipeId: string }
  | { status: 'created'; recipeId: string };

export class RecipeIngestion {
  private gate: DedupeGate;
  private extractor: RecipeExtractor;
  private embeddings: EmbeddingProvider;
  private store: RecipeStore;
  private embeddingType: EmbeddingType;

  constructor(
    gate: DedupeGate,
    extractor: RecipeExtractor,
    embeddings: EmbeddingProvider,
    store: RecipeStore,
    embeddingType: EmbeddingType
  ) {
    this.gate = gate;
    this.extractor = extractor;
    this.embeddings = embeddings;
    this.store = store;
    this.embeddingType = embeddingType;
  }

  /**
   * Store a recipe unless the gate finds a duplicate. Store errors propagate;
   * the gate itself never blocks an insert.
   */
  async ingest(recipe: Recipe, sourceUrl?: string): Promise<IngestResult> {
    const check = await this.gate.findDuplicate(recipe);
    if (check.isDuplicate && check.existingRecipeId) {
      log.info({ recipeId: check.existingRecipeId, title: recipe.title }, 'Duplicate recipe skipped');
      return { status: 'duplicate', recipeId: check.existingRecipeId };
    }

    const { id, created } = await this.store.createRecipe(recipe, sourceUrl);
    if (!created) {
      // Same content stored earlier; its embedding may be missing if that insert failed half way
      if (!(await this.store.hasRecipeEmbedding(id, this.embeddingType))) {
        await this.storeEmbedding(id, recipe, check.embedding);
        log.warn({ recipeId: id }, 'Stored recipe had no embedding; repaired');
      }
      return { status: 'duplicate', recipeId: id };
    }

    await this.storeEmbedding(id, recipe, check.embedding);
    log.info({ recipeId: id, title: recipe.title }, 'Recipe stored');
    return { status: 'created', recipeId: id };
  }

  /** Clean up and extract free text, then ingest; throws ExtractionError on unusable text */
  async ingestText(rawText: string, sourceUrl?: string): Promise<IngestResult> {
    const recipe = await this.extractor.fromText(rawText);
    return this.ingest(recipe, sourceUrl);
  }

  private async storeEmbedding(
    recipeId: string,
    recipe: Recipe,
    computed: EmbeddingVector | null
  ): Promise<void> {
    const embedding =
      computed ??
      (await this.embeddings.embed(buildTitleIngredientsText(recipe.title, recipe.ingredients)));
    await this.store.createRecipeEmbedding(recipeId, this.embeddingType, embedding);
  }
}
