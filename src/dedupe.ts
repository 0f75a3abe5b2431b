/**
 * Three-zone duplicate gate over embedding distance
 */

import { z } from 'zod';
import { buildTitleIngredientsText } from './embeddings';
import { ConfigError, errorMessage } from './errors';
import type { JudgmentProvider, JudgmentSchema } from './judge';
import { logger } from './logger';
import { DEDUPLICATION_SYSTEM_PROMPT } from './prompts';
import type {
  DedupeConfig,
  DuplicateCheck,
  EmbeddingProvider,
  EmbeddingVector,
  Recipe,
  RecipeStore,
} from './types';

const log = logger.child({ module: 'dedupe' });

export const DEDUPE_DECISION_SCHEMA = {
  name: 'dedupe_decision',
  schema: z.object({
    decision: z.enum(['duplicate', 'distinct']),
    reason: z.string(),
  }),
} satisfies JudgmentSchema<{ decision: 'duplicate' | 'distinct'; reason: string }>;

function formatRecipe(recipe: Recipe): string {
  const ingredients = recipe.ingredients.map((item) => `- ${item}`).join('\n');
  const instructions = recipe.instructions.map((step, idx) => `${idx + 1}. ${step}`).join('\n');
  return `Title: ${recipe.title}\nIngredients:\n${ingredients}\n\nInstructions:\n${instructions}`;
}

/** Comparison prompt for the ambiguous band */
export function buildDedupePrompt(candidate: Recipe, existing: Recipe): string {
  return (
    'Compare the NEW recipe with the EXISTING recipe. ' +
    'Decide if they are essentially the same dish with only minor variations.\n\n' +
    `NEW RECIPE:\n${formatRecipe(candidate)}\n\n` +
    `EXISTING RECIPE:\n${formatRecipe(existing)}`
  );
}

/**
 * Decides whether a newly extracted recipe duplicates a stored one.
 *
 * - distance <= strict: duplicate, no judgment call
 * - distance > loose: distinct, no judgment call
 * - otherwise the judgment provider adjudicates
 *
 * Every failure on the way (embedding, store, judgment) resolves to
 * "distinct": an insert is never blocked by an upstream error.
 */
export class DedupeGate {
  private embeddings: EmbeddingProvider;
  private judge: JudgmentProvider;
  private store: RecipeStore;
  private config: DedupeConfig;

  constructor(
    embeddings: EmbeddingProvider,
    judge: JudgmentProvider,
    store: RecipeStore,
    config: DedupeConfig
  ) {
    if (config.strictDistance > config.looseDistance) {
      throw new ConfigError('Invalid dedupe thresholds', [
        `strict distance ${config.strictDistance} exceeds loose distance ${config.looseDistance}`,
      ]);
    }
    this.embeddings = embeddings;
    this.judge = judge;
    this.store = store;
    this.config = config;
  }

  async findDuplicate(recipe: Recipe): Promise<DuplicateCheck> {
    let embedding: EmbeddingVector;
    try {
      embedding = await this.embeddings.embed(
        buildTitleIngredientsText(recipe.title, recipe.ingredients)
      );
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Dedupe embedding failed; allowing insert');
      return { isDuplicate: false, existingRecipeId: null, embedding: null };
    }

    const distinct: DuplicateCheck = { isDuplicate: false, existingRecipeId: null, embedding };

    try {
      const nearest = await this.store.findNearestEmbedding(embedding, this.config.embeddingType);
      if (!nearest || nearest.distance === null || !Number.isFinite(nearest.distance)) {
        return distinct;
      }

      const { recipeId, distance } = nearest;
      if (distance <= this.config.strictDistance) {
        log.info({ recipeId, distance }, 'Automatic duplicate');
        return { isDuplicate: true, existingRecipeId: recipeId, embedding };
      }
      if (distance > this.config.looseDistance) {
        return distinct;
      }

      const existing = await this.store.getFullRecipe(recipeId);
      if (!existing) {
        return distinct;
      }

      const result = await this.judge.judge(
        DEDUPLICATION_SYSTEM_PROMPT,
        buildDedupePrompt(recipe, existing),
        DEDUPE_DECISION_SCHEMA
      );
      if (!result.ok) {
        log.warn({ recipeId, distance, err: result.error }, 'Dedupe judgment failed; allowing insert');
        return distinct;
      }

      log.info(
        { recipeId, distance, decision: result.value.decision, reason: result.value.reason },
        'Dedupe adjudicated'
      );
      return result.value.decision === 'duplicate'
        ? { isDuplicate: true, existingRecipeId: recipeId, embedding }
        : distinct;
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Dedupe lookup failed; allowing insert');
      return distinct;
    }
  }
}
