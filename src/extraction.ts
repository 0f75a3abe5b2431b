/**
 * Free text → structured recipe: judgment-backed cleanup, then extraction
 */

import { z } from 'zod';
import { ExtractionError } from './errors';
import type { JudgmentProvider, JudgmentSchema } from './judge';
import { logger } from './logger';
import { CLEANUP_SYSTEM_PROMPT, EXTRACTION_SYSTEM_PROMPT } from './prompts';
import type { Recipe } from './types';

const log = logger.child({ module: 'extraction' });

export const CLEANUP_SCHEMA = {
  name: 'recipe_cleanup',
  schema: z.object({ text: z.string() }),
} satisfies JudgmentSchema<{ text: string }>;

export const EXTRACTION_SCHEMA = {
  name: 'recipe_extraction',
  schema: z.object({
    title: z.string(),
    ingredients: z.array(z.string()),
    instructions: z.array(z.string()),
  }),
} satisfies JudgmentSchema<Recipe>;

export interface ExtractorOptions {
  /** Shortest cleaned text accepted as a recipe */
  minCleanedLength: number;
}

export function buildCleanupPrompt(rawText: string): string {
  return `Please clean up this messy recipe data:\n\n${rawText}`;
}

const tidy = (items: string[]) => items.map((item) => item.trim()).filter(Boolean);

export class RecipeExtractor {
  private judge: JudgmentProvider;
  private options: ExtractorOptions;

  constructor(judge: JudgmentProvider, options: ExtractorOptions) {
    this.judge = judge;
    this.options = options;
  }

  /** Strip markup and noise; throws ExtractionError when too little recipe text is left */
  async cleanup(rawText: string): Promise<string> {
    if (!rawText.trim()) {
      throw new ExtractionError('Recipe text is empty');
    }

    const result = await this.judge.judge(
      CLEANUP_SYSTEM_PROMPT,
      buildCleanupPrompt(rawText),
      CLEANUP_SCHEMA
    );
    if (!result.ok) {
      throw new ExtractionError(`Input cleanup failed: ${result.error}`);
    }

    const cleaned = result.value.text.trim();
    if (cleaned.length < this.options.minCleanedLength) {
      throw new ExtractionError(
        `Cleaned text has ${cleaned.length} characters; at least ${this.options.minCleanedLength} required`
      );
    }

    log.debug({ rawLength: rawText.length, cleanedLength: cleaned.length }, 'Input cleaned');
    return cleaned;
  }

  /** Structured recipe from cleaned text; a title and an ingredient are required */
  async extract(cleanedText: string): Promise<Recipe> {
    const result = await this.judge.judge(EXTRACTION_SYSTEM_PROMPT, cleanedText, EXTRACTION_SCHEMA);
    if (!result.ok) {
      throw new ExtractionError(`Recipe extraction failed: ${result.error}`);
    }

    const recipe: Recipe = {
      title: result.value.title.trim(),
      ingredients: tidy(result.value.ingredients),
      instructions: tidy(result.value.instructions),
    };
    if (!recipe.title) {
      throw new ExtractionError('Extracted recipe has no title');
    }
    if (recipe.ingredients.length === 0) {
      throw new ExtractionError('Extracted recipe has no ingredients');
    }

    log.info({ title: recipe.title }, 'Recipe extracted');
    return recipe;
  }

  async fromText(rawText: string): Promise<Recipe> {
    return this.extract(await this.cleanup(rawText));
  }
}
