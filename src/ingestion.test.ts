import { beforeEach, describe, expect, test, vi } from 'vitest';
import { DedupeGate } from './dedupe';
import { buildTitleIngredientsText } from './embeddings';
import { ExtractionError } from './errors';
import { RecipeExtractor } from './extraction';
import { RecipeIngestion } from './ingestion';
import { InMemoryRecipeStore } from './memory-store';
import { FakeEmbeddings, ScriptedJudge } from './test-fakes';
import { DEFAULT_DEDUPE_CONFIG, type Recipe } from './types';

const chana: Recipe = {
  title: 'Chana Masala',
  ingredients: ['chickpeas', 'onion', 'tomato'],
  instructions: ['Fry the onion', 'Simmer everything'],
};

const dal: Recipe = {
  title: 'Dal Tadka',
  ingredients: ['lentils', 'onion', 'tomato'],
  instructions: ['Boil the lentils', 'Temper with spices'],
};

const CLEANED =
  'Chana Masala\n\nIngredients:\n- chickpeas\n- onion\n- tomato\n\n' +
  'Instructions:\n1. Fry the onion\n2. Simmer everything';

const textOf = (recipe: Recipe) => buildTitleIngredientsText(recipe.title, recipe.ingredients);

describe('RecipeIngestion', () => {
  let store: InMemoryRecipeStore;
  let embeddings: FakeEmbeddings;
  let judge: ScriptedJudge;
  let extracted: unknown;
  let ingestion: RecipeIngestion;

  beforeEach(() => {
    store = new InMemoryRecipeStore();
    embeddings = new FakeEmbeddings([1, 0, 0]);
    extracted = chana;
    judge = new ScriptedJudge((call) => {
      switch (call.schemaName) {
        case 'recipe_cleanup':
          return { text: CLEANED };
        case 'recipe_extraction':
          return extracted;
        default:
          return { decision: 'distinct', reason: 'different dish' };
      }
    });
    const gate = new DedupeGate(embeddings, judge, store, DEFAULT_DEDUPE_CONFIG);
    const extractor = new RecipeExtractor(judge, { minCleanedLength: 50 });
    ingestion = new RecipeIngestion(gate, extractor, embeddings, store, 'title_ingredients');
  });

  test('stores a new recipe with its embedding', async () => {
    const result = await ingestion.ingest(chana, 'https://example.com/chana');

    expect(result).toEqual({ status: 'created', recipeId: 'recipe-1' });
    expect((await store.getFullRecipe('recipe-1'))?.sourceUrl).toBe('https://example.com/chana');
    expect(await store.findNearestEmbedding([1, 0, 0], 'title_ingredients')).toEqual({
      recipeId: 'recipe-1',
      distance: 0,
    });
    expect(embeddings.calls).toEqual([textOf(chana)]);
  });

  test('skips a near-identical recipe', async () => {
    await ingestion.ingest(chana);

    const result = await ingestion.ingest({ ...chana, title: 'Easy Chana Masala' });

    expect(result).toEqual({ status: 'duplicate', recipeId: 'recipe-1' });
    expect(store.recipeCount).toBe(1);
  });

  test('stores a recipe the judgment calls distinct', async () => {
    embeddings.define(textOf(dal), [0.9, Math.sqrt(0.19), 0]);
    await ingestion.ingest(chana);

    const result = await ingestion.ingest(dal);

    expect(result).toEqual({ status: 'created', recipeId: 'recipe-2' });
    expect(judge.calls).toHaveLength(1);
    expect(store.recipeCount).toBe(2);
  });

  test('reconciles with the stored copy when the gate fails open', async () => {
    await ingestion.ingest(chana);
    const writeEmbedding = vi.spyOn(store, 'createRecipeEmbedding');
    embeddings.failures = 1;

    const result = await ingestion.ingest({ ...chana, instructions: ['Cook it all'] });

    expect(result).toEqual({ status: 'duplicate', recipeId: 'recipe-1' });
    expect(store.recipeCount).toBe(1);
    expect(embeddings.calls).toHaveLength(2);
    expect(writeEmbedding).not.toHaveBeenCalled();
  });

  test('writes the missing embedding when the same content is ingested again', async () => {
    vi.spyOn(store, 'createRecipeEmbedding').mockRejectedValueOnce(new Error('write timeout'));

    await expect(ingestion.ingest(chana)).rejects.toThrow('write timeout');
    expect(store.recipeCount).toBe(1);
    expect(await store.hasRecipeEmbedding('recipe-1', 'title_ingredients')).toBe(false);

    const result = await ingestion.ingest(chana);

    expect(result).toEqual({ status: 'duplicate', recipeId: 'recipe-1' });
    expect(await store.hasRecipeEmbedding('recipe-1', 'title_ingredients')).toBe(true);
    expect(await store.findNearestEmbedding([1, 0, 0], 'title_ingredients')).toEqual({
      recipeId: 'recipe-1',
      distance: 0,
    });
  });

  test('ingests free text through cleanup and extraction', async () => {
    const result = await ingestion.ingestText('<h1>Chana Masala</h1> ...', 'https://example.com/c');

    expect(result).toEqual({ status: 'created', recipeId: 'recipe-1' });
    expect(judge.calls.map((c) => c.schemaName)).toEqual(['recipe_cleanup', 'recipe_extraction']);
    expect(await store.getFullRecipe('recipe-1')).toMatchObject({
      title: 'Chana Masala',
      ingredients: ['chickpeas', 'onion', 'tomato'],
      sourceUrl: 'https://example.com/c',
    });
    expect(embeddings.calls).toEqual([textOf(chana)]);
  });

  test('stores nothing when free text yields no recipe', async () => {
    extracted = { title: 'Chana Masala', ingredients: [], instructions: [] };

    await expect(ingestion.ingestText('<p>nothing useful</p>')).rejects.toThrow(ExtractionError);
    expect(store.recipeCount).toBe(0);
    expect(embeddings.calls).toEqual([]);
  });

  test('embeds again after the gate could not', async () => {
    embeddings.failures = 1;

    const result = await ingestion.ingest(chana);

    expect(result).toEqual({ status: 'created', recipeId: 'recipe-1' });
    expect(embeddings.calls).toEqual([textOf(chana), textOf(chana)]);
    expect(await store.findNearestEmbedding([1, 0, 0], 'title_ingredients')).toEqual({
      recipeId: 'recipe-1',
      distance: 0,
    });
  });
});
