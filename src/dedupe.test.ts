import { beforeEach, describe, expect, test, vi } from 'vitest';
import { buildDedupePrompt, DedupeGate } from './dedupe';
import { ConfigError } from './errors';
import { InMemoryRecipeStore } from './memory-store';
import { DEDUPLICATION_SYSTEM_PROMPT } from './prompts';
import { FakeEmbeddings, ScriptedJudge } from './test-fakes';
import type { DedupeConfig, Recipe } from './types';

const config: DedupeConfig = {
  strictDistance: 0.05,
  looseDistance: 0.15,
  embeddingType: 'title_ingredients',
};

const existing: Recipe = {
  title: 'Chana Masala',
  ingredients: ['chickpeas', 'onion', 'tomato'],
  instructions: ['Fry the onion', 'Add everything and simmer'],
};

const candidate: Recipe = {
  title: 'Easy Chana Masala',
  ingredients: ['chickpeas', 'red onion', 'tomato'],
  instructions: ['Saute onion', 'Simmer with chickpeas'],
};

describe('DedupeGate', () => {
  let store: InMemoryRecipeStore;
  let embeddings: FakeEmbeddings;
  let judge: ScriptedJudge;
  let gate: DedupeGate;
  let existingId: string;

  beforeEach(async () => {
    store = new InMemoryRecipeStore();
    embeddings = new FakeEmbeddings([0.2, 0.4, 0.4]);
    judge = new ScriptedJudge(() => ({ decision: 'distinct', reason: 'different dish' }));
    gate = new DedupeGate(embeddings, judge, store, config);
    existingId = (await store.createRecipe(existing)).id;
  });

  function nearestAt(distance: number | null) {
    vi.spyOn(store, 'findNearestEmbedding').mockResolvedValue({ recipeId: existingId, distance });
  }

  test('embeds the title and ingredients of the candidate', async () => {
    await gate.findDuplicate(candidate);
    expect(embeddings.calls).toEqual([
      'Title: Easy Chana Masala\nIngredients: chickpeas, red onion, tomato',
    ]);
  });

  test('is distinct when nothing is stored for the embedding type', async () => {
    const result = await gate.findDuplicate(candidate);

    expect(result).toEqual({
      isDuplicate: false,
      existingRecipeId: null,
      embedding: [0.2, 0.4, 0.4],
    });
    expect(judge.calls).toHaveLength(0);
  });

  test('treats a distance under the strict threshold as a duplicate without judgment', async () => {
    nearestAt(0.04);

    const result = await gate.findDuplicate(candidate);

    expect(result.isDuplicate).toBe(true);
    expect(result.existingRecipeId).toBe(existingId);
    expect(judge.calls).toHaveLength(0);
  });

  test('treats a distance equal to the strict threshold as a duplicate', async () => {
    nearestAt(0.05);
    expect((await gate.findDuplicate(candidate)).isDuplicate).toBe(true);
    expect(judge.calls).toHaveLength(0);
  });

  test('treats a distance over the loose threshold as distinct without judgment', async () => {
    nearestAt(0.16);

    const result = await gate.findDuplicate(candidate);

    expect(result.isDuplicate).toBe(false);
    expect(result.existingRecipeId).toBeNull();
    expect(judge.calls).toHaveLength(0);
  });

  test('adjudicates a distance equal to the loose threshold', async () => {
    nearestAt(0.15);
    await gate.findDuplicate(candidate);
    expect(judge.calls).toHaveLength(1);
  });

  test('treats a missing distance as no usable neighbour', async () => {
    nearestAt(null);

    const result = await gate.findDuplicate(candidate);

    expect(result.isDuplicate).toBe(false);
    expect(judge.calls).toHaveLength(0);
  });

  test('returns the duplicate when the judgment says duplicate', async () => {
    nearestAt(0.1);
    judge.reply = () => ({ decision: 'duplicate', reason: 'same dish' });

    const result = await gate.findDuplicate(candidate);

    expect(result.isDuplicate).toBe(true);
    expect(result.existingRecipeId).toBe(existingId);
    expect(judge.calls).toHaveLength(1);
    expect(judge.calls[0].systemPrompt).toBe(DEDUPLICATION_SYSTEM_PROMPT);
    expect(judge.calls[0].schemaName).toBe('dedupe_decision');
    expect(judge.calls[0].userPrompt).toBe(
      buildDedupePrompt(candidate, { ...existing })
    );
  });

  test('returns distinct when the judgment says distinct', async () => {
    nearestAt(0.1);

    const result = await gate.findDuplicate(candidate);

    expect(result.isDuplicate).toBe(false);
    expect(result.existingRecipeId).toBeNull();
  });

  test('fails open when the judgment provider errors', async () => {
    nearestAt(0.1);
    judge.reply = () => {
      throw new Error('upstream timeout');
    };

    const result = await gate.findDuplicate(candidate);

    expect(result).toEqual({
      isDuplicate: false,
      existingRecipeId: null,
      embedding: [0.2, 0.4, 0.4],
    });
  });

  test('fails open when the judgment payload does not match the schema', async () => {
    nearestAt(0.1);
    judge.reply = () => ({ decision: 'maybe', reason: '' });

    expect((await gate.findDuplicate(candidate)).isDuplicate).toBe(false);
  });

  test('is distinct when the nearest recipe can no longer be loaded', async () => {
    vi.spyOn(store, 'findNearestEmbedding').mockResolvedValue({ recipeId: 'gone', distance: 0.1 });

    const result = await gate.findDuplicate(candidate);

    expect(result.isDuplicate).toBe(false);
    expect(judge.calls).toHaveLength(0);
  });

  test('fails open when embedding fails', async () => {
    embeddings.failures = 1;

    const result = await gate.findDuplicate(candidate);

    expect(result).toEqual({ isDuplicate: false, existingRecipeId: null, embedding: null });
  });

  test('fails open when the nearest-neighbour lookup throws', async () => {
    vi.spyOn(store, 'findNearestEmbedding').mockRejectedValue(new Error('connection refused'));

    const result = await gate.findDuplicate(candidate);

    expect(result.isDuplicate).toBe(false);
    expect(result.embedding).toEqual([0.2, 0.4, 0.4]);
  });

  test('rejects a strict threshold above the loose threshold', () => {
    expect(
      () =>
        new DedupeGate(embeddings, judge, store, {
          ...config,
          strictDistance: 0.2,
          looseDistance: 0.1,
        })
    ).toThrow(ConfigError);
  });
});

describe('buildDedupePrompt', () => {
  test('renders both recipes with bullet ingredients and numbered steps', () => {
    const prompt = buildDedupePrompt(
      { title: 'Toast', ingredients: ['bread'], instructions: ['Toast the bread'] },
      { title: 'Buttered Toast', ingredients: ['bread', 'butter'], instructions: ['Toast', 'Butter'] }
    );

    expect(prompt).toBe(
      'Compare the NEW recipe with the EXISTING recipe. ' +
        'Decide if they are essentially the same dish with only minor variations.\n\n' +
        'NEW RECIPE:\nTitle: Toast\nIngredients:\n- bread\n\nInstructions:\n1. Toast the bread\n\n' +
        'EXISTING RECIPE:\nTitle: Buttered Toast\nIngredients:\n- bread\n- butter\n\n' +
        'Instructions:\n1. Toast\n2. Butter'
    );
  });
});
