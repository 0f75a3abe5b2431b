import { describe, expect, test } from 'vitest';
import {
  clamp,
  embeddingScoreFromDistance,
  lexicalBoosts,
  normalizeSearchQuery,
  toFloat,
  tokenize,
} from './scoring';

const weights = { cuisineBoost: 0.15, familyBoost: 0.1 };

describe('normalizeSearchQuery', () => {
  test('trims and collapses whitespace', () => {
    expect(normalizeSearchQuery('  chicken \t  tikka\n masala ')).toBe('chicken tikka masala');
  });

  test('strips one layer of matching double quotes', () => {
    expect(normalizeSearchQuery('"  chicken   tikka "')).toBe('chicken tikka');
  });

  test('strips one layer of matching single quotes', () => {
    expect(normalizeSearchQuery("'pad thai'")).toBe('pad thai');
  });

  test('strips only one layer', () => {
    expect(normalizeSearchQuery(`"'pad thai'"`)).toBe("'pad thai'");
  });

  test('leaves mismatched quotes alone', () => {
    expect(normalizeSearchQuery(`"pad thai'`)).toBe(`"pad thai'`);
  });

  test('leaves a lone quote character alone', () => {
    expect(normalizeSearchQuery('"')).toBe('"');
  });

  test('is idempotent on a normalized query', () => {
    const normalized = normalizeSearchQuery('  vegan   lentil soup ');
    expect(normalizeSearchQuery(normalized)).toBe(normalized);
  });

  test('recovers a normalized query wrapped once in quotes', () => {
    const normalized = 'vegan lentil soup';
    expect(normalizeSearchQuery(`"${normalized}"`)).toBe(normalized);
    expect(normalizeSearchQuery(`'${normalized}'`)).toBe(normalized);
  });
});

describe('embeddingScoreFromDistance', () => {
  test('maps lower distance to higher score', () => {
    expect(embeddingScoreFromDistance(0.09)).toBeCloseTo(0.91, 10);
    expect(embeddingScoreFromDistance(0)).toBe(1);
    expect(embeddingScoreFromDistance(1)).toBe(0);
  });

  test('clamps distances outside [0, 1]', () => {
    expect(embeddingScoreFromDistance(-0.5)).toBe(1);
    expect(embeddingScoreFromDistance(1.7)).toBe(0);
  });

  test('parses numeric strings', () => {
    expect(embeddingScoreFromDistance('0.25')).toBe(0.75);
  });

  test('scores missing or unparseable distances as 0', () => {
    expect(embeddingScoreFromDistance(null)).toBe(0);
    expect(embeddingScoreFromDistance(undefined)).toBe(0);
    expect(embeddingScoreFromDistance('far')).toBe(0);
    expect(embeddingScoreFromDistance(Number.NaN)).toBe(0);
  });
});

describe('toFloat and clamp', () => {
  test('toFloat rejects non-numeric values', () => {
    expect(toFloat('')).toBeNull();
    expect(toFloat(true)).toBeNull();
    expect(toFloat(Infinity)).toBeNull();
    expect(toFloat('0.5')).toBe(0.5);
  });

  test('clamp bounds a value', () => {
    expect(clamp(1.2, 0, 1)).toBe(1);
    expect(clamp(-0.2, 0, 1)).toBe(0);
    expect(clamp(0.3, 0, 1)).toBe(0.3);
  });
});

describe('tokenize', () => {
  test('keeps lowercase alphabetic runs', () => {
    expect([...tokenize("Mom's 30-Minute Chana-Masala!")]).toEqual([
      'mom',
      's',
      'minute',
      'chana',
      'masala',
    ]);
  });
});

describe('lexicalBoosts', () => {
  test('adds the family boost when query and title share a dish family', () => {
    expect(lexicalBoosts('curry', 'Chana Masala', weights)).toEqual({
      cuisineBoost: 0,
      familyBoost: 0.1,
      totalBoost: 0.1,
    });
  });

  test('adds the cuisine boost when query and title share a cuisine', () => {
    expect(lexicalBoosts('thai dinner', 'Pad See Ew', weights)).toEqual({
      cuisineBoost: 0.15,
      familyBoost: 0,
      totalBoost: 0.15,
    });
  });

  test('adds both boosts when both groups match', () => {
    const boost = lexicalBoosts('indian curry', 'Paneer Tikka Masala', weights);
    expect(boost.cuisineBoost).toBe(0.15);
    expect(boost.familyBoost).toBe(0.1);
    expect(boost.totalBoost).toBeCloseTo(0.25, 10);
  });

  test('adds nothing for unrelated titles', () => {
    expect(lexicalBoosts('curry', 'Blueberry Muffins', weights)).toEqual({
      cuisineBoost: 0,
      familyBoost: 0,
      totalBoost: 0,
    });
  });

  test('requires the query itself to hit the group', () => {
    expect(lexicalBoosts('quick dinner', 'Thai Green Curry', weights).totalBoost).toBe(0);
  });
});
