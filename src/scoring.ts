/**
 * Score helpers shared by the reranker: distance mapping, lexical boosts and
 * query normalization
 */

import lexicon from './data/lexicon.json';

const WRAPPING_QUOTES = new Set(['"', "'"]);

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Finite number from a loosely typed value, else null */
export function toFloat(value: unknown): number | null {
  if (value === null || value === undefined || typeof value === 'boolean') return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

/** Lower cosine distance maps to a higher score in [0, 1]; unusable distance scores 0 */
export function embeddingScoreFromDistance(distance: unknown): number {
  const d = toFloat(distance);
  if (d === null) return 0;
  return 1 - clamp(d, 0, 1);
}

/**
 * Trim and collapse whitespace, then strip one layer of matching wrapping
 * quotes.
 */
export function normalizeSearchQuery(rawQuery: string): string {
  let normalized = rawQuery.trim().split(/\s+/).join(' ');
  if (
    normalized.length >= 2 &&
    normalized[0] === normalized[normalized.length - 1] &&
    WRAPPING_QUOTES.has(normalized[0])
  ) {
    normalized = normalized.slice(1, -1).trim().split(/\s+/).join(' ');
  }
  return normalized;
}

/** Lowercase alphabetic tokens */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[a-z]+/g) ?? []);
}

type KeywordGroups = Record<string, string[]>;

function toGroupSets(groups: KeywordGroups): Map<string, Set<string>> {
  return new Map(Object.entries(groups).map(([name, words]) => [name, new Set(words)]));
}

const CUISINE_GROUPS = toGroupSets(lexicon.cuisines);
const FAMILY_GROUPS = toGroupSets(lexicon.families);

/** True when the query and the title each hit the same keyword group */
function sharesGroup(
  queryTokens: Set<string>,
  titleTokens: Set<string>,
  groups: Map<string, Set<string>>
): boolean {
  for (const words of groups.values()) {
    const inQuery = [...queryTokens].some((t) => words.has(t));
    if (inQuery && [...titleTokens].some((t) => words.has(t))) {
      return true;
    }
  }
  return false;
}

export interface BoostWeights {
  cuisineBoost: number;
  familyBoost: number;
}

export interface LexicalBoost {
  cuisineBoost: number;
  familyBoost: number;
  totalBoost: number;
}

/** Cuisine and dish-family boosts for one candidate title */
export function lexicalBoosts(query: string, title: string, weights: BoostWeights): LexicalBoost {
  const queryTokens = tokenize(query);
  const titleTokens = tokenize(title);

  const cuisineBoost = sharesGroup(queryTokens, titleTokens, CUISINE_GROUPS)
    ? weights.cuisineBoost
    : 0;
  const familyBoost = sharesGroup(queryTokens, titleTokens, FAMILY_GROUPS)
    ? weights.familyBoost
    : 0;

  return { cuisineBoost, familyBoost, totalBoost: cuisineBoost + familyBoost };
}
