/**
 * Judgment-based reranking of nearest-neighbour search candidates
 */

import { z } from 'zod';
import { errorMessage } from './errors';
import type { JudgmentProvider, JudgmentSchema } from './judge';
import { logger } from './logger';
import { SEARCH_RERANK_SYSTEM_PROMPT } from './prompts';
import {
  clamp,
  embeddingScoreFromDistance,
  lexicalBoosts,
  toFloat,
  type BoostWeights,
} from './scoring';
import type {
  RankedCandidate,
  RecipeStore,
  RerankCandidate,
  RerankConfig,
  RerankMode,
  SearchCandidate,
  SearchResult,
} from './types';

const log = logger.child({ module: 'reranker' });

/**
 * Scores are not range-checked here: an out-of-range item is dropped on its
 * own by `rankMatches` instead of failing the whole response.
 */
export const RERANK_RESPONSE_SCHEMA = {
  name: 'recipe_search_rerank',
  schema: z.object({
    ranked: z.array(z.object({ id: z.string(), score: z.number() })),
  }),
} satisfies JudgmentSchema<{ ranked: RankedCandidate[] }>;

/** JSON user prompt sent with SEARCH_RERANK_SYSTEM_PROMPT */
export function buildRerankPrompt(
  query: string,
  candidates: RerankCandidate[],
  maxResults: number
): string {
  return JSON.stringify({
    query,
    max_results: maxResults,
    candidates: candidates.map((c) => ({
      id: c.id,
      title: c.name,
      distance: c.distance,
      ingredients_preview: c.ingredientsPreview,
    })),
  });
}

export interface RankOptions {
  minScore: number;
  weight: number;
  /** Lexical boosts; omitted on the strict pass */
  boosts?: BoostWeights;
  mode?: RerankMode;
}

export interface RankOutcome {
  results: SearchResult[];
  /** Whether any ranked id matched a candidate, whether or not it survived */
  idsFound: boolean;
}

/**
 * Blend judgment scores with embedding scores, drop candidates under
 * `minScore`, and order by combined score (stable on ties).
 */
export function rankMatches(
  query: string,
  matches: SearchCandidate[],
  ranked: RankedCandidate[],
  options: RankOptions
): RankOutcome {
  const matchById = new Map<string, SearchCandidate>();
  for (const match of matches) {
    matchById.set(match.id, match);
  }

  const minScore = clamp(options.minScore, 0, 1);
  const weight = clamp(options.weight, 0, 1);
  const used = new Set<string>();
  const results: SearchResult[] = [];
  let idsFound = false;

  for (const item of ranked) {
    const match = matchById.get(item.id);
    if (!match || used.has(item.id)) continue;
    idsFound = true;

    const rawScore = toFloat(item.score);
    if (rawScore === null || rawScore < 0 || rawScore > 1) continue;

    const boost = options.boosts
      ? lexicalBoosts(query, match.name, options.boosts)
      : { cuisineBoost: 0, familyBoost: 0, totalBoost: 0 };
    const rerankScore = clamp(rawScore + boost.totalBoost, 0, 1);
    if (rerankScore < minScore) continue;
    used.add(item.id);

    const embeddingScore = embeddingScoreFromDistance(match.distance);
    const result: SearchResult = {
      ...match,
      rerankScore,
      embeddingScore,
      combinedScore: weight * rerankScore + (1 - weight) * embeddingScore,
    };
    if (rerankScore !== rawScore) result.rawRerankScore = rawScore;
    if (boost.cuisineBoost) result.cuisineBoost = boost.cuisineBoost;
    if (boost.familyBoost) result.familyBoost = boost.familyBoost;
    if (options.mode) result.rerankMode = options.mode;
    results.push(result);
  }

  results.sort((a, b) => (b.combinedScore ?? 0) - (a.combinedScore ?? 0));
  return { results, idsFound };
}

/** Distance order, truncated, without scores */
function baseline(candidates: SearchCandidate[], limit: number): SearchResult[] {
  return candidates.slice(0, Math.max(limit, 0)).map(({ id, name, distance }) => ({
    id,
    name,
    distance,
  }));
}

export class Reranker {
  private judge: JudgmentProvider;
  private store: RecipeStore;
  private config: RerankConfig;

  constructor(judge: JudgmentProvider, store: RecipeStore, config: RerankConfig) {
    this.judge = judge;
    this.store = store;
    this.config = config;
  }

  /** Attach ingredient previews; a lookup failure leaves every preview empty */
  async buildCandidates(matches: SearchCandidate[]): Promise<RerankCandidate[]> {
    let previews = new Map<string, string[]>();
    if (matches.length > 0) {
      try {
        previews = await this.store.getIngredientPreviews(
          matches.map((m) => m.id),
          this.config.ingredientPreviewLength
        );
      } catch (err) {
        log.warn({ err: errorMessage(err) }, 'Failed to load ingredient previews for rerank candidates');
      }
    }

    return matches.map((m) => ({
      ...m,
      ingredientsPreview: [...(previews.get(m.id) ?? [])],
    }));
  }

  /**
   * Judgment ranking, best first; null when the provider failed. Not cut to
   * `maxResults`: unknown ids may take slots, so truncation is left to the caller.
   */
  async rank(
    query: string,
    candidates: RerankCandidate[],
    maxResults: number
  ): Promise<RankedCandidate[] | null> {
    const result = await this.judge.judge(
      SEARCH_RERANK_SYSTEM_PROMPT,
      buildRerankPrompt(query, candidates, maxResults),
      RERANK_RESPONSE_SCHEMA
    );
    if (!result.ok) {
      log.warn({ err: result.error }, 'Rerank failed; falling back to embedding order');
      return null;
    }
    return result.value.ranked;
  }

  /**
   * Rerank distance-ordered candidates.
   *
   * Strict pass first. If the provider named no known id, the distance order
   * is returned unscored. If it did but nothing cleared `minScore`, a
   * fallback pass with `fallbackMinScore` and lexical boosts runs when that
   * threshold is strictly lower; otherwise the result is empty.
   */
  async rerankAndFilter(
    query: string,
    candidates: SearchCandidate[],
    limit: number
  ): Promise<SearchResult[]> {
    const normalizedQuery = query.trim();
    if (!normalizedQuery || candidates.length === 0 || limit <= 0) {
      return baseline(candidates, limit);
    }

    const enriched = await this.buildCandidates(candidates);
    const ranked = await this.rank(normalizedQuery, enriched, limit);
    if (!ranked || ranked.length === 0) {
      return baseline(candidates, limit);
    }

    const { minScore, fallbackMinScore, weight } = this.config;
    const strict = rankMatches(normalizedQuery, candidates, ranked, { minScore, weight });

    if (!strict.idsFound) {
      log.warn({ returned: ranked.length }, 'Rerank returned no known ids; using embedding order');
      return baseline(candidates, limit);
    }
    if (strict.results.length > 0) {
      return strict.results.slice(0, limit);
    }

    if (fallbackMinScore === null || !(fallbackMinScore < minScore)) {
      return [];
    }

    const fallback = rankMatches(normalizedQuery, candidates, ranked, {
      minScore: fallbackMinScore,
      weight,
      boosts: {
        cuisineBoost: this.config.cuisineBoost,
        familyBoost: this.config.familyBoost,
      },
      mode: 'fallback',
    });
    log.info(
      { query: normalizedQuery, survivors: fallback.results.length },
      'Strict rerank pass empty; fallback pass applied'
    );
    return fallback.results.slice(0, limit);
  }
}
