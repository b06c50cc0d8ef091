// ============================================================================
// Procedure Coding — Search Engine
// Free text → ranked codes. Strategies run in order; the first one that
// returns anything wins.
// ============================================================================

import {
  FUZZY_MIN_SIMILARITY,
  SEARCH_DEFAULT_LIMIT,
  SEARCH_MAX_LIMIT,
  SearchEmptyReason,
  SearchStage,
} from '@codeplan/shared/constants/coding.constants.js';
import {
  compareCodeIdentifiers,
  tokenizeQuery,
  trigramSimilarity,
} from '@codeplan/shared/utils/text-normalize.utils.js';
import {
  documentFrequency,
  isActive,
  type CodeCatalog,
  type IndexedDocument,
} from './catalog.service.js';
import type { CodingMetrics } from './metrics.service.js';
import type { CodingSnapshot } from './snapshot.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SearchHit {
  code: string;
  score: number;
  matchedTokens: string[];
}

export interface SearchStrategy {
  readonly stage: SearchStage;
  /** Every match, fully ranked. The caller truncates. */
  run(catalog: CodeCatalog, tokens: readonly string[], includeRetired: boolean): SearchHit[];
}

export interface SearchOptions {
  limit?: number;
  includeRetired?: boolean;
  metrics?: CodingMetrics;
}

export interface SearchResultItem extends SearchHit {
  associationCount: number;
}

export interface SearchResult {
  dataVersion: string;
  query: string;
  normalizedQuery: string;
  stage: SearchStage | null;
  reason: SearchEmptyReason | null;
  results: SearchResultItem[];
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

function idf(catalog: CodeCatalog, token: string): number {
  const df = documentFrequency(catalog, token);
  return df === 0 ? 0 : Math.log(1 + catalog.identifiers.length / df);
}

/** Σ tf × idf over matched tokens, damped by document length. */
function relevance(
  catalog: CodeCatalog,
  doc: IndexedDocument,
  tokens: readonly string[],
): number {
  if (doc.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const token of tokens) {
    const tf = doc.termFrequencies.get(token) ?? 0;
    if (tf > 0) {
      sum += tf * idf(catalog, token);
    }
  }
  return sum / Math.sqrt(doc.length);
}

function eligible(catalog: CodeCatalog, code: string, includeRetired: boolean): boolean {
  const entry = catalog.codes.get(code);
  return entry !== undefined && (includeRetired || isActive(entry));
}

function byScoreThenCode(a: SearchHit, b: SearchHit): number {
  return b.score - a.score || compareCodeIdentifiers(a.code, b.code);
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

/** Every query token present in the code's label or description. */
export const conjunctiveStrategy: SearchStrategy = {
  stage: SearchStage.CONJUNCTIVE,
  run(catalog, tokens, includeRetired) {
    const rarestFirst = [...tokens].sort(
      (a, b) => documentFrequency(catalog, a) - documentFrequency(catalog, b),
    );
    const [rarest, ...rest] = rarestFirst;
    if (rarest === undefined) {
      return [];
    }

    let candidates = catalog.postings.get(rarest) ?? [];
    for (const token of rest) {
      if (candidates.length === 0) break;
      const posting = new Set(catalog.postings.get(token) ?? []);
      candidates = candidates.filter((code) => posting.has(code));
    }

    const hits: SearchHit[] = [];
    for (const code of candidates) {
      const doc = catalog.documents.get(code);
      if (!doc || !eligible(catalog, code, includeRetired)) continue;
      hits.push({
        code,
        score: relevance(catalog, doc, tokens),
        matchedTokens: [...tokens],
      });
    }
    return hits.sort(byScoreThenCode);
  },
};

/** Any query token present; more matched tokens rank first. */
export const disjunctiveStrategy: SearchStrategy = {
  stage: SearchStage.DISJUNCTIVE,
  run(catalog, tokens, includeRetired) {
    const candidates = new Set<string>();
    for (const token of tokens) {
      for (const code of catalog.postings.get(token) ?? []) {
        candidates.add(code);
      }
    }

    const hits: SearchHit[] = [];
    for (const code of candidates) {
      const doc = catalog.documents.get(code);
      if (!doc || !eligible(catalog, code, includeRetired)) continue;
      hits.push({
        code,
        score: relevance(catalog, doc, tokens),
        matchedTokens: tokens.filter((t) => doc.termFrequencies.has(t)),
      });
    }
    return hits.sort(
      (a, b) => b.matchedTokens.length - a.matchedTokens.length || byScoreThenCode(a, b),
    );
  },
};

/**
 * Query tokens found in order as substrings of the normalized text, with
 * anything in between. Catches truncated words and misspelled endings
 * that whole-token matching misses.
 *
 * When no code contains the tokens, falls back to trigram similarity
 * against the indexed vocabulary so single-letter typos still match.
 */
export const substringStrategy: SearchStrategy = {
  stage: SearchStage.SUBSTRING,
  run(catalog, tokens, includeRetired) {
    if (tokens.length === 0) {
      return [];
    }

    const hits: Array<SearchHit & { position: number }> = [];
    for (const code of catalog.identifiers) {
      const doc = catalog.documents.get(code);
      if (!doc || !eligible(catalog, code, includeRetired)) continue;

      const haystack = `${doc.normalizedLabel} ${doc.normalizedDescription}`;
      const position = matchInOrder(haystack, tokens);
      if (position === -1) continue;
      hits.push({
        code,
        score: 1 / (1 + position),
        matchedTokens: [...tokens],
        position,
      });
    }

    if (hits.length === 0) {
      return fuzzyMatches(catalog, tokens, includeRetired);
    }

    return hits
      .sort((a, b) => a.position - b.position || compareCodeIdentifiers(a.code, b.code))
      .map(({ position: _position, ...hit }) => hit);
  },
};

/**
 * Per query token, the best similarity of any word in the code's text;
 * a code scores the mean over tokens and matches at FUZZY_MIN_SIMILARITY.
 */
export function fuzzyMatches(
  catalog: CodeCatalog,
  tokens: readonly string[],
  includeRetired: boolean,
): SearchHit[] {
  const best = new Map<string, number[]>();
  tokens.forEach((token, index) => {
    for (const [word, codes] of catalog.postings) {
      const similarity = trigramSimilarity(token, word);
      if (similarity === 0) continue;
      for (const code of codes) {
        let scores = best.get(code);
        if (!scores) {
          scores = new Array<number>(tokens.length).fill(0);
          best.set(code, scores);
        }
        if (similarity > (scores[index] ?? 0)) {
          scores[index] = similarity;
        }
      }
    }
  });

  const hits: SearchHit[] = [];
  for (const [code, scores] of best) {
    if (!eligible(catalog, code, includeRetired)) continue;
    const score = scores.reduce((sum, s) => sum + s, 0) / tokens.length;
    if (score < FUZZY_MIN_SIMILARITY) continue;
    hits.push({
      code,
      score,
      matchedTokens: tokens.filter((_, i) => (scores[i] ?? 0) >= FUZZY_MIN_SIMILARITY),
    });
  }
  return hits.sort(byScoreThenCode);
}

/** Index of the first token's match, or -1 when the tokens do not all appear in order. */
export function matchInOrder(haystack: string, tokens: readonly string[]): number {
  let cursor = 0;
  let start = -1;
  for (const token of tokens) {
    const index = haystack.indexOf(token, cursor);
    if (index === -1) {
      return -1;
    }
    if (start === -1) {
      start = index;
    }
    cursor = index + token.length;
  }
  return start;
}

export const DEFAULT_SEARCH_STRATEGIES: readonly SearchStrategy[] = [
  conjunctiveStrategy,
  disjunctiveStrategy,
  substringStrategy,
];

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return SEARCH_DEFAULT_LIMIT;
  }
  return Math.min(Math.max(1, Math.floor(limit)), SEARCH_MAX_LIMIT);
}

export function searchCodes(
  snapshot: CodingSnapshot,
  query: string,
  options: SearchOptions = {},
  strategies: readonly SearchStrategy[] = DEFAULT_SEARCH_STRATEGIES,
): SearchResult {
  const tokens = tokenizeQuery(query);
  const base = {
    dataVersion: snapshot.version,
    query,
    normalizedQuery: tokens.join(' '),
  };

  if (tokens.length === 0) {
    options.metrics?.recordEmptyQuery();
    return { ...base, stage: null, reason: SearchEmptyReason.EMPTY_QUERY, results: [] };
  }

  const limit = clampLimit(options.limit);
  const includeRetired = options.includeRetired ?? false;

  for (const strategy of strategies) {
    const hits = strategy.run(snapshot.catalog, tokens, includeRetired);
    if (hits.length === 0) continue;

    options.metrics?.recordSearch(strategy.stage);
    return {
      ...base,
      stage: strategy.stage,
      reason: null,
      results: hits.slice(0, limit).map((hit) => ({
        ...hit,
        associationCount: snapshot.graph.neighbors(hit.code).length,
      })),
    };
  }

  options.metrics?.recordSearch(null);
  return { ...base, stage: null, reason: SearchEmptyReason.NO_MATCH, results: [] };
}
