// ============================================================================
// Procedure Coding — Text Normalization Utilities
// Shared by catalog indexing and query parsing; both sides must agree.
// ============================================================================

import { MIN_QUERY_TOKEN_LENGTH } from '../constants/coding.constants.js';

const COMBINING_MARKS = /\p{M}+/gu;
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]+/gu;

// Letters NFKD leaves whole.
const LIGATURES: Record<string, string> = { œ: 'oe', æ: 'ae', ß: 'ss' };
const LIGATURE = /[œæß]/gu;

/**
 * Lowercases, strips diacritics, spells out ligatures and collapses every
 * run of punctuation or whitespace into a single space.
 *
 * Idempotent: `normalizeText(normalizeText(x)) === normalizeText(x)`.
 *
 * Example: "Appendicectomie, par cœlioscopie" → "appendicectomie par coelioscopie"
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  return text
    .toLowerCase()
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    // Compatibility forms (e.g. ℌ) decompose to upper case.
    .toLowerCase()
    .replace(LIGATURE, (ch) => LIGATURES[ch] ?? ch)
    .replace(NON_ALPHANUMERIC, ' ')
    .trim();
}

/**
 * Splits text into normalized tokens.
 */
export function tokenize(text: string | null | undefined): string[] {
  const normalized = normalizeText(text);
  return normalized === '' ? [] : normalized.split(' ');
}

/**
 * Tokenizes a search query.
 *
 * Multi-token queries lose their short tokens (articles, prepositions)
 * unless that would leave nothing to search for. Duplicates are removed,
 * keeping first-occurrence order.
 */
export function tokenizeQuery(query: string | null | undefined): string[] {
  const tokens = [...new Set(tokenize(query))];
  if (tokens.length <= 1) {
    return tokens;
  }

  const significant = tokens.filter((t) => t.length >= MIN_QUERY_TOKEN_LENGTH);
  return significant.length > 0 ? significant : tokens;
}

/**
 * Canonical form of a code identifier: trimmed, upper-case.
 */
export function normalizeCodeIdentifier(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Code-unit order on identifiers. Every "ascending identifier" tie-break
 * uses this, as does the catalog's identifier list.
 */
export function compareCodeIdentifiers(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// ---------------------------------------------------------------------------
// Trigram similarity (pg_trgm semantics: words padded with two leading
// blanks and one trailing blank)
// ---------------------------------------------------------------------------

export function trigrams(word: string): Set<string> {
  const padded = `  ${word} `;
  const result = new Set<string>();
  for (let i = 0; i + 3 <= padded.length; i++) {
    result.add(padded.slice(i, i + 3));
  }
  return result;
}

/**
 * Shared trigrams over distinct trigrams of both words, in [0, 1].
 */
export function trigramSimilarity(a: string, b: string): number {
  if (a === '' || b === '') {
    return 0;
  }
  if (a === b) {
    return 1;
  }
  const left = trigrams(a);
  const right = trigrams(b);
  let shared = 0;
  for (const gram of left) {
    if (right.has(gram)) shared += 1;
  }
  return shared / (left.size + right.size - shared);
}
