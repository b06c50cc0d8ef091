// ============================================================================
// Procedure Coding — Code Catalog
// Immutable, versioned mapping from code identifier to attributes, plus the
// inverted token index the search strategies run against.
// ============================================================================

import { CodeStatus } from '@codeplan/shared/constants/coding.constants.js';
import {
  compareCodeIdentifiers,
  normalizeCodeIdentifier,
  normalizeText,
  tokenize,
} from '@codeplan/shared/utils/text-normalize.utils.js';
import { ValidationError } from '../../../lib/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A catalog row as supplied by the ingestion collaborator. */
export interface CatalogCodeRecord {
  code: string;
  label: string;
  description?: string | null;
  workValue: number | null;
  status: CodeStatus;
  chapter?: string | null;
  chapterTitle?: string | null;
  paragraphTitle?: string | null;
  activity?: string | null;
  codingInstruction?: string | null;
  effectiveTo?: string | null;
}

export interface CatalogCode {
  readonly code: string;
  readonly label: string;
  readonly description: string;
  readonly workValue: number;
  readonly status: CodeStatus;
  readonly chapter: string | null;
  readonly chapterTitle: string | null;
  readonly paragraphTitle: string | null;
  readonly activity: string | null;
  readonly codingInstruction: string | null;
  readonly effectiveTo: string | null;
}

/** Search view of a code. Label tokens count double in term frequency. */
export interface IndexedDocument {
  readonly normalizedLabel: string;
  readonly normalizedDescription: string;
  readonly termFrequencies: ReadonlyMap<string, number>;
  readonly length: number;
}

export interface CodeCatalog {
  readonly version: string;
  readonly codes: ReadonlyMap<string, CatalogCode>;
  /** Every identifier, ascending. */
  readonly identifiers: readonly string[];
  readonly documents: ReadonlyMap<string, IndexedDocument>;
  /** token → identifiers containing it, ascending. */
  readonly postings: ReadonlyMap<string, readonly string[]>;
}

const LABEL_WEIGHT = 2;
const DESCRIPTION_WEIGHT = 1;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function indexDocument(code: CatalogCode): IndexedDocument {
  const termFrequencies = new Map<string, number>();
  let length = 0;

  for (const token of tokenize(code.label)) {
    termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + LABEL_WEIGHT);
    length += LABEL_WEIGHT;
  }
  for (const token of tokenize(code.description)) {
    termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + DESCRIPTION_WEIGHT);
    length += DESCRIPTION_WEIGHT;
  }

  return {
    normalizedLabel: normalizeText(code.label),
    normalizedDescription: normalizeText(code.description),
    termFrequencies,
    length,
  };
}

/**
 * Build an immutable catalog for one data version.
 *
 * Throws ValidationError on a duplicate identifier or a negative work
 * value. A missing work value is read as 0.
 */
export function buildCodeCatalog(
  version: string,
  records: readonly CatalogCodeRecord[],
): CodeCatalog {
  const codes = new Map<string, CatalogCode>();

  for (const record of records) {
    const identifier = normalizeCodeIdentifier(record.code);
    if (identifier === '') {
      throw new ValidationError('Catalog record without a code identifier');
    }
    if (codes.has(identifier)) {
      throw new ValidationError(`Duplicate code identifier ${identifier}`, {
        code: identifier,
      });
    }
    const workValue = record.workValue ?? 0;
    if (!Number.isFinite(workValue) || workValue < 0) {
      throw new ValidationError(`Code ${identifier} has an invalid work value`, {
        code: identifier,
        workValue,
      });
    }

    codes.set(identifier, Object.freeze({
      code: identifier,
      label: record.label,
      description: record.description ?? '',
      workValue,
      status: record.status,
      chapter: record.chapter ?? null,
      chapterTitle: record.chapterTitle ?? null,
      paragraphTitle: record.paragraphTitle ?? null,
      activity: record.activity ?? null,
      codingInstruction: record.codingInstruction ?? null,
      effectiveTo: record.effectiveTo ?? null,
    }));
  }

  const identifiers = [...codes.keys()].sort(compareCodeIdentifiers);
  const documents = new Map<string, IndexedDocument>();
  const postings = new Map<string, string[]>();

  // Identifiers are visited in ascending order, so every posting list
  // comes out sorted.
  for (const identifier of identifiers) {
    const code = codes.get(identifier);
    if (!code) continue;
    const doc = indexDocument(code);
    documents.set(identifier, doc);
    for (const token of doc.termFrequencies.keys()) {
      const list = postings.get(token);
      if (list) {
        list.push(identifier);
      } else {
        postings.set(token, [identifier]);
      }
    }
  }

  return Object.freeze({
    version,
    codes,
    identifiers,
    documents,
    postings,
  });
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

/**
 * Case-insensitive lookup. Retired codes are returned too (historical
 * lookups); callers that build plans check status themselves.
 */
export function getCode(catalog: CodeCatalog, code: string): CatalogCode | undefined {
  return catalog.codes.get(normalizeCodeIdentifier(code));
}

export function isActive(code: CatalogCode): boolean {
  return code.status === CodeStatus.ACTIVE;
}

export function documentFrequency(catalog: CodeCatalog, token: string): number {
  return catalog.postings.get(token)?.length ?? 0;
}

export function countByStatus(catalog: CodeCatalog): Record<CodeStatus, number> {
  const counts: Record<CodeStatus, number> = { active: 0, retired: 0 };
  for (const code of catalog.codes.values()) {
    counts[code.status] += 1;
  }
  return counts;
}
