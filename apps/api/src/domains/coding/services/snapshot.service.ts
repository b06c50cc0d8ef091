// ============================================================================
// Procedure Coding — Snapshots
// A snapshot pairs a catalog and a graph built from the same data version.
// Readers take one reference per query; reload swaps the reference.
// ============================================================================

import {
  ASSOCIATION_TYPES,
  CODE_STATUSES,
  type AssociationType,
  type CodeStatus,
} from '@codeplan/shared/constants/coding.constants.js';
import type {
  SelectOfficialAssociation,
  SelectProcedureCode,
} from '@codeplan/shared/schemas/db/coding.schema.js';
import {
  DataVersionMismatchError,
  NotFoundError,
  SnapshotUnavailableError,
  ValidationError,
} from '../../../lib/errors.js';
import type { CodingRepository } from '../repos/coding-data.repo.js';
import {
  buildCodeCatalog,
  getCode,
  type CatalogCodeRecord,
  type CodeCatalog,
} from './catalog.service.js';
import {
  buildCompatibilityGraph,
  type CompatibilityGraph,
  type MergeStats,
  type OfficialAssociationRecord,
} from './compatibility-graph.service.js';
import type { CodingMetrics } from './metrics.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CodingSnapshot {
  readonly version: string;
  readonly versionLabel: string;
  readonly catalog: CodeCatalog;
  readonly graph: CompatibilityGraph;
  readonly mergeStats: MergeStats;
  readonly loadedAt: Date;
}

/** Subset of pino's Logger the services write to. */
export interface ServiceLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
}

export interface SnapshotDeps {
  repo: Pick<
    CodingRepository,
    | 'findActiveVersion'
    | 'listCodes'
    | 'listOfficialAssociations'
    | 'listIncompatibilities'
    | 'listFrequencyAssociations'
  >;
  store: SnapshotStore;
  metrics?: CodingMetrics;
  logger?: ServiceLogger;
  now?: () => Date;
}

export interface ReloadSummary {
  previousVersion: string | null;
  version: string;
  versionLabel: string;
  codeCount: number;
  stats: MergeStats;
  loadedAt: string;
}

// ---------------------------------------------------------------------------
// Snapshot construction
// ---------------------------------------------------------------------------

export function createSnapshot(
  catalog: CodeCatalog,
  graph: CompatibilityGraph,
  options: { versionLabel?: string; loadedAt?: Date } = {},
): CodingSnapshot {
  if (catalog.version !== graph.version) {
    throw new DataVersionMismatchError(catalog.version, graph.version);
  }
  return Object.freeze({
    version: catalog.version,
    versionLabel: options.versionLabel ?? catalog.version,
    catalog,
    graph,
    mergeStats: graph.stats(),
    loadedAt: options.loadedAt ?? new Date(),
  });
}

/**
 * Throws when the caller pinned a data version other than the one the
 * snapshot was built from.
 */
export function assertVersion(snapshot: CodingSnapshot, expected?: string): void {
  if (expected !== undefined && expected !== snapshot.version) {
    throw new DataVersionMismatchError(expected, snapshot.version);
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class SnapshotStore {
  private snapshot: CodingSnapshot | null;

  constructor(initial: CodingSnapshot | null = null) {
    this.snapshot = initial;
  }

  current(): CodingSnapshot {
    if (!this.snapshot) {
      throw new SnapshotUnavailableError();
    }
    return this.snapshot;
  }

  /** Replace the live snapshot and hand back the one it replaced. */
  swap(next: CodingSnapshot): CodingSnapshot | null {
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }

  version(): string | null {
    return this.snapshot?.version ?? null;
  }
}

// ---------------------------------------------------------------------------
// Row narrowing
// ---------------------------------------------------------------------------

function isCodeStatus(value: string): value is CodeStatus {
  return CODE_STATUSES.some((status) => status === value);
}

function isAssociationType(value: string): value is AssociationType {
  return ASSOCIATION_TYPES.some((type) => type === value);
}

function toCatalogRecord(row: SelectProcedureCode): CatalogCodeRecord {
  if (!isCodeStatus(row.status)) {
    throw new ValidationError(`Code ${row.code} has an unknown status`, {
      code: row.code,
      status: row.status,
    });
  }
  return {
    code: row.code,
    label: row.label,
    description: row.description,
    workValue: row.workValue,
    status: row.status,
    chapter: row.chapter,
    chapterTitle: row.chapterTitle,
    paragraphTitle: row.paragraphTitle,
    activity: row.activity,
    codingInstruction: row.codingInstruction,
    effectiveTo: row.effectiveTo,
  };
}

function toOfficialRecord(row: SelectOfficialAssociation): OfficialAssociationRecord {
  const type = row.associationType;
  return {
    code: row.code,
    associatedCode: row.associatedCode,
    associationType: type !== null && isAssociationType(type) ? type : null,
  };
}

// ---------------------------------------------------------------------------
// Load / reload
// ---------------------------------------------------------------------------

/**
 * Read the active data version and build a complete snapshot from it.
 * Nothing is swapped.
 */
export async function loadSnapshot(
  deps: Pick<SnapshotDeps, 'repo' | 'now'>,
): Promise<CodingSnapshot> {
  const active = await deps.repo.findActiveVersion();
  if (!active) {
    throw new NotFoundError('Active coding data version');
  }

  const versionId = active.versionId;
  const [codes, official, incompatible, frequency] = await Promise.all([
    deps.repo.listCodes(versionId),
    deps.repo.listOfficialAssociations(versionId),
    deps.repo.listIncompatibilities(versionId),
    deps.repo.listFrequencyAssociations(versionId),
  ]);

  const catalog = buildCodeCatalog(versionId, codes.map(toCatalogRecord));
  const graph = buildCompatibilityGraph(
    versionId,
    {
      official: official.map(toOfficialRecord),
      incompatible: incompatible.map((row) => ({
        code: row.code,
        incompatibleCode: row.incompatibleCode,
      })),
      frequency: frequency.map((row) => ({
        code: row.code,
        associatedCode: row.associatedCode,
        supportCount: row.supportCount,
      })),
    },
    (code) => getCode(catalog, code)?.chapter,
  );

  return createSnapshot(catalog, graph, {
    versionLabel: active.versionLabel,
    loadedAt: deps.now ? deps.now() : new Date(),
  });
}

/**
 * Build the snapshot for the active version, then swap it in. In-flight
 * queries keep the snapshot they already hold.
 */
export async function reloadSnapshot(deps: SnapshotDeps): Promise<ReloadSummary> {
  const next = await loadSnapshot(deps);
  const previous = deps.store.swap(next);
  deps.metrics?.recordSnapshotReload();

  const summary: ReloadSummary = {
    previousVersion: previous?.version ?? null,
    version: next.version,
    versionLabel: next.versionLabel,
    codeCount: next.catalog.identifiers.length,
    stats: next.mergeStats,
    loadedAt: next.loadedAt.toISOString(),
  };

  deps.logger?.info(
    {
      previousVersion: summary.previousVersion,
      version: summary.version,
      stats: summary.stats,
    },
    'Coding snapshot loaded',
  );
  if (next.mergeStats.selfReferences > 0) {
    deps.logger?.warn(
      { version: next.version, selfReferences: next.mergeStats.selfReferences },
      'Self-referencing association records dropped',
    );
  }

  return summary;
}
