// ============================================================================
// Procedure Coding — Drizzle DB Schema
// Written by the ingestion and validation pipelines; read-only for the API.
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  text,
  integer,
  doublePrecision,
  timestamp,
  date,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// --- Coding Data Versions Table ---
// One row per published load of the catalog and its association sources.
// At most one version may be active at a time (enforced by partial unique index).
// Published versions are immutable — corrections require a new version.

export const codingDataVersions = pgTable(
  'coding_data_versions',
  {
    versionId: uuid('version_id').primaryKey().defaultRandom(),
    versionLabel: varchar('version_label', { length: 50 }).notNull(),
    sourceDocument: text('source_document'),
    publishedAt: timestamp('published_at', { withTimezone: true }).notNull(),
    isActive: boolean('is_active').notNull().default(false),
  },
  (table) => [
    uniqueIndex('coding_versions_one_active_idx')
      .on(table.isActive)
      .where(sql`is_active = true`),
  ],
);

// --- Procedure Codes Table ---
// Reference catalog (~8,000 codes per version). Retired codes keep their
// identifier; only status and effective_to change between versions.

export const procedureCodes = pgTable(
  'procedure_codes',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    versionId: uuid('version_id')
      .notNull()
      .references(() => codingDataVersions.versionId),
    code: varchar('code', { length: 10 }).notNull(),
    label: text('label').notNull(),
    description: text('description').notNull().default(''),
    workValue: doublePrecision('work_value'),
    status: varchar('status', { length: 10 }).notNull().default('active'),
    chapter: varchar('chapter', { length: 10 }),
    chapterTitle: text('chapter_title'),
    paragraphTitle: text('paragraph_title'),
    activity: varchar('activity', { length: 10 }),
    codingInstruction: text('coding_instruction'),
    effectiveTo: date('effective_to', { mode: 'string' }),
  },
  (table) => [
    uniqueIndex('procedure_codes_version_id_code_idx').on(
      table.versionId,
      table.code,
    ),
    index('procedure_codes_version_id_idx').on(table.versionId),
  ],
);

// --- Official Associations Table ---
// Complementary gestures and anesthesia codes sanctioned by the official
// nomenclature. Directional as published; the graph treats pairs as unordered.

export const officialAssociations = pgTable(
  'official_associations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    versionId: uuid('version_id')
      .notNull()
      .references(() => codingDataVersions.versionId),
    code: varchar('code', { length: 10 }).notNull(),
    associatedCode: varchar('associated_code', { length: 10 }).notNull(),
    associationType: varchar('association_type', { length: 30 }),
    activity: varchar('activity', { length: 10 }),
  },
  (table) => [
    index('official_associations_version_id_code_idx').on(
      table.versionId,
      table.code,
    ),
  ],
);

// --- Official Incompatibilities Table ---
// Pairs that may never be billed together on one claim.

export const officialIncompatibilities = pgTable(
  'official_incompatibilities',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    versionId: uuid('version_id')
      .notNull()
      .references(() => codingDataVersions.versionId),
    code: varchar('code', { length: 10 }).notNull(),
    incompatibleCode: varchar('incompatible_code', { length: 10 }).notNull(),
  },
  (table) => [
    index('official_incompatibilities_version_id_code_idx').on(
      table.versionId,
      table.code,
    ),
  ],
);

// --- Frequency Associations Table ---
// Co-occurrences observed in billed stays, harvested by the scraping
// pipeline. support_count is the number of corroborating observations.

export const frequencyAssociations = pgTable(
  'frequency_associations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    versionId: uuid('version_id')
      .notNull()
      .references(() => codingDataVersions.versionId),
    code: varchar('code', { length: 10 }).notNull(),
    associatedCode: varchar('associated_code', { length: 10 }).notNull(),
    supportCount: integer('support_count').notNull().default(1),
  },
  (table) => [
    index('frequency_associations_version_id_code_idx').on(
      table.versionId,
      table.code,
    ),
  ],
);

// --- Inferred Types ---

export type InsertCodingDataVersion = typeof codingDataVersions.$inferInsert;
export type SelectCodingDataVersion = typeof codingDataVersions.$inferSelect;
export type InsertProcedureCode = typeof procedureCodes.$inferInsert;
export type SelectProcedureCode = typeof procedureCodes.$inferSelect;
export type InsertOfficialAssociation = typeof officialAssociations.$inferInsert;
export type SelectOfficialAssociation = typeof officialAssociations.$inferSelect;
export type InsertOfficialIncompatibility = typeof officialIncompatibilities.$inferInsert;
export type SelectOfficialIncompatibility = typeof officialIncompatibilities.$inferSelect;
export type InsertFrequencyAssociation = typeof frequencyAssociations.$inferInsert;
export type SelectFrequencyAssociation = typeof frequencyAssociations.$inferSelect;
