import { eq, asc } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  codingDataVersions,
  procedureCodes,
  officialAssociations,
  officialIncompatibilities,
  frequencyAssociations,
  type SelectCodingDataVersion,
  type SelectProcedureCode,
  type SelectOfficialAssociation,
  type SelectOfficialIncompatibility,
  type SelectFrequencyAssociation,
} from '@codeplan/shared/schemas/db/coding.schema.js';

// ---------------------------------------------------------------------------
// Coding Data Repository
// Read-only: the ingestion pipeline owns every write to these tables.
// ---------------------------------------------------------------------------

export function createCodingRepository(db: NodePgDatabase) {
  return {
    /**
     * The single published version flagged active, or undefined before the
     * first publication.
     */
    async findActiveVersion(): Promise<SelectCodingDataVersion | undefined> {
      const rows = await db
        .select()
        .from(codingDataVersions)
        .where(eq(codingDataVersions.isActive, true))
        .limit(1);
      return rows[0];
    },

    async listCodes(versionId: string): Promise<SelectProcedureCode[]> {
      return db
        .select()
        .from(procedureCodes)
        .where(eq(procedureCodes.versionId, versionId))
        .orderBy(asc(procedureCodes.code));
    },

    async listOfficialAssociations(
      versionId: string,
    ): Promise<SelectOfficialAssociation[]> {
      return db
        .select()
        .from(officialAssociations)
        .where(eq(officialAssociations.versionId, versionId));
    },

    async listIncompatibilities(
      versionId: string,
    ): Promise<SelectOfficialIncompatibility[]> {
      return db
        .select()
        .from(officialIncompatibilities)
        .where(eq(officialIncompatibilities.versionId, versionId));
    },

    async listFrequencyAssociations(
      versionId: string,
    ): Promise<SelectFrequencyAssociation[]> {
      return db
        .select()
        .from(frequencyAssociations)
        .where(eq(frequencyAssociations.versionId, versionId));
    },
  };
}

export type CodingRepository = ReturnType<typeof createCodingRepository>;
