import { Logger } from "../../config/logger";
import { isRecord } from "../../profiles/entity.schemas";
import { OrganizationRecord, RankingWeights } from "../../shared/types/entity.types";
import { SupabaseRestClient } from "../supabase.client";

const ORGANIZATIONS_TABLE = "organizations";

interface OrganizationRow {
  external_id: string;
  name: string;
  scoring_weights: unknown;
  created_at: string;
  updated_at: string;
}

export class OrganizationsRepository {
  constructor(
    private readonly supabaseClient: SupabaseRestClient,
    private readonly logger: Logger,
  ) {}

  async getByExternalId(externalId: string): Promise<OrganizationRecord | null> {
    const row = await this.supabaseClient.selectOne<OrganizationRow>(ORGANIZATIONS_TABLE, {
      external_id: externalId,
    });
    return row ? fromRow(row) : null;
  }

  async upsert(record: OrganizationRecord): Promise<OrganizationRecord> {
    // created_at is left to the column default so an existing row keeps it.
    await this.supabaseClient.upsert(
      ORGANIZATIONS_TABLE,
      {
        external_id: record.externalId,
        name: record.name,
        scoring_weights: record.scoringWeights,
        updated_at: record.updatedAt,
      },
      { onConflict: "external_id" },
    );
    this.logger.info("organization.upserted", { externalId: record.externalId });
    return (await this.getByExternalId(record.externalId)) ?? record;
  }
}

function fromRow(row: OrganizationRow): OrganizationRecord {
  return {
    externalId: row.external_id,
    name: row.name,
    scoringWeights: readWeights(row.scoring_weights),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function readWeights(raw: unknown): RankingWeights | null {
  if (!isRecord(raw)) {
    return null;
  }
  const { similarity, requiredSkills, preferredSkills } = raw;
  if (typeof similarity !== "number" || typeof requiredSkills !== "number" || typeof preferredSkills !== "number") {
    return null;
  }
  return { similarity, requiredSkills, preferredSkills };
}
