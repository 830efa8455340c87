import { Logger } from "../../config/logger";
import { APPLICATION_STATUSES, ApplicationRecord, EntityCategory } from "../../shared/types/entity.types";
import { SupabaseRestClient } from "../supabase.client";

const APPLICATIONS_TABLE = "applications";

interface ApplicationRow {
  id: string;
  candidate_id: string;
  organization_id: string;
  job_id: string | null;
  status: string;
  applied_at: string;
}

export class ApplicationsRepository {
  constructor(
    private readonly supabaseClient: SupabaseRestClient,
    private readonly logger: Logger,
  ) {}

  async insert(record: ApplicationRecord): Promise<ApplicationRecord> {
    const rows = await this.supabaseClient.insert<ApplicationRow>(APPLICATIONS_TABLE, {
      id: record.id,
      candidate_id: record.candidateId,
      organization_id: record.organizationId,
      job_id: record.jobId,
      status: record.status,
      applied_at: record.appliedAt,
    });
    const row = rows[0];
    return row ? fromRow(row) : record;
  }

  async listForEntity(category: EntityCategory, internalId: string): Promise<ApplicationRecord[]> {
    const column = category === "candidate" ? "candidate_id" : "job_id";
    const rows = await this.supabaseClient.selectMany<ApplicationRow>(
      APPLICATIONS_TABLE,
      { [column]: internalId },
      "*",
      { order: "applied_at.asc" },
    );
    return rows.map(fromRow);
  }

  async deleteBefore(cutoff: string): Promise<number> {
    const deleted = await this.supabaseClient.deleteMany(APPLICATIONS_TABLE, {
      applied_at: { lt: cutoff },
    });
    if (deleted > 0) {
      this.logger.info("applications.purged", { deleted, cutoff });
    }
    return deleted;
  }
}

function fromRow(row: ApplicationRow): ApplicationRecord {
  return {
    id: row.id,
    candidateId: row.candidate_id,
    organizationId: row.organization_id,
    jobId: row.job_id,
    status: APPLICATION_STATUSES.find((item) => item === row.status) ?? "applied",
    appliedAt: row.applied_at,
  };
}
