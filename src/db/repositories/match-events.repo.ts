import { Logger } from "../../config/logger";
import { EntityCategory, MatchEventRecord } from "../../shared/types/entity.types";
import { SupabaseRestClient } from "../supabase.client";

const MATCH_EVENTS_TABLE = "match_events";

interface MatchEventRow {
  id: string;
  query_category: EntityCategory;
  query_id: string;
  result_id: string;
  similarity: number;
  composite_score: number;
  rank: number;
  requested_by: string | null;
  created_at: string;
}

export class MatchEventsRepository {
  constructor(
    private readonly supabaseClient: SupabaseRestClient,
    private readonly logger: Logger,
  ) {}

  async insertMany(events: ReadonlyArray<MatchEventRecord>): Promise<void> {
    if (events.length === 0) {
      return;
    }
    await this.supabaseClient.insert(
      MATCH_EVENTS_TABLE,
      events.map((event) => ({
        id: event.id,
        query_category: event.queryCategory,
        query_id: event.queryId,
        result_id: event.resultId,
        similarity: event.similarity,
        composite_score: event.compositeScore,
        rank: event.rank,
        requested_by: event.requestedBy,
        created_at: event.createdAt,
      })),
    );
  }

  async listForEntity(internalId: string): Promise<MatchEventRecord[]> {
    const [asQuery, asResult] = await Promise.all([
      this.supabaseClient.selectMany<MatchEventRow>(MATCH_EVENTS_TABLE, { query_id: internalId }),
      this.supabaseClient.selectMany<MatchEventRow>(MATCH_EVENTS_TABLE, { result_id: internalId }),
    ]);
    const byId = new Map<string, MatchEventRecord>();
    for (const row of [...asQuery, ...asResult]) {
      byId.set(row.id, fromRow(row));
    }
    return Array.from(byId.values());
  }

  async deleteBefore(cutoff: string): Promise<number> {
    const deleted = await this.supabaseClient.deleteMany(MATCH_EVENTS_TABLE, {
      created_at: { lt: cutoff },
    });
    if (deleted > 0) {
      this.logger.info("match_events.purged", { deleted, cutoff });
    }
    return deleted;
  }
}

function fromRow(row: MatchEventRow): MatchEventRecord {
  return {
    id: row.id,
    queryCategory: row.query_category,
    queryId: row.query_id,
    resultId: row.result_id,
    similarity: Number(row.similarity),
    compositeScore: Number(row.composite_score),
    rank: Number(row.rank),
    requestedBy: row.requested_by,
    createdAt: row.created_at,
  };
}
