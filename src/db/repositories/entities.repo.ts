import { Logger } from "../../config/logger";
import { readStoredAttributes } from "../../profiles/entity.schemas";
import { ConcurrentModificationError } from "../../shared/errors";
import { EntityCategory, EntityRecord, EntityStatus } from "../../shared/types/entity.types";
import { CascadeDeletion, RetentionSelection } from "../entity-store";
import { SupabaseRequestError, SupabaseRestClient } from "../supabase.client";

const ENTITIES_TABLE = "entities";
const ERASE_ENTITY_RPC = "erase_entity_cascade";
const LIST_RETENTION_RPC = "list_retention_eligible";
const BATCH_LOOKUP_CHUNK = 200;

export interface EntityRow {
  category: EntityCategory;
  external_id: string;
  internal_id: string;
  organization_id: string | null;
  title: string;
  attributes: unknown;
  vector_collection: string | null;
  vector_point_id: string | null;
  embedding_fingerprint: string | null;
  embedding_model: string | null;
  status: EntityStatus;
  version: number;
  created_at: string;
  updated_at: string;
}

interface EraseEntityRow {
  entity_deleted: boolean;
  applications_deleted: number;
  match_events_deleted: number;
}

export class EntitiesRepository {
  constructor(
    private readonly supabaseClient: SupabaseRestClient,
    private readonly logger: Logger,
  ) {}

  async getByExternalId(category: EntityCategory, externalId: string): Promise<EntityRecord | null> {
    const row = await this.supabaseClient.selectOne<EntityRow>(ENTITIES_TABLE, {
      category,
      external_id: externalId,
    });
    return row ? fromRow(row) : null;
  }

  async getManyByInternalIds(
    category: EntityCategory,
    internalIds: ReadonlyArray<string>,
  ): Promise<EntityRecord[]> {
    const unique = Array.from(new Set(internalIds));
    const output: EntityRecord[] = [];
    for (let offset = 0; offset < unique.length; offset += BATCH_LOOKUP_CHUNK) {
      const chunk = unique.slice(offset, offset + BATCH_LOOKUP_CHUNK);
      const rows = await this.supabaseClient.selectMany<EntityRow>(ENTITIES_TABLE, {
        category,
        internal_id: { in: chunk },
      });
      output.push(...rows.map(fromRow));
    }
    return output;
  }

  async insert(record: EntityRecord): Promise<EntityRecord> {
    try {
      const rows = await this.supabaseClient.insert<EntityRow>(ENTITIES_TABLE, toRow({ ...record, version: 1 }));
      const row = rows[0];
      if (!row) {
        throw new Error("Supabase insert returned no row");
      }
      return fromRow(row);
    } catch (error) {
      if (error instanceof SupabaseRequestError && error.status === 409) {
        throw new ConcurrentModificationError(record.category, record.externalId, 0);
      }
      throw error;
    }
  }

  async updateVersioned(record: EntityRecord, expectedVersion: number): Promise<EntityRecord> {
    const rows = await this.supabaseClient.patch<EntityRow>(
      ENTITIES_TABLE,
      {
        internal_id: record.internalId,
        version: expectedVersion,
      },
      toRow({ ...record, version: expectedVersion + 1 }),
    );
    const row = rows[0];
    if (!row) {
      throw new ConcurrentModificationError(record.category, record.externalId, expectedVersion);
    }
    return fromRow(row);
  }

  async eraseCascade(category: EntityCategory, internalId: string): Promise<CascadeDeletion> {
    const rows = await this.supabaseClient.rpc<EraseEntityRow>(ERASE_ENTITY_RPC, {
      p_category: category,
      p_internal_id: internalId,
    });
    const row = rows[0];
    const result: CascadeDeletion = {
      entityDeleted: Boolean(row?.entity_deleted),
      applications: Number(row?.applications_deleted ?? 0),
      matchEvents: Number(row?.match_events_deleted ?? 0),
    };
    this.logger.debug("entity.cascade_deleted", {
      category,
      internalId,
      ...result,
    });
    return result;
  }

  async listRetentionEligible(category: EntityCategory, selection: RetentionSelection): Promise<EntityRecord[]> {
    const rows = await this.supabaseClient.rpc<EntityRow>(LIST_RETENTION_RPC, {
      p_category: category,
      p_updated_before: selection.updatedBefore,
      p_applications_before: selection.applicationsBefore,
      p_limit: selection.limit,
      p_exclude_ids: selection.excludeInternalIds ?? [],
    });
    return rows.map(fromRow);
  }
}

export function fromRow(row: EntityRow): EntityRecord {
  return {
    category: row.category,
    externalId: row.external_id,
    internalId: row.internal_id,
    organizationId: row.organization_id,
    title: row.title,
    attributes: readStoredAttributes(row.attributes),
    vectorRef:
      row.vector_collection && row.vector_point_id
        ? { collection: row.vector_collection, pointId: row.vector_point_id }
        : null,
    embeddingFingerprint: row.embedding_fingerprint,
    embeddingModel: row.embedding_model,
    status: row.status === "erasing" ? "erasing" : "active",
    version: Number(row.version),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toRow(record: EntityRecord): EntityRow {
  return {
    category: record.category,
    external_id: record.externalId,
    internal_id: record.internalId,
    organization_id: record.organizationId,
    title: record.title,
    attributes: record.attributes,
    vector_collection: record.vectorRef?.collection ?? null,
    vector_point_id: record.vectorRef?.pointId ?? null,
    embedding_fingerprint: record.embeddingFingerprint,
    embedding_model: record.embeddingModel,
    status: record.status,
    version: record.version,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}
