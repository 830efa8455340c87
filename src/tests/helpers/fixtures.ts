import assert from "node:assert/strict";
import { createHash } from "node:crypto";
import { EmbeddingGateway } from "../../ai/embeddings.client";
import { Logger } from "../../config/logger";
import { EntityStore } from "../../db/entity-store";
import { buildVectorMetadata, InMemoryVectorIndex, VectorIndex } from "../../matching/vector-index";
import { deriveInternalId } from "../../profiles/entity.schemas";
import { ENTITY_CATEGORIES, CanonicalAttributes, EntityCategory, EntityRecord } from "../../shared/types/entity.types";
import { RetryPolicy } from "../../shared/utils/retry";
import { InMemoryEntityStore } from "../../storage/in-memory-entity.store";

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface LogEntry {
  level: string;
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug(message, meta) {
      entries.push({ level: "debug", message, meta });
    },
    info(message, meta) {
      entries.push({ level: "info", message, meta });
    },
    warn(message, meta) {
      entries.push({ level: "warn", message, meta });
    },
    error(message, meta) {
      entries.push({ level: "error", message, meta });
    },
  };
}

export const FAST_RETRY: RetryPolicy = { retries: 2, minTimeoutMs: 1, maxTimeoutMs: 2 };
export const NO_RETRY: RetryPolicy = { retries: 0, minTimeoutMs: 1, maxTimeoutMs: 1 };

export const TEST_DIMENSION = 4;
export const SEED_TIMESTAMP = "2026-01-01T00:00:00.000Z";

/** Deterministic, non-zero vector derived from the text. */
export function hashVector(text: string, dimension = TEST_DIMENSION): number[] {
  const digest = createHash("sha256").update(text).digest();
  return Array.from({ length: dimension }, (_, index) => ((digest[index] ?? 0) + 1) / 256);
}

export class FakeEmbeddingGateway implements EmbeddingGateway {
  readonly calls: Array<{ text: string; modelVersion: string }> = [];
  /** Thrown one per call, in order, before any vector is returned. */
  readonly failures: Error[] = [];

  constructor(private readonly vectorFor: (text: string) => number[] = (text) => hashVector(text)) {}

  async embed(text: string, modelVersion: string): Promise<number[]> {
    this.calls.push({ text, modelVersion });
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return this.vectorFor(text);
  }
}

export function attributes(partial: Partial<CanonicalAttributes> = {}): CanonicalAttributes {
  return {
    skills: [],
    requiredSkills: [],
    preferredSkills: [],
    experienceYears: 0,
    educationLevel: "none",
    locationPreferences: [],
    jobTypes: [],
    ...partial,
  };
}

export interface SeedInput {
  category: EntityCategory;
  externalId: string;
  vector: number[];
  title?: string;
  organizationId?: string | null;
  attributes?: Partial<CanonicalAttributes>;
  updatedAt?: string;
}

/** Writes a committed entity and its vector directly, bypassing the lifecycle saga. */
export async function seedEntity(store: EntityStore, index: VectorIndex, input: SeedInput): Promise<EntityRecord> {
  const internalId = deriveInternalId(input.category, input.externalId);
  const draft: EntityRecord = {
    category: input.category,
    externalId: input.externalId,
    internalId,
    organizationId: input.organizationId ?? null,
    title: input.title ?? input.externalId,
    attributes: attributes(input.attributes),
    vectorRef: null,
    embeddingFingerprint: `seed-${input.externalId}`,
    embeddingModel: "test-embedding",
    status: "active",
    version: 0,
    createdAt: input.updatedAt ?? SEED_TIMESTAMP,
    updatedAt: input.updatedAt ?? SEED_TIMESTAMP,
  };
  const vectorRef = await index.upsert(input.category, internalId, input.vector, buildVectorMetadata(draft));
  return store.insertEntity({ ...draft, vectorRef });
}

/**
 * Every active embedded row has its point, and every point has exactly one
 * row. Tombstoned rows are allowed to still own a point.
 */
export async function assertStoresConsistent(store: InMemoryEntityStore, index: InMemoryVectorIndex): Promise<void> {
  const rows = store.snapshot();
  for (const category of ENTITY_CATEGORIES) {
    const page = await index.listInternalIds(category, null, 10_000);
    const rowIds = new Set(rows.filter((row) => row.category === category).map((row) => row.internalId));
    for (const pointId of page.ids) {
      assert.ok(rowIds.has(pointId), `point ${pointId} in ${category} has no metadata row`);
    }
    for (const row of rows.filter((item) => item.category === category && item.status === "active")) {
      if (row.vectorRef) {
        assert.ok(await index.fetch(row.vectorRef), `${category} ${row.externalId} lost its vector`);
      }
    }
    assert.equal(
      index.size(category),
      rows.filter((row) => row.category === category && row.vectorRef !== null).length,
    );
  }
}
