import { DimensionMismatchError } from "../shared/errors";
import { EducationLevel, EntityCategory, EntityRecord, VectorRef } from "../shared/types/entity.types";
import { MatchFilters } from "../shared/types/matching.types";

export interface VectorMetadata {
  externalId: string;
  category: EntityCategory;
  createdAt: string;
  educationLevel: EducationLevel;
  locations: string[];
  jobTypes: string[];
  organizationId: string | null;
}

export interface VectorSearchFilters {
  educationLevels?: ReadonlyArray<EducationLevel>;
  locations?: ReadonlyArray<string>;
  jobTypes?: ReadonlyArray<string>;
  organizationIds?: ReadonlyArray<string>;
  excludeInternalIds?: ReadonlyArray<string>;
}

export interface VectorSearchOptions {
  topK: number;
  scoreFloor: number;
  filters?: VectorSearchFilters;
}

export interface VectorSearchHit {
  internalId: string;
  similarity: number;
}

export interface VectorIdPage {
  ids: string[];
  nextCursor: string | null;
}

/**
 * One collection per entity category. A point id is the entity's internal id,
 * so an upsert always replaces the entity's previous vector.
 */
export interface VectorIndex {
  readonly dimension: number;
  collectionFor(category: EntityCategory): string;
  upsert(
    category: EntityCategory,
    internalId: string,
    vector: number[],
    metadata: VectorMetadata,
  ): Promise<VectorRef>;
  delete(ref: VectorRef): Promise<"ok" | "not_found">;
  fetch(ref: VectorRef): Promise<number[] | null>;
  search(category: EntityCategory, queryVector: number[], options: VectorSearchOptions): Promise<VectorSearchHit[]>;
  listInternalIds(category: EntityCategory, cursor: string | null, limit: number): Promise<VectorIdPage>;
}

export interface VectorCollections {
  job: string;
  candidate: string;
}

interface StoredPoint {
  vector: number[];
  metadata: VectorMetadata;
}

export class InMemoryVectorIndex implements VectorIndex {
  private readonly collections = new Map<string, Map<string, StoredPoint>>();

  constructor(
    readonly dimension: number,
    private readonly names: VectorCollections = { job: "jobs", candidate: "candidates" },
  ) {}

  collectionFor(category: EntityCategory): string {
    return this.names[category];
  }

  async upsert(
    category: EntityCategory,
    internalId: string,
    vector: number[],
    metadata: VectorMetadata,
  ): Promise<VectorRef> {
    assertDimension(vector, this.dimension);
    const collection = this.collectionFor(category);
    this.points(collection).set(internalId, { vector: [...vector], metadata: { ...metadata } });
    return { collection, pointId: internalId };
  }

  async delete(ref: VectorRef): Promise<"ok" | "not_found"> {
    return this.points(ref.collection).delete(ref.pointId) ? "ok" : "not_found";
  }

  async fetch(ref: VectorRef): Promise<number[] | null> {
    const point = this.points(ref.collection).get(ref.pointId);
    return point ? [...point.vector] : null;
  }

  async search(
    category: EntityCategory,
    queryVector: number[],
    options: VectorSearchOptions,
  ): Promise<VectorSearchHit[]> {
    assertDimension(queryVector, this.dimension);
    const excluded = new Set(options.filters?.excludeInternalIds ?? []);
    const hits: VectorSearchHit[] = [];
    for (const [internalId, point] of this.points(this.collectionFor(category))) {
      if (excluded.has(internalId) || !matchesFilters(point.metadata, options.filters)) {
        continue;
      }
      const similarity = cosineSimilarity(queryVector, point.vector);
      if (!Number.isFinite(similarity) || similarity < options.scoreFloor) {
        continue;
      }
      hits.push({ internalId, similarity });
    }
    return sortHits(hits).slice(0, Math.max(0, options.topK));
  }

  async listInternalIds(category: EntityCategory, cursor: string | null, limit: number): Promise<VectorIdPage> {
    const ids = Array.from(this.points(this.collectionFor(category)).keys()).sort();
    const start = cursor ? ids.findIndex((id) => id > cursor) : 0;
    if (start < 0) {
      return { ids: [], nextCursor: null };
    }
    const page = ids.slice(start, start + limit);
    const hasMore = start + limit < ids.length;
    return { ids: page, nextCursor: hasMore ? page[page.length - 1] ?? null : null };
  }

  size(category: EntityCategory): number {
    return this.points(this.collectionFor(category)).size;
  }

  private points(collection: string): Map<string, StoredPoint> {
    let points = this.collections.get(collection);
    if (!points) {
      points = new Map();
      this.collections.set(collection, points);
    }
    return points;
  }
}

/** Payload stored beside a vector. Tag-like values are lowercased so filters match case-insensitively. */
export function buildVectorMetadata(record: EntityRecord): VectorMetadata {
  return {
    externalId: record.externalId,
    category: record.category,
    createdAt: record.createdAt,
    educationLevel: record.attributes.educationLevel,
    locations: record.attributes.locationPreferences.map(normalizeTag),
    jobTypes: record.attributes.jobTypes.map(normalizeTag),
    organizationId: record.organizationId,
  };
}

export function toVectorSearchFilters(
  filters: MatchFilters | undefined,
  excludeInternalIds: ReadonlyArray<string>,
): VectorSearchFilters {
  return {
    educationLevels: filters?.educationLevels,
    locations: filters?.locations?.map(normalizeTag),
    jobTypes: filters?.jobTypes?.map(normalizeTag),
    organizationIds: filters?.organizationIds,
    excludeInternalIds,
  };
}

function normalizeTag(value: string): string {
  return value.trim().toLowerCase();
}

export function assertDimension(vector: ReadonlyArray<number>, dimension: number, collection?: string): void {
  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length, collection);
  }
}

export function sortHits(hits: VectorSearchHit[]): VectorSearchHit[] {
  return hits.sort((a, b) => {
    if (b.similarity !== a.similarity) {
      return b.similarity - a.similarity;
    }
    return a.internalId < b.internalId ? -1 : a.internalId > b.internalId ? 1 : 0;
  });
}

function matchesFilters(metadata: VectorMetadata, filters: VectorSearchFilters | undefined): boolean {
  if (!filters) {
    return true;
  }
  if (filters.educationLevels?.length && !filters.educationLevels.includes(metadata.educationLevel)) {
    return false;
  }
  if (filters.locations?.length && !overlaps(filters.locations, metadata.locations)) {
    return false;
  }
  if (filters.jobTypes?.length && !overlaps(filters.jobTypes, metadata.jobTypes)) {
    return false;
  }
  if (
    filters.organizationIds?.length &&
    (metadata.organizationId === null || !filters.organizationIds.includes(metadata.organizationId))
  ) {
    return false;
  }
  return true;
}

function overlaps(wanted: ReadonlyArray<string>, actual: ReadonlyArray<string>): boolean {
  return wanted.some((item) => actual.includes(item));
}

export function cosineSimilarity(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
  const size = Math.min(a.length, b.length);
  if (size === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let index = 0; index < size; index += 1) {
    const left = a[index] ?? 0;
    const right = b[index] ?? 0;
    dot += left * right;
    normA += left * left;
    normB += right * right;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
