import fetch, { Response } from "node-fetch";
import { Logger, errorMessage } from "../config/logger";
import { DimensionMismatchError, IndexUnavailableError } from "../shared/errors";
import { EntityCategory, VectorRef } from "../shared/types/entity.types";
import {
  VectorCollections,
  VectorIdPage,
  VectorIndex,
  VectorMetadata,
  VectorSearchFilters,
  VectorSearchHit,
  VectorSearchOptions,
  assertDimension,
  sortHits,
} from "./vector-index";

const MAX_SEARCH_LIMIT = 500;

interface QdrantPoint {
  id: number | string;
  vector?: number[] | Record<string, number[]>;
  score?: number;
}

interface QdrantCollectionResponse {
  result?: {
    points_count?: number;
    config?: {
      params?: {
        vectors?: {
          size?: number;
          distance?: string;
        };
      };
    };
  };
}

interface QdrantScrollResponse {
  result?: {
    points?: QdrantPoint[];
    next_page_offset?: string | number | null;
  };
}

type QdrantResponse<T> = { ok: true; data: T } | { ok: false; status: number; body: string };

export interface QdrantClientConfig {
  baseUrl: string;
  apiKey?: string;
  collections: VectorCollections;
  dimension: number;
  timeoutMs?: number;
}

export class QdrantVectorIndex implements VectorIndex {
  readonly dimension: number;
  private readonly baseUrl: string;
  private readonly readyCollections = new Set<string>();

  constructor(
    private readonly config: QdrantClientConfig,
    private readonly logger: Logger,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.dimension = config.dimension;
  }

  collectionFor(category: EntityCategory): string {
    return this.config.collections[category];
  }

  async ensureCollection(collection: string): Promise<void> {
    if (this.readyCollections.has(collection)) {
      return;
    }

    const existing = await this.request<QdrantCollectionResponse>(
      "GET",
      `/collections/${encodeURIComponent(collection)}`,
    );
    if (existing.ok) {
      const existingSize = Number(existing.data.result?.config?.params?.vectors?.size ?? 0);
      // A collection built for another model is never recreated implicitly.
      if (existingSize > 0 && existingSize !== this.dimension) {
        throw new DimensionMismatchError(this.dimension, existingSize, collection);
      }
      this.readyCollections.add(collection);
      return;
    }
    if (existing.status !== 404) {
      throw unexpectedResponse("get_collection", existing);
    }

    const created = await this.request("PUT", `/collections/${encodeURIComponent(collection)}`, {
      vectors: {
        size: this.dimension,
        distance: "Cosine",
      },
    });
    if (!created.ok) {
      throw unexpectedResponse("create_collection", created);
    }
    this.readyCollections.add(collection);
    this.logger.info("qdrant.collection.ready", {
      collection,
      vectorSize: this.dimension,
    });
  }

  async upsert(
    category: EntityCategory,
    internalId: string,
    vector: number[],
    metadata: VectorMetadata,
  ): Promise<VectorRef> {
    const collection = this.collectionFor(category);
    assertDimension(vector, this.dimension, collection);
    await this.ensureCollection(collection);

    const response = await this.request("PUT", `/collections/${encodeURIComponent(collection)}/points?wait=true`, {
      points: [
        {
          id: internalId,
          vector,
          payload: {
            internal_id: internalId,
            external_id: metadata.externalId,
            category: metadata.category,
            created_at: metadata.createdAt,
            education_level: metadata.educationLevel,
            locations: metadata.locations,
            job_types: metadata.jobTypes,
            organization_id: metadata.organizationId,
          },
        },
      ],
    });
    if (!response.ok) {
      throw unexpectedResponse("upsert", response);
    }
    return { collection, pointId: internalId };
  }

  async delete(ref: VectorRef): Promise<"ok" | "not_found"> {
    const existing = await this.retrieve(ref, false);
    if (!existing) {
      return "not_found";
    }
    const response = await this.request(
      "POST",
      `/collections/${encodeURIComponent(ref.collection)}/points/delete?wait=true`,
      { points: [ref.pointId] },
    );
    if (!response.ok) {
      if (response.status === 404) {
        return "not_found";
      }
      throw unexpectedResponse("delete", response);
    }
    return "ok";
  }

  async fetch(ref: VectorRef): Promise<number[] | null> {
    const point = await this.retrieve(ref, true);
    if (!point || !Array.isArray(point.vector)) {
      return null;
    }
    return point.vector;
  }

  async search(
    category: EntityCategory,
    queryVector: number[],
    options: VectorSearchOptions,
  ): Promise<VectorSearchHit[]> {
    const collection = this.collectionFor(category);
    assertDimension(queryVector, this.dimension, collection);

    const body: Record<string, unknown> = {
      vector: queryVector,
      limit: Math.max(1, Math.min(options.topK, MAX_SEARCH_LIMIT)),
      score_threshold: options.scoreFloor,
      with_payload: false,
      with_vector: false,
    };
    const filter = buildQdrantFilter(options.filters);
    if (filter) {
      body.filter = filter;
    }

    const response = await this.request<{ result?: QdrantPoint[] }>(
      "POST",
      `/collections/${encodeURIComponent(collection)}/points/search`,
      body,
    );
    if (!response.ok) {
      if (response.status === 404) {
        return [];
      }
      throw unexpectedResponse("search", response);
    }

    const hits = (response.data.result ?? [])
      .map((point) => ({
        internalId: String(point.id),
        similarity: Number(point.score ?? Number.NaN),
      }))
      .filter((hit) => Number.isFinite(hit.similarity) && hit.similarity >= options.scoreFloor);
    return sortHits(hits);
  }

  async listInternalIds(category: EntityCategory, cursor: string | null, limit: number): Promise<VectorIdPage> {
    const collection = this.collectionFor(category);
    const response = await this.request<QdrantScrollResponse>(
      "POST",
      `/collections/${encodeURIComponent(collection)}/points/scroll`,
      {
        limit: Math.max(1, limit),
        ...(cursor ? { offset: cursor } : {}),
        with_payload: false,
        with_vector: false,
      },
    );
    if (!response.ok) {
      if (response.status === 404) {
        return { ids: [], nextCursor: null };
      }
      throw unexpectedResponse("scroll", response);
    }
    const next = response.data.result?.next_page_offset;
    return {
      ids: (response.data.result?.points ?? []).map((point) => String(point.id)),
      nextCursor: next === undefined || next === null ? null : String(next),
    };
  }

  private async retrieve(ref: VectorRef, withVector: boolean): Promise<QdrantPoint | null> {
    const response = await this.request<{ result?: QdrantPoint[] }>(
      "POST",
      `/collections/${encodeURIComponent(ref.collection)}/points`,
      {
        ids: [ref.pointId],
        with_payload: false,
        with_vector: withVector,
      },
    );
    if (!response.ok) {
      if (response.status === 404) {
        return null;
      }
      throw unexpectedResponse("retrieve", response);
    }
    return response.data.result?.[0] ?? null;
  }

  private async request<T = unknown>(
    method: "GET" | "POST" | "PUT",
    path: string,
    body?: Record<string, unknown>,
  ): Promise<QdrantResponse<T>> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers(),
        body: body ? JSON.stringify(body) : undefined,
        timeout: this.config.timeoutMs ?? 10_000,
      });
    } catch (error) {
      this.logger.warn("qdrant.request.failed", {
        method,
        path,
        error: errorMessage(error),
      });
      throw new IndexUnavailableError(`Qdrant is unreachable: ${errorMessage(error)}`, { path });
    }

    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        body: await response.text(),
      };
    }

    return {
      ok: true,
      data: (await response.json()) as T,
    };
  }

  private headers(): Record<string, string> {
    return {
      "content-type": "application/json",
      ...(this.config.apiKey ? { "api-key": this.config.apiKey } : {}),
    };
  }
}

export function buildQdrantFilter(filters: VectorSearchFilters | undefined): Record<string, unknown> | null {
  if (!filters) {
    return null;
  }
  const must: Array<Record<string, unknown>> = [];
  if (filters.educationLevels?.length) {
    must.push({ key: "education_level", match: { any: [...filters.educationLevels] } });
  }
  if (filters.locations?.length) {
    must.push({ key: "locations", match: { any: [...filters.locations] } });
  }
  if (filters.jobTypes?.length) {
    must.push({ key: "job_types", match: { any: [...filters.jobTypes] } });
  }
  if (filters.organizationIds?.length) {
    must.push({ key: "organization_id", match: { any: [...filters.organizationIds] } });
  }
  const mustNot = filters.excludeInternalIds?.length ? [{ has_id: [...filters.excludeInternalIds] }] : [];
  if (must.length === 0 && mustNot.length === 0) {
    return null;
  }
  return {
    ...(must.length ? { must } : {}),
    ...(mustNot.length ? { must_not: mustNot } : {}),
  };
}

function unexpectedResponse(operation: string, response: { status: number; body: string }): Error {
  const message = `Qdrant ${operation} failed: HTTP ${response.status} - ${response.body.slice(0, 300)}`;
  if (response.status >= 500 || response.status === 429) {
    return new IndexUnavailableError(message, { operation, status: response.status });
  }
  return new Error(message);
}
