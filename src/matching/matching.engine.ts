import { randomUUID } from "node:crypto";
import { errorMessage, logContext, Logger } from "../config/logger";
import { EntityStore } from "../db/entity-store";
import {
  EntityNotEmbeddedError,
  EntityNotFoundError,
  MatchingCoreError,
  RequestCancelledError,
  ValidationError,
} from "../shared/errors";
import { counterpartOf, EntityRecord, MatchEventRecord, RankingWeights } from "../shared/types/entity.types";
import { MatchExplanation, MatchRequest, MatchResponse, MatchResult, MatchStage } from "../shared/types/matching.types";
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from "../shared/utils/retry";
import { buildTemplateExplanation, ExplanationGateway } from "./matching-explanation.service";
import { computeMatchInsights } from "./scoring/match-insights";
import {
  compareRanked,
  computeCompositeScore,
  computeSkillBreakdown,
  DEFAULT_RANKING_WEIGHTS,
  normalizeRankingWeights,
} from "./scoring/skill-coverage";
import { toVectorSearchFilters, VectorIndex } from "./vector-index";

const DEFAULT_TOP_K = 10;
const MAX_TOP_K = 100;
const MIN_RETRIEVAL = 30;
const RETRIEVAL_MULTIPLIER = 3;

export interface MatchingEngineOptions {
  defaultMinSimilarity: number;
  explanationEnabled: boolean;
  explanationTimeoutMs: number;
  explanationTopN: number;
  retry?: RetryPolicy;
  now?: () => Date;
}

interface ScoredCandidate {
  internalId: string;
  similarity: number;
  compositeScore: number;
  result: Omit<MatchResult, "rank" | "explanation">;
}

/**
 * Read-only matching: resolves the query entity, retrieves counterparts from
 * the vector index, scores them by similarity and skill coverage, and ranks.
 */
export class MatchingEngine {
  private readonly retry: RetryPolicy;
  private readonly now: () => Date;

  constructor(
    private readonly store: EntityStore,
    private readonly index: VectorIndex,
    private readonly logger: Logger,
    private readonly options: MatchingEngineOptions,
    private readonly explanationGateway?: ExplanationGateway,
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
  }

  async findMatches(request: MatchRequest): Promise<MatchResponse> {
    const startedAt = Date.now();
    const requestId = randomUUID();
    let stage: MatchStage | "Started" = "Started";
    const context = {
      request_id: requestId,
      operation: "find_matches",
      category: request.category,
      external_id: request.externalId,
    };

    try {
      const topK = resolveTopK(request.topK);
      const minSimilarity = resolveMinSimilarity(request.minSimilarity, this.options.defaultMinSimilarity);
      ensureNotCancelled(request.signal, stage);

      const query = await this.resolveQuery(request);
      const queryVector = await this.resolveQueryVector(query);
      const weights = await this.resolveWeights(request, query);
      stage = "QueryResolved";
      ensureNotCancelled(request.signal, stage);

      const counterpart = counterpartOf(query.category);
      const hits = await withRetry(
        () =>
          this.index.search(counterpart, queryVector, {
            topK: Math.max(topK * RETRIEVAL_MULTIPLIER, MIN_RETRIEVAL),
            scoreFloor: 0,
            filters: toVectorSearchFilters(request.filters, [query.internalId]),
          }),
        this.retry,
      );
      const rows = await withRetry(
        () =>
          this.store.getManyByInternalIds(
            counterpart,
            hits.map((hit) => hit.internalId),
          ),
        this.retry,
      );
      stage = "CandidatesRetrieved";
      ensureNotCancelled(request.signal, stage);

      const activeById = new Map<string, EntityRecord>();
      for (const row of rows) {
        if (row.status === "active") {
          activeById.set(row.internalId, row);
        }
      }
      const scored: ScoredCandidate[] = [];
      for (const hit of hits) {
        const row = activeById.get(hit.internalId);
        if (row) {
          scored.push(scoreCandidate(query, row, hit.similarity, weights));
        }
      }
      stage = "Scored";

      const ranked = scored
        .sort(compareRanked)
        .filter((item) => item.similarity >= minSimilarity)
        .slice(0, topK);
      stage = "Ranked";
      ensureNotCancelled(request.signal, stage);

      const explanations = request.explain ? await this.explain(query, ranked) : [];
      if (request.explain) {
        stage = "Explained";
      }
      ensureNotCancelled(request.signal, stage);

      const results: MatchResult[] = ranked.map((item, position) => {
        const explanation = explanations[position];
        const result = { ...item.result, rank: position + 1 };
        return explanation ? { ...result, explanation } : result;
      });

      await this.recordMatchEvents(query, results, request.requestedBy);
      stage = "Returned";

      logContext(
        this.logger,
        "info",
        "matching.request.completed",
        { ...context, stage, latency_ms: Date.now() - startedAt, ok: true },
        { retrieved: hits.length, scored: scored.length, returned: results.length },
      );

      return {
        query: { category: query.category, externalId: query.externalId, internalId: query.internalId },
        weights: { ...weights },
        retrievedCount: hits.length,
        scoredCount: scored.length,
        results,
      };
    } catch (error) {
      logContext(this.logger, error instanceof RequestCancelledError ? "info" : "warn", "matching.request.failed", {
        ...context,
        stage,
        latency_ms: Date.now() - startedAt,
        ok: false,
        error_code: error instanceof MatchingCoreError ? error.code : "INTERNAL_ERROR",
      });
      throw error;
    }
  }

  private async resolveQuery(request: MatchRequest): Promise<EntityRecord> {
    const query = await withRetry(() => this.store.getByExternalId(request.category, request.externalId), this.retry);
    if (!query || query.status !== "active") {
      throw new EntityNotFoundError(request.category, request.externalId);
    }
    return query;
  }

  private async resolveQueryVector(query: EntityRecord): Promise<number[]> {
    const ref = query.vectorRef;
    if (!ref) {
      throw new EntityNotEmbeddedError(query.category, query.externalId);
    }
    const vector = await withRetry(() => this.index.fetch(ref), this.retry);
    if (!vector) {
      throw new EntityNotEmbeddedError(query.category, query.externalId);
    }
    return vector;
  }

  /**
   * Request weights, then the owning organization's weights, then the
   * defaults. A candidate query takes the organization from a filter naming
   * exactly one.
   */
  private async resolveWeights(request: MatchRequest, query: EntityRecord): Promise<Readonly<RankingWeights>> {
    if (request.weights) {
      return normalizeRankingWeights(request.weights);
    }
    const filtered = request.filters?.organizationIds;
    const organizationId =
      query.category === "job" ? query.organizationId : filtered?.length === 1 ? filtered[0] : undefined;
    if (organizationId) {
      const organization = await withRetry(() => this.store.getOrganization(organizationId), this.retry);
      if (organization?.scoringWeights) {
        return normalizeRankingWeights(organization.scoringWeights);
      }
    }
    return normalizeRankingWeights(DEFAULT_RANKING_WEIGHTS);
  }

  private async explain(query: EntityRecord, ranked: ReadonlyArray<ScoredCandidate>): Promise<MatchExplanation[]> {
    const gateway = this.options.explanationEnabled ? this.explanationGateway : undefined;
    return Promise.all(
      ranked.map(async (item, position) => {
        const template = buildTemplateExplanation(
          item.similarity,
          item.result.breakdown,
          item.compositeScore,
          item.result.insights,
        );
        if (!gateway || position >= this.options.explanationTopN) {
          return template;
        }
        try {
          const explained = await withTimeout(
            gateway.explain(
              {
                query: { category: query.category, title: query.title },
                counterpart: { category: counterpartOf(query.category), title: item.result.title },
                similarity: item.similarity,
                compositeScore: item.compositeScore,
                breakdown: item.result.breakdown,
                insights: item.result.insights,
              },
              { timeoutMs: this.options.explanationTimeoutMs },
            ),
            this.options.explanationTimeoutMs,
          );
          return { summary: explained.summary, highlights: explained.highlights, source: "gateway" as const };
        } catch (error) {
          this.logger.warn("matching.explanation.fallback", {
            internalId: item.internalId,
            error: errorMessage(error),
          });
          return template;
        }
      }),
    );
  }

  private async recordMatchEvents(
    query: EntityRecord,
    results: ReadonlyArray<MatchResult>,
    requestedBy: string | undefined,
  ): Promise<void> {
    if (results.length === 0) {
      return;
    }
    const createdAt = this.now().toISOString();
    const events: MatchEventRecord[] = results.map((result) => ({
      id: randomUUID(),
      queryCategory: query.category,
      queryId: query.internalId,
      resultId: result.candidateEntityId,
      similarity: result.similarity,
      compositeScore: result.compositeScore,
      rank: result.rank,
      requestedBy: requestedBy ?? null,
      createdAt,
    }));
    try {
      await this.store.insertMatchEvents(events);
    } catch (error) {
      this.logger.warn("matching.events.record_failed", {
        queryId: query.internalId,
        count: events.length,
        error: errorMessage(error),
      });
    }
  }
}

function scoreCandidate(
  query: EntityRecord,
  counterpart: EntityRecord,
  similarity: number,
  weights: Readonly<RankingWeights>,
): ScoredCandidate {
  const job = query.category === "job" ? query : counterpart;
  const candidate = query.category === "job" ? counterpart : query;
  const breakdown = computeSkillBreakdown(
    candidate.attributes.skills,
    job.attributes.requiredSkills,
    job.attributes.preferredSkills,
  );
  const compositeScore = computeCompositeScore(similarity, breakdown, weights);
  const insights = computeMatchInsights(job.attributes, candidate.attributes, breakdown);
  return {
    internalId: counterpart.internalId,
    similarity,
    compositeScore,
    result: {
      queryEntityId: query.internalId,
      candidateEntityId: counterpart.internalId,
      externalId: counterpart.externalId,
      title: counterpart.title,
      similarity,
      skillCoverage: {
        required: breakdown.requiredCoverage,
        preferred: breakdown.preferredCoverage,
      },
      breakdown,
      insights,
      compositeScore,
    },
  };
}

function resolveTopK(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_TOP_K;
  }
  if (!Number.isInteger(value) || value < 1 || value > MAX_TOP_K) {
    throw new ValidationError([`topK must be an integer between 1 and ${MAX_TOP_K}`]);
  }
  return value;
}

function resolveMinSimilarity(value: number | undefined, fallback: number): number {
  const resolved = value ?? fallback;
  if (!Number.isFinite(resolved) || resolved < -1 || resolved > 1) {
    throw new ValidationError(["minSimilarity must be a number between -1 and 1"]);
  }
  return resolved;
}

function ensureNotCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RequestCancelledError(stage);
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
