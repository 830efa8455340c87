import { randomUUID } from "node:crypto";
import { EmbeddingGateway } from "../ai/embeddings.client";
import { errorMessage, logContext, Logger } from "../config/logger";
import { EntityStore } from "../db/entity-store";
import { assertDimension, buildVectorMetadata, VectorIndex } from "../matching/vector-index";
import {
  buildCanonicalText,
  computeEmbeddingFingerprint,
  deriveInternalId,
  parseApplicationInput,
  parseEntitySubmission,
  parseOrganizationInput,
} from "../profiles/entity.schemas";
import { validateRankingWeights } from "../matching/scoring/skill-coverage";
import {
  ConcurrentModificationError,
  EntityNotFoundError,
  LifecycleError,
  MatchingCoreError,
  StoreUnavailableError,
  ValidationError,
} from "../shared/errors";
import {
  ApplicationRecord,
  EntityCategory,
  EntityRecord,
  OrganizationRecord,
} from "../shared/types/entity.types";
import { KeyedLock } from "../shared/utils/keyed-lock";
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from "../shared/utils/retry";
import { runSaga, SagaStep } from "./saga";

export interface EntityLifecycleOptions {
  embeddingModel: string;
  embeddingRetry: RetryPolicy;
  /** Used for index and store writes. */
  backendRetry?: RetryPolicy;
  now?: () => Date;
}

export interface SubmitEntityResult {
  entity: EntityRecord;
  created: boolean;
  reembedded: boolean;
}

interface SubmitSagaContext {
  staged: EntityRecord;
  previous: EntityRecord | null;
  vector: number[];
  priorVector: number[] | null;
  committed: EntityRecord | null;
}

/** Lock key for all writes touching one entity, in either store. */
export function entityLockKey(category: EntityCategory, externalId: string): string {
  return deriveInternalId(category, externalId);
}

export class EntityLifecycleService {
  private readonly backendRetry: RetryPolicy;
  private readonly now: () => Date;

  constructor(
    private readonly store: EntityStore,
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingGateway,
    private readonly logger: Logger,
    private readonly options: EntityLifecycleOptions,
    private readonly lock: KeyedLock = new KeyedLock(),
  ) {
    this.backendRetry = options.backendRetry ?? DEFAULT_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
  }

  async submitEntity(category: EntityCategory, input: unknown): Promise<SubmitEntityResult> {
    const submission = parseEntitySubmission(category, input);
    return this.lock.run(entityLockKey(category, submission.externalId), async () => {
      const startedAt = Date.now();
      const previous = await this.store.getByExternalId(category, submission.externalId);
      if (previous?.status === "erasing") {
        throw new ConcurrentModificationError(category, submission.externalId, previous.version);
      }

      const modelVersion = this.options.embeddingModel;
      const canonicalText = buildCanonicalText(submission);
      const fingerprint = computeEmbeddingFingerprint(modelVersion, canonicalText);
      const timestamp = this.now().toISOString();
      const staged: EntityRecord = {
        category,
        externalId: submission.externalId,
        internalId: previous?.internalId ?? deriveInternalId(category, submission.externalId),
        organizationId: submission.organizationId ?? null,
        title: submission.title,
        attributes: submission.attributes,
        vectorRef: previous?.vectorRef ?? null,
        embeddingFingerprint: fingerprint,
        embeddingModel: modelVersion,
        status: "active",
        version: previous?.version ?? 0,
        createdAt: previous?.createdAt ?? timestamp,
        updatedAt: timestamp,
      };
      const context = {
        operation: "submit_entity",
        category,
        external_id: staged.externalId,
        internal_id: staged.internalId,
      };

      const contentUnchanged =
        previous !== null && previous.vectorRef !== null && previous.embeddingFingerprint === fingerprint;
      if (previous && contentUnchanged && previous.organizationId === staged.organizationId) {
        let entity: EntityRecord;
        try {
          entity = await this.commitMetadata(staged, previous);
        } catch (error) {
          throw new LifecycleError(`Failed to update ${category} ${staged.externalId}: ${errorMessage(error)}`, error, {
            stage: "commit_metadata",
            externalId: staged.externalId,
          });
        }
        logContext(
          this.logger,
          "info",
          "entity.submitted",
          { ...context, latency_ms: Date.now() - startedAt, ok: true },
          { created: false, reembedded: false },
        );
        return { entity, created: false, reembedded: false };
      }

      // Only the vector payload is stale; reuse the stored vector.
      const reusable = contentUnchanged && previous?.vectorRef ? await this.index.fetch(previous.vectorRef) : null;
      const vector = reusable ?? (await this.embed(canonicalText, modelVersion, context));

      const sagaContext: SubmitSagaContext = { staged, previous, vector, priorVector: null, committed: null };
      const outcome = await runSaga("submit_entity", this.submitSteps(), sagaContext, this.logger, {
        category,
        internalId: staged.internalId,
      });
      if (outcome.state !== "completed" || !sagaContext.committed) {
        logContext(
          this.logger,
          "warn",
          "entity.submit.failed",
          {
            ...context,
            latency_ms: Date.now() - startedAt,
            ok: false,
            error_code: outcome.error instanceof MatchingCoreError ? outcome.error.code : "INTERNAL_ERROR",
          },
          { sagaState: outcome.state, failedStep: outcome.failedStep },
        );
        throw new LifecycleError(
          `Failed to submit ${category} ${staged.externalId}: ${errorMessage(outcome.error)}`,
          outcome.error,
          { sagaState: outcome.state, failedStep: outcome.failedStep, externalId: staged.externalId },
        );
      }

      const created = previous === null;
      const reembedded = reusable === null;
      logContext(
        this.logger,
        "info",
        "entity.submitted",
        { ...context, latency_ms: Date.now() - startedAt, ok: true },
        { created, reembedded },
      );
      return { entity: sagaContext.committed, created, reembedded };
    });
  }

  async getEntity(category: EntityCategory, externalId: string): Promise<EntityRecord> {
    const record = await this.store.getByExternalId(category, externalId);
    if (!record || record.status !== "active") {
      throw new EntityNotFoundError(category, externalId);
    }
    return record;
  }

  async upsertOrganization(input: unknown): Promise<OrganizationRecord> {
    const parsed = parseOrganizationInput(input);
    if (parsed.scoringWeights) {
      validateRankingWeights(parsed.scoringWeights);
    }
    const existing = await this.store.getOrganization(parsed.externalId);
    const timestamp = this.now().toISOString();
    const record = await withRetry(
      () =>
        this.store.upsertOrganization({
          externalId: parsed.externalId,
          name: parsed.name,
          scoringWeights: parsed.scoringWeights,
          createdAt: existing?.createdAt ?? timestamp,
          updatedAt: timestamp,
        }),
      this.backendRetry,
    );
    this.logger.info("organization.saved", { externalId: record.externalId, created: existing === null });
    return record;
  }

  async recordApplication(input: unknown): Promise<ApplicationRecord> {
    const parsed = parseApplicationInput(input);
    const candidate = await this.getEntity("candidate", parsed.candidateExternalId);
    const job = parsed.jobExternalId ? await this.getEntity("job", parsed.jobExternalId) : null;
    const organizationId = parsed.organizationId ?? job?.organizationId ?? null;
    if (!organizationId) {
      throw new ValidationError(["organizationId is required when the job has no organization"]);
    }

    const record = await withRetry(
      () =>
        this.store.insertApplication({
          id: randomUUID(),
          candidateId: candidate.internalId,
          organizationId,
          jobId: job?.internalId ?? null,
          status: parsed.status,
          appliedAt: this.now().toISOString(),
        }),
      this.backendRetry,
      { shouldRetry: (error) => error instanceof StoreUnavailableError },
    );
    this.logger.info("application.recorded", {
      candidateExternalId: candidate.externalId,
      jobExternalId: job?.externalId ?? null,
      status: record.status,
    });
    return record;
  }

  private async embed(
    canonicalText: string,
    modelVersion: string,
    context: { category: EntityCategory; external_id: string },
  ): Promise<number[]> {
    try {
      const vector = await withRetry(
        () => this.embeddings.embed(canonicalText, modelVersion),
        this.options.embeddingRetry,
        {
          onRetry: (error, attempt, retriesLeft) => {
            this.logger.warn("embedding.retry", {
              category: context.category,
              externalId: context.external_id,
              attempt,
              retriesLeft,
              error: error.message,
            });
          },
        },
      );
      assertDimension(vector, this.index.dimension);
      return vector;
    } catch (error) {
      throw new LifecycleError(`Embedding failed for ${context.category} ${context.external_id}`, error, {
        stage: "embed",
        externalId: context.external_id,
      });
    }
  }

  private async commitMetadata(staged: EntityRecord, previous: EntityRecord | null): Promise<EntityRecord> {
    return withRetry(
      () => (previous ? this.store.updateEntity(staged, previous.version) : this.store.insertEntity(staged)),
      this.backendRetry,
      { shouldRetry: (error) => error instanceof StoreUnavailableError },
    );
  }

  private submitSteps(): Array<SagaStep<SubmitSagaContext>> {
    return [
      {
        name: "upsert_vector",
        execute: async (ctx) => {
          if (ctx.previous?.vectorRef) {
            ctx.priorVector = await this.index.fetch(ctx.previous.vectorRef);
          }
          ctx.staged.vectorRef = await withRetry(
            () =>
              this.index.upsert(ctx.staged.category, ctx.staged.internalId, ctx.vector, buildVectorMetadata(ctx.staged)),
            this.backendRetry,
          );
        },
        compensate: async (ctx) => {
          await this.restoreVector(ctx);
        },
      },
      {
        name: "commit_metadata",
        execute: async (ctx) => {
          ctx.committed = await this.commitMetadata(ctx.staged, ctx.previous);
        },
      },
    ];
  }

  /** Puts the index back in line with whatever metadata row is current. */
  private async restoreVector(ctx: SubmitSagaContext): Promise<void> {
    const current = await this.store.getByExternalId(ctx.staged.category, ctx.staged.externalId);
    if (current && current.version !== (ctx.previous?.version ?? 0)) {
      // Another writer committed in between. The point may now hold this
      // request's vector, so the winning row must not count as embedded.
      if (current.status === "active" && current.embeddingFingerprint !== null) {
        await withRetry(
          () => this.store.updateEntity({ ...current, embeddingFingerprint: null }, current.version),
          this.backendRetry,
          { shouldRetry: (error) => error instanceof StoreUnavailableError },
        );
      }
      this.logger.warn("saga.vector.invalidated", {
        category: current.category,
        internalId: current.internalId,
        version: current.version,
      });
      return;
    }
    const priorVector = ctx.priorVector;
    if (current?.status === "active" && current.vectorRef && priorVector) {
      await withRetry(
        () => this.index.upsert(current.category, current.internalId, priorVector, buildVectorMetadata(current)),
        this.backendRetry,
      );
      return;
    }
    const pointRef = ctx.staged.vectorRef ?? {
      collection: this.index.collectionFor(ctx.staged.category),
      pointId: ctx.staged.internalId,
    };
    await withRetry(() => this.index.delete(pointRef), this.backendRetry);
  }
}
