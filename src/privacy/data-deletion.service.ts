import { errorMessage, Logger } from "../config/logger";
import { EntityStore } from "../db/entity-store";
import { entityLockKey } from "../lifecycle/entity-lifecycle.service";
import { VectorIndex } from "../matching/vector-index";
import { deriveInternalId } from "../profiles/entity.schemas";
import {
  ConcurrentModificationError,
  ErasureIncompleteError,
  MatchingCoreError,
  StoreUnavailableError,
} from "../shared/errors";
import { EntityCategory, EntityRecord, VectorRef } from "../shared/types/entity.types";
import { KeyedLock } from "../shared/utils/keyed-lock";
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from "../shared/utils/retry";

const TOMBSTONE_ATTEMPTS = 3;

export type ErasureResult =
  | {
      status: "erased";
      internalId: string;
      deleted: { applications: number; matchEvents: number };
    }
  | { status: "not_found" };

export interface DataDeletionOptions {
  retry?: RetryPolicy;
  now?: () => Date;
}

/**
 * Right-to-erasure for one entity. The row is tombstoned first so that a
 * crash between the two stores leaves something the retention sweep resumes.
 */
export class DataDeletionService {
  private readonly retry: RetryPolicy;
  private readonly now: () => Date;

  constructor(
    private readonly store: EntityStore,
    private readonly index: VectorIndex,
    private readonly logger: Logger,
    options: DataDeletionOptions = {},
    private readonly lock: KeyedLock = new KeyedLock(),
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
  }

  async eraseEntity(category: EntityCategory, externalId: string): Promise<ErasureResult> {
    return this.lock.run(entityLockKey(category, externalId), () => this.erase(category, externalId));
  }

  private async erase(category: EntityCategory, externalId: string): Promise<ErasureResult> {
    const record = await withRetry(() => this.store.getByExternalId(category, externalId), this.retry);
    const derivedRef: VectorRef = {
      collection: this.index.collectionFor(category),
      pointId: record?.internalId ?? deriveInternalId(category, externalId),
    };

    if (!record) {
      // A create that failed before its metadata commit can leave this point behind.
      try {
        await withRetry(() => this.index.delete(derivedRef), this.retry);
      } catch (error) {
        throw this.incomplete(category, externalId, "delete_vector", error);
      }
      this.logger.info("privacy.entity_not_found", { category, externalId });
      return { status: "not_found" };
    }

    let stage = "tombstone";
    try {
      const tombstoned = record.status === "erasing" ? record : await this.markErasing(record);

      stage = "delete_vector";
      await withRetry(() => this.index.delete(tombstoned.vectorRef ?? derivedRef), this.retry);

      stage = "delete_metadata";
      const deleted = await withRetry(
        () => this.store.eraseEntityCascade(category, tombstoned.internalId),
        this.retry,
      );

      this.logger.info("privacy.entity_erased", {
        category,
        externalId,
        applications: deleted.applications,
        matchEvents: deleted.matchEvents,
      });
      return {
        status: "erased",
        internalId: tombstoned.internalId,
        deleted: { applications: deleted.applications, matchEvents: deleted.matchEvents },
      };
    } catch (error) {
      throw this.incomplete(category, externalId, stage, error);
    }
  }

  private incomplete(
    category: EntityCategory,
    externalId: string,
    stage: string,
    error: unknown,
  ): ErasureIncompleteError {
    this.logger.error("privacy.erasure_incomplete", {
      category,
      externalId,
      stage,
      error: errorMessage(error),
      errorCode: error instanceof MatchingCoreError ? error.code : undefined,
    });
    return new ErasureIncompleteError(`Erasure of ${category} ${externalId} did not complete at ${stage}`, {
      category,
      externalId,
      stage,
    });
  }

  private async markErasing(record: EntityRecord): Promise<EntityRecord> {
    let current = record;
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await withRetry(
          () =>
            this.store.updateEntity(
              { ...current, status: "erasing", updatedAt: this.now().toISOString() },
              current.version,
            ),
          this.retry,
          { shouldRetry: (error) => error instanceof StoreUnavailableError },
        );
      } catch (error) {
        if (!(error instanceof ConcurrentModificationError) || attempt >= TOMBSTONE_ATTEMPTS) {
          throw error;
        }
        const latest = await this.store.getByExternalId(record.category, record.externalId);
        if (!latest) {
          // Erased by another process; nothing left to tombstone.
          return { ...current, status: "erasing" };
        }
        if (latest.status === "erasing") {
          return latest;
        }
        current = latest;
      }
    }
  }
}
