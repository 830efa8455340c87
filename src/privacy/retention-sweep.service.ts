import { errorMessage, Logger } from "../config/logger";
import { RetentionConfig } from "../config/env";
import { EntityStore } from "../db/entity-store";
import { VectorIdPage, VectorIndex } from "../matching/vector-index";
import { ENTITY_CATEGORIES, EntityCategory } from "../shared/types/entity.types";
import { KeyedLock } from "../shared/utils/keyed-lock";
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from "../shared/utils/retry";
import { DataDeletionService } from "./data-deletion.service";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CategorySweepReport {
  erased: number;
  failed: number;
  orphansDeleted: number;
}

export interface RetentionSweepReport {
  startedAt: string;
  finishedAt: string;
  categories: Record<EntityCategory, CategorySweepReport>;
  applicationsDeleted: number;
  matchEventsDeleted: number;
}

export class RetentionSweepService {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly store: EntityStore,
    private readonly index: VectorIndex,
    private readonly dataDeletionService: DataDeletionService,
    private readonly logger: Logger,
    private readonly config: RetentionConfig,
    private readonly lock: KeyedLock = new KeyedLock(),
    private readonly retry: RetryPolicy = DEFAULT_RETRY_POLICY,
  ) {}

  /** Returns null when a previous run is still in progress. */
  async runRetentionSweep(now: Date = new Date()): Promise<RetentionSweepReport | null> {
    if (this.running) {
      this.logger.warn("retention.sweep.skipped", { reason: "previous run still in progress" });
      return null;
    }
    this.running = true;
    try {
      return await this.sweep(now);
    } finally {
      this.running = false;
    }
  }

  start(): void {
    if (this.timer) {
      return;
    }
    const intervalMs = this.config.sweepIntervalMinutes * 60_000;
    this.timer = setInterval(() => {
      void this.runRetentionSweep().catch((error) => {
        this.logger.warn("retention.sweep.scheduled_run_failed", {
          error: errorMessage(error),
        });
      });
    }, intervalMs);
    this.timer.unref();
    this.logger.info("Retention sweep scheduler started", {
      intervalMinutes: this.config.sweepIntervalMinutes,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async sweep(now: Date): Promise<RetentionSweepReport> {
    const startedAt = now.toISOString();
    const applicationCutoff = daysBefore(now, this.config.applicationDays);
    const categories: Record<EntityCategory, CategorySweepReport> = {
      job: { erased: 0, failed: 0, orphansDeleted: 0 },
      candidate: { erased: 0, failed: 0, orphansDeleted: 0 },
    };

    for (const category of ENTITY_CATEGORIES) {
      const retentionDays = category === "job" ? this.config.jobDays : this.config.candidateDays;
      const result = await this.sweepCategory(category, daysBefore(now, retentionDays), applicationCutoff);
      categories[category].erased = result.erased;
      categories[category].failed = result.failed;
    }

    const applicationsDeleted = await withRetry(
      () => this.store.deleteApplicationsBefore(applicationCutoff),
      this.retry,
    );
    const matchEventsDeleted = await withRetry(
      () => this.store.deleteMatchEventsBefore(daysBefore(now, this.config.matchEventDays)),
      this.retry,
    );

    for (const category of ENTITY_CATEGORIES) {
      categories[category].orphansDeleted = await this.reconcileOrphans(category);
    }

    const report: RetentionSweepReport = {
      startedAt,
      finishedAt: new Date().toISOString(),
      categories,
      applicationsDeleted,
      matchEventsDeleted,
    };
    this.logger.info("retention.sweep.completed", {
      jobsErased: categories.job.erased,
      candidatesErased: categories.candidate.erased,
      failed: categories.job.failed + categories.candidate.failed,
      orphansDeleted: categories.job.orphansDeleted + categories.candidate.orphansDeleted,
      applicationsDeleted,
      matchEventsDeleted,
    });
    return report;
  }

  private async sweepCategory(
    category: EntityCategory,
    updatedBefore: string,
    applicationsBefore: string,
  ): Promise<{ erased: number; failed: number }> {
    const failedIds: string[] = [];
    let erased = 0;

    for (;;) {
      const batch = await withRetry(
        () =>
          this.store.listRetentionEligible(category, {
            updatedBefore,
            applicationsBefore,
            limit: this.config.batchSize,
            excludeInternalIds: failedIds,
          }),
        this.retry,
      );

      let erasedInBatch = 0;
      for (const record of batch) {
        try {
          const result = await this.dataDeletionService.eraseEntity(category, record.externalId);
          erasedInBatch += 1;
          if (result.status === "erased") {
            this.logger.info("retention.entity_erased", {
              category,
              externalId: record.externalId,
              resumed: record.status === "erasing",
            });
          }
        } catch (error) {
          failedIds.push(record.internalId);
          this.logger.warn("retention.entity_erase_failed", {
            category,
            externalId: record.externalId,
            error: errorMessage(error),
          });
        }
      }
      erased += erasedInBatch;

      if (batch.length < this.config.batchSize || erasedInBatch === 0) {
        break;
      }
    }

    return { erased, failed: failedIds.length };
  }

  /** Deletes index points that have no metadata row. */
  private async reconcileOrphans(category: EntityCategory): Promise<number> {
    let cursor: string | null = null;
    let deleted = 0;
    do {
      const page: VectorIdPage = await withRetry(
        () => this.index.listInternalIds(category, cursor, this.config.batchSize),
        this.retry,
      );
      const rows = await withRetry(() => this.store.getManyByInternalIds(category, page.ids), this.retry);
      const known = new Set(rows.map((row) => row.internalId));

      for (const internalId of page.ids) {
        if (known.has(internalId)) {
          continue;
        }
        const removed = await this.lock.run(internalId, async () => {
          // A submit may have committed its row since the page was read.
          const [row] = await this.store.getManyByInternalIds(category, [internalId]);
          if (row) {
            return false;
          }
          const ref = { collection: this.index.collectionFor(category), pointId: internalId };
          return (await withRetry(() => this.index.delete(ref), this.retry)) === "ok";
        });
        if (removed) {
          deleted += 1;
          this.logger.info("retention.orphan_vector_deleted", { category, internalId });
        }
      }
      cursor = page.nextCursor;
    } while (cursor);

    return deleted;
  }
}

function daysBefore(now: Date, days: number): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString();
}
