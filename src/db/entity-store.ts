import {
  ApplicationRecord,
  EntityCategory,
  EntityRecord,
  MatchEventRecord,
  OrganizationRecord,
} from "../shared/types/entity.types";

export interface RetentionSelection {
  /** Entities last updated before this instant are eligible. */
  updatedBefore: string;
  /** So are entities whose most recent application predates this instant. */
  applicationsBefore: string;
  limit: number;
  excludeInternalIds?: ReadonlyArray<string>;
}

export interface CascadeDeletion {
  entityDeleted: boolean;
  applications: number;
  matchEvents: number;
}

/**
 * Relational metadata store. Every multi-row write is atomic; entity writes
 * are compare-and-set on `version`.
 */
export interface EntityStore {
  /** Returns tombstoned (`erasing`) rows as well; callers decide visibility. */
  getByExternalId(category: EntityCategory, externalId: string): Promise<EntityRecord | null>;
  getManyByInternalIds(category: EntityCategory, internalIds: ReadonlyArray<string>): Promise<EntityRecord[]>;
  /** Throws ConcurrentModificationError when the external id already exists. */
  insertEntity(record: EntityRecord): Promise<EntityRecord>;
  /** Writes `record` with version `expectedVersion + 1`; throws ConcurrentModificationError on a stale version. */
  updateEntity(record: EntityRecord, expectedVersion: number): Promise<EntityRecord>;
  /** Deletes the entity with its applications and match events in one transaction. */
  eraseEntityCascade(category: EntityCategory, internalId: string): Promise<CascadeDeletion>;
  /** Tombstoned rows first, then rows selected by the retention predicate; ordered by internal id. */
  listRetentionEligible(category: EntityCategory, selection: RetentionSelection): Promise<EntityRecord[]>;

  getOrganization(externalId: string): Promise<OrganizationRecord | null>;
  upsertOrganization(record: OrganizationRecord): Promise<OrganizationRecord>;

  insertApplication(record: ApplicationRecord): Promise<ApplicationRecord>;
  listApplicationsForEntity(category: EntityCategory, internalId: string): Promise<ApplicationRecord[]>;
  deleteApplicationsBefore(cutoff: string): Promise<number>;

  insertMatchEvents(events: ReadonlyArray<MatchEventRecord>): Promise<void>;
  listMatchEventsForEntity(internalId: string): Promise<MatchEventRecord[]>;
  deleteMatchEventsBefore(cutoff: string): Promise<number>;
}
