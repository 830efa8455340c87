import { CascadeDeletion, EntityStore, RetentionSelection } from "../db/entity-store";
import { ConcurrentModificationError } from "../shared/errors";
import {
  ApplicationRecord,
  EntityCategory,
  EntityRecord,
  MatchEventRecord,
  OrganizationRecord,
} from "../shared/types/entity.types";

/**
 * Process-local EntityStore. Used when Supabase is not configured and as the
 * store stand-in for tests. Records are cloned on the way in and out.
 */
export class InMemoryEntityStore implements EntityStore {
  private readonly entities = new Map<string, EntityRecord>();
  private readonly organizations = new Map<string, OrganizationRecord>();
  private readonly applications = new Map<string, ApplicationRecord>();
  private readonly matchEvents = new Map<string, MatchEventRecord>();

  async getByExternalId(category: EntityCategory, externalId: string): Promise<EntityRecord | null> {
    for (const record of this.entities.values()) {
      if (record.category === category && record.externalId === externalId) {
        return clone(record);
      }
    }
    return null;
  }

  async getManyByInternalIds(
    category: EntityCategory,
    internalIds: ReadonlyArray<string>,
  ): Promise<EntityRecord[]> {
    const output: EntityRecord[] = [];
    for (const id of new Set(internalIds)) {
      const record = this.entities.get(id);
      if (record && record.category === category) {
        output.push(clone(record));
      }
    }
    return output;
  }

  async insertEntity(record: EntityRecord): Promise<EntityRecord> {
    const existing = await this.getByExternalId(record.category, record.externalId);
    if (existing || this.entities.has(record.internalId)) {
      throw new ConcurrentModificationError(record.category, record.externalId, 0);
    }
    const stored = { ...clone(record), version: 1 };
    this.entities.set(record.internalId, stored);
    return clone(stored);
  }

  async updateEntity(record: EntityRecord, expectedVersion: number): Promise<EntityRecord> {
    const current = this.entities.get(record.internalId);
    if (!current || current.version !== expectedVersion) {
      throw new ConcurrentModificationError(record.category, record.externalId, expectedVersion);
    }
    const stored = { ...clone(record), version: expectedVersion + 1 };
    this.entities.set(record.internalId, stored);
    return clone(stored);
  }

  async eraseEntityCascade(category: EntityCategory, internalId: string): Promise<CascadeDeletion> {
    let applications = 0;
    for (const [id, application] of this.applications) {
      if (application.candidateId === internalId || application.jobId === internalId) {
        this.applications.delete(id);
        applications += 1;
      }
    }
    let matchEvents = 0;
    for (const [id, event] of this.matchEvents) {
      if (event.queryId === internalId || event.resultId === internalId) {
        this.matchEvents.delete(id);
        matchEvents += 1;
      }
    }
    const record = this.entities.get(internalId);
    const entityDeleted = Boolean(record && record.category === category);
    if (entityDeleted) {
      this.entities.delete(internalId);
    }
    return { entityDeleted, applications, matchEvents };
  }

  async listRetentionEligible(
    category: EntityCategory,
    selection: RetentionSelection,
  ): Promise<EntityRecord[]> {
    const excluded = new Set(selection.excludeInternalIds ?? []);
    const candidates = Array.from(this.entities.values()).filter(
      (record) => record.category === category && !excluded.has(record.internalId),
    );
    const tombstoned = candidates.filter((record) => record.status === "erasing");
    const expired = candidates.filter(
      (record) => {
        if (record.status !== "active") {
          return false;
        }
        const lastApplied = this.lastAppliedAt(record.internalId);
        return (
          record.updatedAt < selection.updatedBefore ||
          (lastApplied !== null && lastApplied < selection.applicationsBefore)
        );
      },
    );
    return [...sortById(tombstoned), ...sortById(expired)].slice(0, selection.limit).map(clone);
  }

  async getOrganization(externalId: string): Promise<OrganizationRecord | null> {
    const record = this.organizations.get(externalId);
    return record ? clone(record) : null;
  }

  async upsertOrganization(record: OrganizationRecord): Promise<OrganizationRecord> {
    const existing = this.organizations.get(record.externalId);
    const stored = existing ? { ...clone(record), createdAt: existing.createdAt } : clone(record);
    this.organizations.set(record.externalId, stored);
    return clone(stored);
  }

  async insertApplication(record: ApplicationRecord): Promise<ApplicationRecord> {
    this.applications.set(record.id, clone(record));
    return clone(record);
  }

  async listApplicationsForEntity(category: EntityCategory, internalId: string): Promise<ApplicationRecord[]> {
    return Array.from(this.applications.values())
      .filter((item) => (category === "candidate" ? item.candidateId === internalId : item.jobId === internalId))
      .map(clone);
  }

  async deleteApplicationsBefore(cutoff: string): Promise<number> {
    let deleted = 0;
    for (const [id, application] of this.applications) {
      if (application.appliedAt < cutoff) {
        this.applications.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  async insertMatchEvents(events: ReadonlyArray<MatchEventRecord>): Promise<void> {
    for (const event of events) {
      this.matchEvents.set(event.id, clone(event));
    }
  }

  async listMatchEventsForEntity(internalId: string): Promise<MatchEventRecord[]> {
    return Array.from(this.matchEvents.values())
      .filter((event) => event.queryId === internalId || event.resultId === internalId)
      .map(clone);
  }

  async deleteMatchEventsBefore(cutoff: string): Promise<number> {
    let deleted = 0;
    for (const [id, event] of this.matchEvents) {
      if (event.createdAt < cutoff) {
        this.matchEvents.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  /** All entity rows, for consistency checks. */
  snapshot(): EntityRecord[] {
    return sortById(Array.from(this.entities.values())).map(clone);
  }

  private lastAppliedAt(internalId: string): string | null {
    let latest: string | null = null;
    for (const application of this.applications.values()) {
      if (
        (application.candidateId === internalId || application.jobId === internalId) &&
        (latest === null || application.appliedAt > latest)
      ) {
        latest = application.appliedAt;
      }
    }
    return latest;
  }
}

function sortById(records: EntityRecord[]): EntityRecord[] {
  return [...records].sort((a, b) => (a.internalId < b.internalId ? -1 : a.internalId > b.internalId ? 1 : 0));
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
