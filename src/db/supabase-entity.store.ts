import { Logger } from "../config/logger";
import {
  ApplicationRecord,
  EntityCategory,
  EntityRecord,
  MatchEventRecord,
  OrganizationRecord,
} from "../shared/types/entity.types";
import { CascadeDeletion, EntityStore, RetentionSelection } from "./entity-store";
import { ApplicationsRepository } from "./repositories/applications.repo";
import { EntitiesRepository } from "./repositories/entities.repo";
import { MatchEventsRepository } from "./repositories/match-events.repo";
import { OrganizationsRepository } from "./repositories/organizations.repo";
import { SupabaseRestClient } from "./supabase.client";

export class SupabaseEntityStore implements EntityStore {
  private readonly entities: EntitiesRepository;
  private readonly organizations: OrganizationsRepository;
  private readonly applications: ApplicationsRepository;
  private readonly matchEvents: MatchEventsRepository;

  constructor(supabaseClient: SupabaseRestClient, logger: Logger) {
    this.entities = new EntitiesRepository(supabaseClient, logger);
    this.organizations = new OrganizationsRepository(supabaseClient, logger);
    this.applications = new ApplicationsRepository(supabaseClient, logger);
    this.matchEvents = new MatchEventsRepository(supabaseClient, logger);
  }

  getByExternalId(category: EntityCategory, externalId: string): Promise<EntityRecord | null> {
    return this.entities.getByExternalId(category, externalId);
  }

  getManyByInternalIds(category: EntityCategory, internalIds: ReadonlyArray<string>): Promise<EntityRecord[]> {
    return this.entities.getManyByInternalIds(category, internalIds);
  }

  insertEntity(record: EntityRecord): Promise<EntityRecord> {
    return this.entities.insert(record);
  }

  updateEntity(record: EntityRecord, expectedVersion: number): Promise<EntityRecord> {
    return this.entities.updateVersioned(record, expectedVersion);
  }

  eraseEntityCascade(category: EntityCategory, internalId: string): Promise<CascadeDeletion> {
    return this.entities.eraseCascade(category, internalId);
  }

  listRetentionEligible(category: EntityCategory, selection: RetentionSelection): Promise<EntityRecord[]> {
    return this.entities.listRetentionEligible(category, selection);
  }

  getOrganization(externalId: string): Promise<OrganizationRecord | null> {
    return this.organizations.getByExternalId(externalId);
  }

  upsertOrganization(record: OrganizationRecord): Promise<OrganizationRecord> {
    return this.organizations.upsert(record);
  }

  insertApplication(record: ApplicationRecord): Promise<ApplicationRecord> {
    return this.applications.insert(record);
  }

  listApplicationsForEntity(category: EntityCategory, internalId: string): Promise<ApplicationRecord[]> {
    return this.applications.listForEntity(category, internalId);
  }

  deleteApplicationsBefore(cutoff: string): Promise<number> {
    return this.applications.deleteBefore(cutoff);
  }

  insertMatchEvents(events: ReadonlyArray<MatchEventRecord>): Promise<void> {
    return this.matchEvents.insertMany(events);
  }

  listMatchEventsForEntity(internalId: string): Promise<MatchEventRecord[]> {
    return this.matchEvents.listForEntity(internalId);
  }

  deleteMatchEventsBefore(cutoff: string): Promise<number> {
    return this.matchEvents.deleteBefore(cutoff);
  }
}
