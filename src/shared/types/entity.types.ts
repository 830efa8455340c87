export type EntityCategory = "job" | "candidate";

export const ENTITY_CATEGORIES: ReadonlyArray<EntityCategory> = ["job", "candidate"];

export type EducationLevel = "none" | "high_school" | "associate" | "bachelor" | "master" | "phd";

export const EDUCATION_LEVELS: ReadonlyArray<EducationLevel> = [
  "none",
  "high_school",
  "associate",
  "bachelor",
  "master",
  "phd",
];

export type EntityStatus = "active" | "erasing";

export interface CanonicalAttributes {
  skills: string[];
  requiredSkills: string[];
  preferredSkills: string[];
  experienceYears: number;
  educationLevel: EducationLevel;
  locationPreferences: string[];
  jobTypes: string[];
}

export interface VectorRef {
  collection: string;
  pointId: string;
}

export interface EntityRecord {
  category: EntityCategory;
  externalId: string;
  internalId: string;
  organizationId: string | null;
  title: string;
  attributes: CanonicalAttributes;
  vectorRef: VectorRef | null;
  embeddingFingerprint: string | null;
  embeddingModel: string | null;
  status: EntityStatus;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface EntitySubmission {
  category: EntityCategory;
  externalId: string;
  organizationId?: string | null;
  title: string;
  attributes: CanonicalAttributes;
}

export interface RankingWeights {
  similarity: number;
  requiredSkills: number;
  preferredSkills: number;
}

export interface OrganizationRecord {
  externalId: string;
  name: string;
  scoringWeights: RankingWeights | null;
  createdAt: string;
  updatedAt: string;
}

export type ApplicationStatus = "applied" | "reviewed" | "interviewed" | "rejected" | "accepted";

export const APPLICATION_STATUSES: ReadonlyArray<ApplicationStatus> = [
  "applied",
  "reviewed",
  "interviewed",
  "rejected",
  "accepted",
];

export interface ApplicationRecord {
  id: string;
  candidateId: string;
  organizationId: string;
  jobId: string | null;
  status: ApplicationStatus;
  appliedAt: string;
}

export interface MatchEventRecord {
  id: string;
  queryCategory: EntityCategory;
  queryId: string;
  resultId: string;
  similarity: number;
  compositeScore: number;
  rank: number;
  requestedBy: string | null;
  createdAt: string;
}

export function counterpartOf(category: EntityCategory): EntityCategory {
  return category === "job" ? "candidate" : "job";
}
