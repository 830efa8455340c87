import { createHash } from "node:crypto";
import { ValidationError } from "../shared/errors";
import {
  APPLICATION_STATUSES,
  ApplicationStatus,
  CanonicalAttributes,
  EDUCATION_LEVELS,
  EducationLevel,
  ENTITY_CATEGORIES,
  EntityCategory,
  EntitySubmission,
  RankingWeights,
} from "../shared/types/entity.types";
import { MatchFilters } from "../shared/types/matching.types";

const MAX_LIST_ITEMS = 100;
const MAX_TEXT = 500;
const MAX_EXTERNAL_ID = 255;
const MAX_CANONICAL_TEXT = 6000;
const INTERNAL_ID_NAMESPACE = "skillmatch.entity.v1";

export function parseEntitySubmission(category: EntityCategory, raw: unknown): EntitySubmission {
  const source = isRecord(raw) ? raw : {};
  const issues: string[] = [];

  const externalId = toText(source.externalId);
  if (!externalId) {
    issues.push("externalId is required");
  } else if (externalId.length > MAX_EXTERNAL_ID) {
    issues.push(`externalId must be at most ${MAX_EXTERNAL_ID} characters`);
  }

  const title = toText(source.title);
  if (!title) {
    issues.push("title is required");
  }

  const organizationId = toText(source.organizationId);
  if (organizationId && category !== "job") {
    issues.push("organizationId is only allowed on jobs");
  }

  const attributes = parseCanonicalAttributes(source.attributes, issues);
  if (category === "candidate" && attributes.skills.length === 0) {
    issues.push("attributes.skills must contain at least one skill for candidates");
  }

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return {
    category,
    externalId,
    organizationId: organizationId || null,
    title: title.slice(0, MAX_TEXT),
    attributes,
  };
}

/** Lenient read of attributes already persisted by this service. */
export function readStoredAttributes(raw: unknown): CanonicalAttributes {
  return parseCanonicalAttributes(raw, []);
}

function parseCanonicalAttributes(raw: unknown, issues: string[]): CanonicalAttributes {
  if (!isRecord(raw)) {
    issues.push("attributes must be an object");
    return emptyAttributes();
  }

  const experienceYears = raw.experienceYears === undefined ? 0 : raw.experienceYears;
  if (typeof experienceYears !== "number" || !Number.isFinite(experienceYears) || experienceYears < 0) {
    issues.push("attributes.experienceYears must be a number >= 0");
  }

  const educationRaw = raw.educationLevel === undefined ? "none" : raw.educationLevel;
  const educationLevel = toEducationLevel(educationRaw);
  if (!educationLevel) {
    issues.push(`attributes.educationLevel must be one of ${EDUCATION_LEVELS.join(", ")}`);
  }

  return {
    skills: toSkillList(raw.skills, "attributes.skills", issues),
    requiredSkills: toSkillList(raw.requiredSkills, "attributes.requiredSkills", issues),
    preferredSkills: toSkillList(raw.preferredSkills, "attributes.preferredSkills", issues),
    experienceYears: typeof experienceYears === "number" && Number.isFinite(experienceYears) ? experienceYears : 0,
    educationLevel: educationLevel ?? "none",
    locationPreferences: toSkillList(raw.locationPreferences, "attributes.locationPreferences", issues),
    jobTypes: toSkillList(raw.jobTypes, "attributes.jobTypes", issues),
  };
}

export function parseRankingWeights(raw: unknown): RankingWeights | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ValidationError(["weights must be an object"]);
  }
  const read = (key: keyof RankingWeights): number => {
    const value = raw[key];
    return typeof value === "number" ? value : Number.NaN;
  };
  // Range checks happen in the engine so that direct callers get the same errors.
  return {
    similarity: read("similarity"),
    requiredSkills: read("requiredSkills"),
    preferredSkills: read("preferredSkills"),
  };
}

export function parseMatchFilters(raw: unknown): MatchFilters | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ValidationError(["filters must be an object"]);
  }
  const issues: string[] = [];
  const filters: MatchFilters = {};
  if (raw.educationLevels !== undefined) {
    const levels = Array.isArray(raw.educationLevels) ? raw.educationLevels : [];
    const parsed = levels.map(toEducationLevel);
    if (!Array.isArray(raw.educationLevels) || parsed.some((item) => item === null)) {
      issues.push(`filters.educationLevels must contain only ${EDUCATION_LEVELS.join(", ")}`);
    } else {
      filters.educationLevels = parsed.filter((item): item is EducationLevel => item !== null);
    }
  }
  if (raw.locations !== undefined) {
    filters.locations = toSkillList(raw.locations, "filters.locations", issues);
  }
  if (raw.jobTypes !== undefined) {
    filters.jobTypes = toSkillList(raw.jobTypes, "filters.jobTypes", issues);
  }
  const organizationIds = raw.organizationIds === undefined ? [] : toIdList(raw.organizationIds, issues);
  const organizationId = toText(raw.organizationId);
  if (organizationId && !organizationIds.includes(organizationId)) {
    organizationIds.push(organizationId);
  }
  if (organizationIds.length > 0) {
    filters.organizationIds = organizationIds;
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return filters;
}

export interface OrganizationInput {
  externalId: string;
  name: string;
  scoringWeights: RankingWeights | null;
}

export function parseOrganizationInput(raw: unknown): OrganizationInput {
  const source = isRecord(raw) ? raw : {};
  const issues: string[] = [];
  const externalId = toText(source.externalId);
  if (!externalId) {
    issues.push("externalId is required");
  } else if (externalId.length > MAX_EXTERNAL_ID) {
    issues.push(`externalId must be at most ${MAX_EXTERNAL_ID} characters`);
  }
  const name = toText(source.name);
  if (!name) {
    issues.push("name is required");
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return {
    externalId,
    name: name.slice(0, MAX_TEXT),
    scoringWeights: parseRankingWeights(source.scoringWeights) ?? null,
  };
}

export interface ApplicationInput {
  candidateExternalId: string;
  jobExternalId: string | null;
  organizationId: string | null;
  status: ApplicationStatus;
}

export function parseApplicationInput(raw: unknown): ApplicationInput {
  const source = isRecord(raw) ? raw : {};
  const candidateExternalId = toText(source.candidateExternalId);
  const jobExternalId = toText(source.jobExternalId);
  const organizationId = toText(source.organizationId);
  const issues: string[] = [];
  if (!candidateExternalId) {
    issues.push("candidateExternalId is required");
  }
  if (!jobExternalId && !organizationId) {
    issues.push("either jobExternalId or organizationId is required");
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return {
    candidateExternalId,
    jobExternalId: jobExternalId || null,
    organizationId: organizationId || null,
    status: parseApplicationStatus(source.status),
  };
}

export function parseCategory(raw: string): EntityCategory {
  const normalized = raw.trim().toLowerCase();
  const singular = normalized.endsWith("s") ? normalized.slice(0, -1) : normalized;
  const category = ENTITY_CATEGORIES.find((item) => item === singular);
  if (!category) {
    throw new ValidationError([`unknown category: ${raw}`]);
  }
  return category;
}

export function parseApplicationStatus(raw: unknown): ApplicationStatus {
  if (raw === undefined) {
    return "applied";
  }
  const status = APPLICATION_STATUSES.find((item) => item === raw);
  if (!status) {
    throw new ValidationError([`status must be one of ${APPLICATION_STATUSES.join(", ")}`]);
  }
  return status;
}

export function buildCanonicalText(submission: Pick<EntitySubmission, "category" | "title" | "attributes">): string {
  const attributes = submission.attributes;
  return [
    submission.category === "job" ? `Job: ${submission.title}` : `Candidate: ${submission.title}`,
    attributes.skills.length ? `Skills: ${attributes.skills.join(", ")}` : "",
    attributes.requiredSkills.length ? `Required skills: ${attributes.requiredSkills.join(", ")}` : "",
    attributes.preferredSkills.length ? `Preferred skills: ${attributes.preferredSkills.join(", ")}` : "",
    `Experience: ${attributes.experienceYears} years`,
    `Education: ${attributes.educationLevel}`,
    attributes.locationPreferences.length ? `Locations: ${attributes.locationPreferences.join(", ")}` : "",
    attributes.jobTypes.length ? `Job types: ${attributes.jobTypes.join(", ")}` : "",
  ]
    .filter((item) => Boolean(item))
    .join("\n")
    .slice(0, MAX_CANONICAL_TEXT);
}

export function computeEmbeddingFingerprint(modelVersion: string, canonicalText: string): string {
  return createHash("sha256").update(`${modelVersion}\n${canonicalText}`).digest("hex");
}

/**
 * Internal ids are a name-based UUID of (category, externalId), so the vector
 * point of an entity can be addressed even after its metadata row is gone.
 */
export function deriveInternalId(category: EntityCategory, externalId: string): string {
  const hex = createHash("sha256")
    .update(`${INTERNAL_ID_NAMESPACE}:${category}:${externalId}`)
    .digest("hex")
    .slice(0, 32);
  const variant = ((parseInt(hex[16] ?? "0", 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

function emptyAttributes(): CanonicalAttributes {
  return {
    skills: [],
    requiredSkills: [],
    preferredSkills: [],
    experienceYears: 0,
    educationLevel: "none",
    locationPreferences: [],
    jobTypes: [],
  };
}

/** Opaque ids keep their case. */
function toIdList(value: unknown, issues: string[]): string[] {
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string" || !item.trim())) {
    issues.push("filters.organizationIds must be an array of non-empty strings");
    return [];
  }
  const ids = value.filter((item): item is string => typeof item === "string").map((item) => item.trim());
  return Array.from(new Set(ids));
}

function toSkillList(value: unknown, field: string, issues: string[]): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    issues.push(`${field} must be an array of strings`);
    return [];
  }
  const output: string[] = [];
  for (const item of value) {
    if (typeof item !== "string" || !item.trim()) {
      issues.push(`${field} must contain only non-empty strings`);
      return [];
    }
    const trimmed = item.trim().slice(0, MAX_TEXT);
    if (!output.some((existing) => existing.toLowerCase() === trimmed.toLowerCase())) {
      output.push(trimmed);
    }
  }
  if (output.length > MAX_LIST_ITEMS) {
    issues.push(`${field} must contain at most ${MAX_LIST_ITEMS} items`);
  }
  return output;
}

function toEducationLevel(value: unknown): EducationLevel | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  return EDUCATION_LEVELS.find((item) => item === normalized) ?? null;
}

function toText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
