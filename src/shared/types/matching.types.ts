import { EducationLevel, EntityCategory, RankingWeights } from "./entity.types";

export interface SkillBreakdown {
  requiredMatched: string[];
  requiredMissing: string[];
  preferredMatched: string[];
  preferredMissing: string[];
  requiredCoverage: number;
  preferredCoverage: number;
}

export interface MatchInsights {
  educationMatch: boolean;
  locationMatch: boolean;
  jobTypeMatch: boolean;
  recommendedBecause: string[];
  developmentAreas: string[];
}

export interface MatchExplanation {
  summary: string;
  highlights: string[];
  source: "gateway" | "template";
}

export interface MatchResult {
  queryEntityId: string;
  candidateEntityId: string;
  externalId: string;
  title: string;
  similarity: number;
  skillCoverage: {
    required: number;
    preferred: number;
  };
  breakdown: SkillBreakdown;
  insights: MatchInsights;
  compositeScore: number;
  rank: number;
  explanation?: MatchExplanation;
}

export interface MatchFilters {
  educationLevels?: EducationLevel[];
  locations?: string[];
  jobTypes?: string[];
  /** Any of these owning organizations. */
  organizationIds?: string[];
}

export interface MatchRequest {
  category: EntityCategory;
  externalId: string;
  topK?: number;
  minSimilarity?: number;
  weights?: RankingWeights;
  filters?: MatchFilters;
  explain?: boolean;
  requestedBy?: string;
  signal?: AbortSignal;
}

export type MatchStage =
  | "QueryResolved"
  | "CandidatesRetrieved"
  | "Scored"
  | "Ranked"
  | "Explained"
  | "Returned";

export interface MatchResponse {
  query: {
    category: EntityCategory;
    externalId: string;
    internalId: string;
  };
  weights: RankingWeights;
  retrievedCount: number;
  scoredCount: number;
  results: MatchResult[];
}
