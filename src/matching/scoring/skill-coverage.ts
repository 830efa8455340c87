import { InvalidWeightsError } from "../../shared/errors";
import { RankingWeights } from "../../shared/types/entity.types";
import { SkillBreakdown } from "../../shared/types/matching.types";

export const DEFAULT_RANKING_WEIGHTS: Readonly<RankingWeights> = Object.freeze({
  similarity: 0.6,
  requiredSkills: 0.3,
  preferredSkills: 0.1,
});

const SIMILARITY_ONLY_WEIGHTS: Readonly<RankingWeights> = Object.freeze({
  similarity: 1,
  requiredSkills: 0,
  preferredSkills: 0,
});

const MAX_SKILL_LENGTH = 50;

const NON_SKILL_PREFIXES = [
  "bachelor",
  "master",
  "phd",
  "currently",
  "experience with",
  "knowledge of",
  "understanding of",
  "strong",
  "excellent",
  "proficiency in",
  "familiarity",
  "ability to",
  "minimum",
  "years of",
  "degree in",
];

export function normalizeSkill(skill: string): string {
  return skill.trim().toLowerCase();
}

/** Long sentences and requirement phrasing copied from job ads are not skills. */
export function isCountableSkill(skill: string): boolean {
  const normalized = normalizeSkill(skill);
  if (!normalized || normalized.length > MAX_SKILL_LENGTH) {
    return false;
  }
  return !NON_SKILL_PREFIXES.some((prefix) => normalized.startsWith(prefix));
}

export function toSkillSet(skills: ReadonlyArray<string>): Set<string> {
  const output = new Set<string>();
  for (const skill of skills) {
    if (isCountableSkill(skill)) {
      output.add(normalizeSkill(skill));
    }
  }
  return output;
}

export function computeSkillBreakdown(
  candidateSkills: ReadonlyArray<string>,
  requiredSkills: ReadonlyArray<string>,
  preferredSkills: ReadonlyArray<string>,
): SkillBreakdown {
  const candidateSet = toSkillSet(candidateSkills);
  const required = splitCoverage(candidateSet, toSkillSet(requiredSkills));
  const preferred = splitCoverage(candidateSet, toSkillSet(preferredSkills));

  return {
    requiredMatched: required.matched,
    requiredMissing: required.missing,
    preferredMatched: preferred.matched,
    preferredMissing: preferred.missing,
    requiredCoverage: required.coverage,
    preferredCoverage: preferred.coverage,
  };
}

function splitCoverage(
  candidateSet: ReadonlySet<string>,
  wanted: ReadonlySet<string>,
): { matched: string[]; missing: string[]; coverage: number } {
  const matched: string[] = [];
  const missing: string[] = [];
  for (const skill of Array.from(wanted).sort()) {
    if (candidateSet.has(skill)) {
      matched.push(skill);
    } else {
      missing.push(skill);
    }
  }
  // No stated requirement imposes no penalty.
  const coverage = wanted.size === 0 ? 1 : matched.length / wanted.size;
  return { matched, missing, coverage };
}

export function validateRankingWeights(weights: RankingWeights): void {
  const entries: Array<[string, number]> = [
    ["similarity", weights.similarity],
    ["requiredSkills", weights.requiredSkills],
    ["preferredSkills", weights.preferredSkills],
  ];
  const invalid = entries.filter(([, value]) => !Number.isFinite(value) || value < 0);
  if (invalid.length > 0) {
    throw new InvalidWeightsError("Ranking weights must be finite numbers >= 0", {
      invalid: invalid.map(([key]) => key),
    });
  }
}

export function normalizeRankingWeights(weights: RankingWeights): Readonly<RankingWeights> {
  validateRankingWeights(weights);
  const total = weights.similarity + weights.requiredSkills + weights.preferredSkills;
  if (total <= 0) {
    return SIMILARITY_ONLY_WEIGHTS;
  }
  return Object.freeze({
    similarity: weights.similarity / total,
    requiredSkills: weights.requiredSkills / total,
    preferredSkills: weights.preferredSkills / total,
  });
}

export function computeCompositeScore(
  similarity: number,
  breakdown: Pick<SkillBreakdown, "requiredCoverage" | "preferredCoverage">,
  normalizedWeights: Readonly<RankingWeights>,
): number {
  return (
    normalizedWeights.similarity * similarity +
    normalizedWeights.requiredSkills * breakdown.requiredCoverage +
    normalizedWeights.preferredSkills * breakdown.preferredCoverage
  );
}

export interface RankableItem {
  internalId: string;
  similarity: number;
  compositeScore: number;
}

export function compareRanked(a: RankableItem, b: RankableItem): number {
  if (b.compositeScore !== a.compositeScore) {
    return b.compositeScore - a.compositeScore;
  }
  if (b.similarity !== a.similarity) {
    return b.similarity - a.similarity;
  }
  return a.internalId < b.internalId ? -1 : a.internalId > b.internalId ? 1 : 0;
}
