import { CanonicalAttributes, EDUCATION_LEVELS, EducationLevel } from "../../shared/types/entity.types";
import { MatchInsights, SkillBreakdown } from "../../shared/types/matching.types";

const MAX_LISTED_SKILLS = 5;
const MAX_LEARNING_SUGGESTIONS = 3;
const MAX_LEARNABLE_SKILL_LENGTH = 30;
const REMOTE = "remote";

/**
 * Rule-based notes on a job/candidate pair beyond skill coverage. They do not
 * feed the composite score.
 */
export function computeMatchInsights(
  job: CanonicalAttributes,
  candidate: CanonicalAttributes,
  breakdown: SkillBreakdown,
): MatchInsights {
  const jobLocations = normalizeAll(job.locationPreferences);
  const candidateLocations = normalizeAll(candidate.locationPreferences);
  const jobTypes = normalizeAll(job.jobTypes);
  const candidateJobTypes = normalizeAll(candidate.jobTypes);

  const educationMatch = meetsEducation(candidate.educationLevel, job.educationLevel);
  const sharedLocation = candidateLocations.find((wanted) => jobLocations.some((offered) => offered.includes(wanted)));
  const remoteOffered = jobLocations.includes(REMOTE);
  const locationMatch =
    candidateLocations.length === 0 || jobLocations.length === 0 || remoteOffered || sharedLocation !== undefined;
  const sharedJobType = candidateJobTypes.find((wanted) => jobTypes.includes(wanted));
  const jobTypeMatch = candidateJobTypes.length === 0 || jobTypes.length === 0 || sharedJobType !== undefined;

  const recommendedBecause: string[] = [];
  if (breakdown.requiredMatched.length > 0) {
    recommendedBecause.push(`Strong skill match: ${breakdown.requiredMatched.slice(0, MAX_LISTED_SKILLS).join(", ")}`);
  } else if (breakdown.preferredMatched.length > 0) {
    recommendedBecause.push(`Relevant skills: ${breakdown.preferredMatched.slice(0, MAX_LISTED_SKILLS).join(", ")}`);
  }
  if (job.educationLevel !== "none" && educationMatch) {
    recommendedBecause.push(`Education meets the ${formatLevel(job.educationLevel)} requirement`);
  }
  if (jobLocations.length > 0 && candidateLocations.length > 0) {
    if (sharedLocation !== undefined) {
      recommendedBecause.push(`Location preference matches: ${sharedLocation}`);
    } else if (remoteOffered) {
      recommendedBecause.push("Remote work option available");
    }
  }
  if (sharedJobType !== undefined) {
    recommendedBecause.push(`Job type matches preference: ${sharedJobType}`);
  }
  const requiredTotal = breakdown.requiredMatched.length + breakdown.requiredMissing.length;
  if (requiredTotal > 0 && breakdown.requiredCoverage >= 0.5) {
    recommendedBecause.push(`${Math.round(breakdown.requiredCoverage * 100)}% required skill coverage`);
  }
  if (recommendedBecause.length === 0) {
    recommendedBecause.push("Profile aligns with position requirements");
  }

  const developmentAreas = breakdown.requiredMissing
    .filter((skill) => skill.length < MAX_LEARNABLE_SKILL_LENGTH)
    .slice(0, MAX_LEARNING_SUGGESTIONS)
    .map((skill) => `Consider learning ${skill}`);
  if (job.experienceYears > candidate.experienceYears) {
    developmentAreas.push(`Gain experience: ${job.experienceYears} years may be required`);
  }
  if (developmentAreas.length === 0) {
    developmentAreas.push("Strong match with minimal gaps");
  }

  return { educationMatch, locationMatch, jobTypeMatch, recommendedBecause, developmentAreas };
}

export function meetsEducation(candidateLevel: EducationLevel, requiredLevel: EducationLevel): boolean {
  return EDUCATION_LEVELS.indexOf(candidateLevel) >= EDUCATION_LEVELS.indexOf(requiredLevel);
}

function formatLevel(level: EducationLevel): string {
  return level.replace("_", " ");
}

function normalizeAll(values: ReadonlyArray<string>): string[] {
  return values.map((value) => value.trim().toLowerCase()).filter(Boolean);
}
