import assert from "node:assert/strict";
import test from "node:test";
import { buildTemplateExplanation } from "../../matching/matching-explanation.service";
import { computeMatchInsights, meetsEducation } from "../../matching/scoring/match-insights";
import { computeSkillBreakdown } from "../../matching/scoring/skill-coverage";
import { attributes } from "../helpers/fixtures";

test("explains why a well-aligned pair was recommended", () => {
  const job = attributes({
    requiredSkills: ["Python", "Docker", "Kubernetes"],
    educationLevel: "bachelor",
    locationPreferences: ["Berlin", "Remote"],
    jobTypes: ["full-time"],
    experienceYears: 5,
  });
  const candidate = attributes({
    skills: ["python", "docker"],
    educationLevel: "master",
    locationPreferences: ["berlin"],
    jobTypes: ["Full-Time"],
    experienceYears: 2,
  });
  const breakdown = computeSkillBreakdown(candidate.skills, job.requiredSkills, job.preferredSkills);

  assert.deepEqual(computeMatchInsights(job, candidate, breakdown), {
    educationMatch: true,
    locationMatch: true,
    jobTypeMatch: true,
    recommendedBecause: [
      "Strong skill match: docker, python",
      "Education meets the bachelor requirement",
      "Location preference matches: berlin",
      "Job type matches preference: full-time",
      "67% required skill coverage",
    ],
    developmentAreas: ["Consider learning kubernetes", "Gain experience: 5 years may be required"],
  });
});

test("flags education, location and job type gaps and carries them into the template", () => {
  const job = attributes({
    preferredSkills: ["Go"],
    educationLevel: "phd",
    locationPreferences: ["Munich"],
    jobTypes: ["contract"],
  });
  const candidate = attributes({
    skills: ["Go"],
    educationLevel: "bachelor",
    locationPreferences: ["Berlin"],
    jobTypes: ["full-time"],
    experienceYears: 3,
  });
  const breakdown = computeSkillBreakdown(candidate.skills, job.requiredSkills, job.preferredSkills);
  const insights = computeMatchInsights(job, candidate, breakdown);

  assert.deepEqual(insights, {
    educationMatch: false,
    locationMatch: false,
    jobTypeMatch: false,
    recommendedBecause: ["Relevant skills: go"],
    developmentAreas: ["Strong match with minimal gaps"],
  });
  assert.deepEqual(buildTemplateExplanation(0.8, breakdown, 0.5, insights), {
    summary:
      "Matched 1/1 preferred skills, good semantic fit. " +
      "Gaps: education below requirement, location outside preferences, job type outside preferences.",
    highlights: ["go"],
    source: "template",
  });
});

test("treats unstated preferences and remote jobs as compatible", () => {
  const empty = computeMatchInsights(attributes(), attributes(), computeSkillBreakdown([], [], []));
  assert.deepEqual(empty, {
    educationMatch: true,
    locationMatch: true,
    jobTypeMatch: true,
    recommendedBecause: ["Profile aligns with position requirements"],
    developmentAreas: ["Strong match with minimal gaps"],
  });

  const remote = computeMatchInsights(
    attributes({ locationPreferences: ["Remote"] }),
    attributes({ locationPreferences: ["Paris"] }),
    computeSkillBreakdown([], [], []),
  );
  assert.equal(remote.locationMatch, true);
  assert.deepEqual(remote.recommendedBecause, ["Remote work option available"]);
});

test("orders education levels", () => {
  assert.equal(meetsEducation("phd", "master"), true);
  assert.equal(meetsEducation("associate", "bachelor"), false);
  assert.equal(meetsEducation("none", "none"), true);
});
