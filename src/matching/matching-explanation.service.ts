import { LlmClient } from "../ai/llm.client";
import { MATCHING_EXPLANATION_V1_PROMPT } from "../ai/prompts/matching/matching-explanation.v1.prompt";
import { isRecord } from "../profiles/entity.schemas";
import { EntityCategory } from "../shared/types/entity.types";
import { MatchExplanation, MatchInsights, SkillBreakdown } from "../shared/types/matching.types";

const MAX_HIGHLIGHTS = 3;

export interface ExplanationInput {
  query: { category: EntityCategory; title: string };
  counterpart: { category: EntityCategory; title: string };
  similarity: number;
  compositeScore: number;
  breakdown: SkillBreakdown;
  insights: MatchInsights;
}

export interface ExplanationGateway {
  explain(input: ExplanationInput, options: { timeoutMs: number }): Promise<{ summary: string; highlights: string[] }>;
}

export class MatchingExplanationService implements ExplanationGateway {
  constructor(private readonly llmClient: LlmClient) {}

  async explain(
    input: ExplanationInput,
    options: { timeoutMs: number },
  ): Promise<{ summary: string; highlights: string[] }> {
    const prompt = [
      MATCHING_EXPLANATION_V1_PROMPT,
      "",
      JSON.stringify(
        {
          query: input.query,
          counterpart: input.counterpart,
          similarity: Number(input.similarity.toFixed(4)),
          composite_score: Number(input.compositeScore.toFixed(4)),
          breakdown: {
            required_matched: input.breakdown.requiredMatched,
            required_missing: input.breakdown.requiredMissing,
            preferred_matched: input.breakdown.preferredMatched,
            preferred_missing: input.breakdown.preferredMissing,
          },
          education_match: input.insights.educationMatch,
          location_match: input.insights.locationMatch,
          job_type_match: input.insights.jobTypeMatch,
        },
        null,
        2,
      ),
    ].join("\n");

    const raw = await this.llmClient.generateStructuredJson(prompt, 300, {
      promptName: "matching_explanation_v1",
      timeoutMs: options.timeoutMs,
    });
    return parseExplanation(raw);
  }
}

export function parseExplanation(raw: string): { summary: string; highlights: string[] } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    throw new Error("Matching explanation output is not valid JSON.");
  }

  const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
  if (!isRecord(parsed)) {
    throw new Error("Matching explanation output is not an object.");
  }
  const summary = typeof parsed.summary === "string" ? parsed.summary.trim() : "";
  if (!summary) {
    throw new Error("Matching explanation output is invalid: missing summary.");
  }
  const highlights = Array.isArray(parsed.highlights)
    ? parsed.highlights
        .filter((item): item is string => typeof item === "string" && Boolean(item.trim()))
        .map((item) => item.trim())
        .slice(0, MAX_HIGHLIGHTS)
    : [];

  return { summary, highlights };
}

/** Deterministic explanation built from the coverage breakdown and the pair's insights. */
export function buildTemplateExplanation(
  similarity: number,
  breakdown: SkillBreakdown,
  compositeScore: number,
  insights: MatchInsights,
): MatchExplanation {
  const requiredTotal = breakdown.requiredMatched.length + breakdown.requiredMissing.length;
  const preferredTotal = breakdown.preferredMatched.length + breakdown.preferredMissing.length;

  const parts: string[] = [];
  if (requiredTotal > 0) {
    parts.push(`${breakdown.requiredMatched.length}/${requiredTotal} required skills`);
  }
  if (preferredTotal > 0) {
    parts.push(`${breakdown.preferredMatched.length}/${preferredTotal} preferred skills`);
  }
  if (similarity >= 0.85) {
    parts.push("strong semantic alignment");
  } else if (similarity >= 0.75) {
    parts.push("good semantic fit");
  }

  const gaps: string[] = [];
  if (!insights.educationMatch) {
    gaps.push("education below requirement");
  }
  if (!insights.locationMatch) {
    gaps.push("location outside preferences");
  }
  if (!insights.jobTypeMatch) {
    gaps.push("job type outside preferences");
  }

  const base = parts.length ? `Matched ${parts.join(", ")}.` : `Match score: ${Math.round(compositeScore * 100)}%.`;
  const summary = gaps.length ? `${base} Gaps: ${gaps.join(", ")}.` : base;

  const highlights = [...breakdown.requiredMatched, ...breakdown.preferredMatched].slice(0, MAX_HIGHLIGHTS);
  const firstGap = breakdown.requiredMissing[0];
  if (firstGap) {
    highlights.push(`Missing: ${firstGap}`);
  }

  return { summary, highlights, source: "template" };
}
