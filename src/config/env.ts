import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface RetentionConfig {
  jobDays: number;
  candidateDays: number;
  applicationDays: number;
  matchEventDays: number;
  batchSize: number;
  sweepEnabled: boolean;
  sweepIntervalMinutes: number;
}

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey: string;
  openaiChatModel: string;
  openaiEmbeddingModel: string;
  embeddingDimension: number;
  embeddingTimeoutMs: number;
  embeddingMaxRetries: number;
  explanationEnabled: boolean;
  explanationTimeoutMs: number;
  explanationTopN: number;
  matchMinSimilarity: number;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  qdrantJobCollection: string;
  qdrantCandidateCollection: string;
  retention: RetentionConfig;
}

function getRequiredString(source: NodeJS.ProcessEnv, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());
  const embeddingDimensionRaw = source.EMBEDDING_DIMENSION ?? "3072";
  const embeddingDimension = Number(embeddingDimensionRaw);
  const embeddingTimeoutRaw = source.EMBEDDING_TIMEOUT_MS ?? "15000";
  const embeddingTimeoutMs = Number(embeddingTimeoutRaw);
  const embeddingMaxRetriesRaw = source.EMBEDDING_MAX_RETRIES ?? "3";
  const embeddingMaxRetries = Number(embeddingMaxRetriesRaw);
  const explanationEnabled = parseBoolean(source.EXPLANATION_ENABLED ?? "true");
  const explanationTimeoutRaw = source.EXPLANATION_TIMEOUT_MS ?? "8000";
  const explanationTimeoutMs = Number(explanationTimeoutRaw);
  const explanationTopNRaw = source.EXPLANATION_TOP_N ?? "5";
  const explanationTopN = Number(explanationTopNRaw);
  const matchMinSimilarityRaw = source.MATCH_MIN_SIMILARITY ?? "0";
  const matchMinSimilarity = Number(matchMinSimilarityRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(embeddingDimension) || embeddingDimension <= 0) {
    throw new Error(`Invalid EMBEDDING_DIMENSION value: ${embeddingDimensionRaw}`);
  }
  if (!Number.isFinite(embeddingTimeoutMs) || embeddingTimeoutMs < 100) {
    throw new Error(`Invalid EMBEDDING_TIMEOUT_MS value: ${embeddingTimeoutRaw}`);
  }
  if (!Number.isInteger(embeddingMaxRetries) || embeddingMaxRetries < 0 || embeddingMaxRetries > 10) {
    throw new Error(`Invalid EMBEDDING_MAX_RETRIES value: ${embeddingMaxRetriesRaw}. Expected integer between 0 and 10.`);
  }
  if (!Number.isFinite(explanationTimeoutMs) || explanationTimeoutMs < 100) {
    throw new Error(`Invalid EXPLANATION_TIMEOUT_MS value: ${explanationTimeoutRaw}`);
  }
  if (!Number.isInteger(explanationTopN) || explanationTopN < 0) {
    throw new Error(`Invalid EXPLANATION_TOP_N value: ${explanationTopNRaw}`);
  }
  if (!Number.isFinite(matchMinSimilarity) || matchMinSimilarity < -1 || matchMinSimilarity > 1) {
    throw new Error(`Invalid MATCH_MIN_SIMILARITY value: ${matchMinSimilarityRaw}. Expected number between -1 and 1.`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiChatModel: source.OPENAI_CHAT_MODEL ?? "gpt-4o",
    openaiEmbeddingModel:
      source.OPENAI_EMBEDDINGS_MODEL ?? source.OPENAI_EMBEDDING_MODEL ?? "text-embedding-3-large",
    embeddingDimension,
    embeddingTimeoutMs,
    embeddingMaxRetries,
    explanationEnabled,
    explanationTimeoutMs,
    explanationTopN,
    matchMinSimilarity,
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL"),
    supabaseServiceRoleKey: getOptionalTrimmed(source, "SUPABASE_SERVICE_ROLE_KEY"),
    qdrantUrl: getOptionalTrimmed(source, "QDRANT_URL"),
    qdrantApiKey: getOptionalTrimmed(source, "QDRANT_API_KEY"),
    qdrantJobCollection: getOptionalTrimmed(source, "QDRANT_JOB_COLLECTION") ?? "jobs_v1",
    qdrantCandidateCollection: getOptionalTrimmed(source, "QDRANT_CANDIDATE_COLLECTION") ?? "candidates_v1",
    retention: loadRetentionConfig(source),
  };
}

function loadRetentionConfig(source: NodeJS.ProcessEnv): RetentionConfig {
  const jobDays = parsePositiveInteger(source, "RETENTION_JOB_DAYS", "365");
  const candidateDays = parsePositiveInteger(source, "RETENTION_CANDIDATE_DAYS", "730");
  const applicationDays = parsePositiveInteger(source, "RETENTION_APPLICATION_DAYS", "365");
  const matchEventDays = parsePositiveInteger(source, "RETENTION_MATCH_EVENT_DAYS", "90");
  const batchSize = parsePositiveInteger(source, "RETENTION_SWEEP_BATCH_SIZE", "50");
  const sweepIntervalMinutes = parsePositiveInteger(source, "RETENTION_SWEEP_INTERVAL_MINUTES", "1440");
  const sweepEnabled = parseBoolean(source.RETENTION_SWEEP_ENABLED ?? "false");

  if (batchSize > 1000) {
    throw new Error(`Invalid RETENTION_SWEEP_BATCH_SIZE value: ${batchSize}. Expected at most 1000.`);
  }
  if (sweepIntervalMinutes < 5) {
    throw new Error(`Invalid RETENTION_SWEEP_INTERVAL_MINUTES value: ${sweepIntervalMinutes}`);
  }

  return {
    jobDays,
    candidateDays,
    applicationDays,
    matchEventDays,
    batchSize,
    sweepEnabled,
    sweepIntervalMinutes,
  };
}

function parsePositiveInteger(source: NodeJS.ProcessEnv, name: string, fallback: string): number {
  const raw = source[name] ?? fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

export function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
