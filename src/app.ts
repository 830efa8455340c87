import express, { Express, Request, Response } from "express";
import { EmbeddingGateway, EmbeddingsClient } from "./ai/embeddings.client";
import { LlmClient } from "./ai/llm.client";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { EntityStore } from "./db/entity-store";
import { SupabaseEntityStore } from "./db/supabase-entity.store";
import { SupabaseRestClient } from "./db/supabase.client";
import { buildApiRouter, errorHandler } from "./http/routes";
import { EntityLifecycleService } from "./lifecycle/entity-lifecycle.service";
import { ExplanationGateway, MatchingExplanationService } from "./matching/matching-explanation.service";
import { MatchingEngine } from "./matching/matching.engine";
import { QdrantVectorIndex } from "./matching/qdrant.client";
import { InMemoryVectorIndex, VectorIndex } from "./matching/vector-index";
import { DataDeletionService } from "./privacy/data-deletion.service";
import { RetentionSweepService } from "./privacy/retention-sweep.service";
import { InMemoryEntityStore } from "./storage/in-memory-entity.store";
import { KeyedLock } from "./shared/utils/keyed-lock";
import { DEFAULT_RETRY_POLICY, RetryPolicy } from "./shared/utils/retry";

export interface AppOverrides {
  logger?: Logger;
  store?: EntityStore;
  index?: VectorIndex;
  embeddings?: EmbeddingGateway;
  explanationGateway?: ExplanationGateway;
  retry?: RetryPolicy;
}

export interface AppContext {
  app: Express;
  logger: Logger;
  store: EntityStore;
  index: VectorIndex;
  lifecycleService: EntityLifecycleService;
  dataDeletionService: DataDeletionService;
  matchingEngine: MatchingEngine;
  retentionSweepService: RetentionSweepService;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const retry = overrides.retry ?? DEFAULT_RETRY_POLICY;

  const store = overrides.store ?? buildStore(env, logger);
  const index = overrides.index ?? buildVectorIndex(env, logger);
  const embeddings =
    overrides.embeddings ??
    new EmbeddingsClient({ apiKey: env.openaiApiKey, timeoutMs: env.embeddingTimeoutMs }, logger);
  const explanationGateway =
    overrides.explanationGateway ??
    new MatchingExplanationService(new LlmClient({ apiKey: env.openaiApiKey, model: env.openaiChatModel }, logger));

  // One lock shared by every writer so create, update, erase and orphan cleanup serialize per entity.
  const lock = new KeyedLock();
  const lifecycleService = new EntityLifecycleService(
    store,
    index,
    embeddings,
    logger,
    {
      embeddingModel: env.openaiEmbeddingModel,
      embeddingRetry: { ...retry, retries: env.embeddingMaxRetries },
      backendRetry: retry,
    },
    lock,
  );
  const dataDeletionService = new DataDeletionService(store, index, logger, { retry }, lock);
  const matchingEngine = new MatchingEngine(
    store,
    index,
    logger,
    {
      defaultMinSimilarity: env.matchMinSimilarity,
      explanationEnabled: env.explanationEnabled,
      explanationTimeoutMs: env.explanationTimeoutMs,
      explanationTopN: env.explanationTopN,
      retry,
    },
    explanationGateway,
  );
  const retentionSweepService = new RetentionSweepService(
    store,
    index,
    dataDeletionService,
    logger,
    env.retention,
    lock,
    retry,
  );

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/v1",
    buildApiRouter({
      lifecycleService,
      dataDeletionService,
      matchingEngine,
      retentionSweepService,
      logger,
    }),
  );
  app.use(errorHandler(logger));

  return {
    app,
    logger,
    store,
    index,
    lifecycleService,
    dataDeletionService,
    matchingEngine,
    retentionSweepService,
  };
}

function buildStore(env: EnvConfig, logger: Logger): EntityStore {
  if (env.supabaseUrl && env.supabaseServiceRoleKey) {
    const supabaseClient = new SupabaseRestClient({
      url: env.supabaseUrl,
      serviceRoleKey: env.supabaseServiceRoleKey,
    });
    return new SupabaseEntityStore(supabaseClient, logger);
  }
  logger.warn("Supabase is not configured, using in-memory entity store");
  return new InMemoryEntityStore();
}

function buildVectorIndex(env: EnvConfig, logger: Logger): VectorIndex {
  const collections = {
    job: env.qdrantJobCollection,
    candidate: env.qdrantCandidateCollection,
  };
  if (env.qdrantUrl) {
    return new QdrantVectorIndex(
      {
        baseUrl: env.qdrantUrl,
        apiKey: env.qdrantApiKey,
        collections,
        dimension: env.embeddingDimension,
      },
      logger,
    );
  }
  logger.warn("Qdrant is not configured, using in-memory vector index");
  return new InMemoryVectorIndex(env.embeddingDimension, collections);
}
