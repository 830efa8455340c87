import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { errorMessage } from "./config/logger";
import { QdrantVectorIndex } from "./matching/qdrant.client";
import { ENTITY_CATEGORIES } from "./shared/types/entity.types";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, index, retentionSweepService } = createApp(env);

  if (index instanceof QdrantVectorIndex) {
    for (const category of ENTITY_CATEGORIES) {
      await index.ensureCollection(index.collectionFor(category));
    }
  }

  const server = app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("Embedding model", {
      model: env.openaiEmbeddingModel,
      dimension: env.embeddingDimension,
    });
    logger.info("RETENTION_SWEEP", {
      enabled: env.retention.sweepEnabled,
      intervalMinutes: env.retention.sweepIntervalMinutes,
    });
  });

  if (env.retention.sweepEnabled) {
    retentionSweepService.start();
  }

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    retentionSweepService.stop();
    server.close();
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

void bootstrap().catch((error) => {
  process.stderr.write(`Failed to start: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
