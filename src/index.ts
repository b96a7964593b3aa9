import "dotenv/config";
import { serve } from "@hono/node-server";
import { errorMessage } from "./errors.js";
import { createApp } from "./http/app.js";
import { createLogger, logger } from "./logger.js";
import { InMemoryArticleStore } from "./rag/article-store.js";
import { loadServiceConfig } from "./rag/config.js";
import { HttpEmbedder } from "./rag/embedding-service.js";
import { createModelResolver, resolveModelProbes } from "./rag/model-selector.js";
import { createRagPipeline } from "./rag/pipeline.js";
import { extractUrl } from "./rag/url-extractor.js";

const log = createLogger("server");

function start(): void {
  const config = loadServiceConfig();
  logger.level = config.logLevel;

  const embedder = new HttpEmbedder(config.embedding);
  const resolveModel = createModelResolver(config.llm);
  const pipeline = createRagPipeline({ embedder, resolveModel, log: createLogger("pipeline") });

  log.info(
    { providers: resolveModelProbes(config.llm).map((p) => p.name), embeddingModel: embedder.model },
    "configured language model providers",
  );

  const app = createApp({
    pipeline,
    resolveModel,
    articleStore: new InMemoryArticleStore(),
    extractUrl: (url) => extractUrl(url),
    embeddingModel: embedder.model,
    log: createLogger("http"),
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, "API server listening");
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    server.close((err) => {
      if (err) {
        log.error({ err }, "error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  start();
} catch (err: unknown) {
  log.fatal({ err }, `failed to start: ${errorMessage(err)}`);
  process.exit(1);
}
