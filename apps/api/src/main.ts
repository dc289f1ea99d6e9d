import { resolve } from "node:path";
import { parseEnv } from "@indexflow/config";
import { createDocumentStore } from "@indexflow/document-store";
import { createEmbeddingProvider } from "@indexflow/embeddings";
import { createLogger } from "@indexflow/logger";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({
    level: config.logLevel,
    service: "indexflow-api",
    nodeEnv: config.nodeEnv,
  });

  const documentStore = createDocumentStore(config.documentStore);
  const embeddingProvider = createEmbeddingProvider(config.embedding);

  const app = createApp({
    logger,
    documentStore,
    embeddingProvider,
    embeddingDim: config.documentStore.embeddingDim,
    duplicateDocuments: config.documentStore.duplicateDocuments,
    pipelineDefaults: config.pipeline,
    uploadDir: resolve(config.fileUploadPath),
    rootPath: config.rootPath,
    concurrencyLimit: config.concurrentRequestsPerWorker,
  });

  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        rootPath: config.rootPath,
        documentStore: documentStore.name,
        embeddingModel: embeddingProvider.model,
      },
      "API listening",
    );
  });

  const shutdown = (): void => {
    logger.info("Shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  const logger = createLogger({ service: "indexflow-api" });
  logger.fatal({ err }, "Fatal error during startup");
  process.exit(1);
});
