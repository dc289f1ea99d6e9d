import express, { type Express } from "express";
import type { IDocumentStore } from "@indexflow/document-store";
import type { IEmbeddingProvider } from "@indexflow/embeddings";
import type { Logger } from "@indexflow/logger";
import type { DuplicateDocumentsPolicy, IndexingParams } from "@indexflow/types";
import type { ClassifyFn } from "@indexflow/core";
import { createRequestContext } from "./middleware/request-context.js";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { createFileUploadRouter } from "./routes/file-upload.js";
import { createHealthRouter } from "./routes/health.js";

export interface AppDependencies {
  logger: Logger;
  documentStore: IDocumentStore;
  embeddingProvider: IEmbeddingProvider;
  embeddingDim: number;
  duplicateDocuments: DuplicateDocumentsPolicy;
  pipelineDefaults: IndexingParams;
  uploadDir: string;
  rootPath: string;
  concurrencyLimit: number;
  classify?: ClassifyFn;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(createRequestContext(deps.logger));

  const routes = express.Router();
  routes.use(
    createFileUploadRouter({
      indexing: {
        documentStore: deps.documentStore,
        embeddingProvider: deps.embeddingProvider,
        embeddingDim: deps.embeddingDim,
        duplicateDocuments: deps.duplicateDocuments,
        classify: deps.classify,
      },
      defaults: deps.pipelineDefaults,
      uploadDir: deps.uploadDir,
      concurrencyLimit: deps.concurrencyLimit,
      logger: deps.logger,
    }),
  );
  routes.use(createHealthRouter(deps.documentStore, deps.embeddingProvider));
  app.use(deps.rootPath, routes);

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.logger));

  return app;
}
