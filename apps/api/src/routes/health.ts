import { Router } from "express";
import type { IDocumentStore } from "@indexflow/document-store";
import type { IEmbeddingProvider } from "@indexflow/embeddings";
import type { HealthCheckResult } from "@indexflow/types";
import { asyncHandler } from "../middleware/request-context.js";

export function createHealthRouter(
  documentStore: IDocumentStore,
  embeddingProvider: IEmbeddingProvider,
): Router {
  const router = Router();

  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const [store, embeddings] = await Promise.all([
        documentStore.healthCheck(),
        embeddingProvider.healthCheck(),
      ]);
      const checks = { documentStore: store, embeddings };
      const result: HealthCheckResult = {
        status: store && embeddings ? "ok" : "degraded",
        checks,
      };
      res.status(result.status === "ok" ? 200 : 503).json(result);
    }),
  );

  return router;
}
