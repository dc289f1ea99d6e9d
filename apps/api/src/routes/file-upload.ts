import { Router } from "express";
import multer from "multer";
import {
  buildFileInputs,
  createIndexingPipeline,
  parseMetadata,
  resolveCollection,
  type IndexingDependencies,
} from "@indexflow/core";
import { ValidationError } from "@indexflow/errors";
import { redactRecord, type Logger } from "@indexflow/logger";
import type { IndexingParams } from "@indexflow/types";
import { asyncHandler, getRequestLogger } from "../middleware/request-context.js";
import { createConcurrencyLimiter } from "../middleware/concurrency-limiter.js";
import { applyOverrides, parseUploadForm } from "../upload-form.js";
import { decodeFilename, removeUploads, storeUploads } from "../uploads.js";

export interface FileUploadRouteOptions {
  indexing: Omit<IndexingDependencies, "logger">;
  defaults: IndexingParams;
  uploadDir: string;
  concurrencyLimit: number;
  logger: Logger;
}

/**
 * `POST /file-upload`: stores the uploaded files, runs them through a
 * request-scoped indexing pipeline and removes them again.
 */
export function createFileUploadRouter(options: FileUploadRouteOptions): Router {
  const router = Router();
  // Files stay in memory until the metadata has been validated.
  const upload = multer({ storage: multer.memoryStorage() });

  router.post(
    "/file-upload",
    createConcurrencyLimiter(options.concurrencyLimit),
    upload.array("files"),
    asyncHandler(async (req, res) => {
      const log = getRequestLogger(req, options.logger);
      const form = parseUploadForm(req.body);
      const received = (Array.isArray(req.files) ? req.files : []).map((file) => ({
        originalname: decodeFilename(file.originalname),
        buffer: file.buffer,
      }));
      if (received.length === 0) {
        throw new ValidationError("No files uploaded", { files: "At least one file is required" });
      }

      const meta = parseMetadata(form.meta);
      const collection = resolveCollection(meta);
      const params = applyOverrides(options.defaults, form);

      log.info(
        { collection, files: received.map((f) => f.originalname), meta: redactRecord(meta) },
        "Upload received",
      );

      const stored = await storeUploads(options.uploadDir, received, log);
      try {
        const pipeline = createIndexingPipeline({ ...options.indexing, logger: log }, params);
        try {
          await pipeline.run(buildFileInputs(stored, meta));
        } finally {
          pipeline.dispose();
        }
      } finally {
        await removeUploads(stored, log);
      }

      res.status(200).end();
    }),
  );

  return router;
}
