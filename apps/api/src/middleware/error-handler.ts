import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import multer from "multer";
import { AppError, NotFoundError, ValidationError } from "@indexflow/errors";
import type { Logger } from "@indexflow/logger";
import type { ApiResponse } from "@indexflow/types";
import { getRequestId, getRequestLogger } from "./request-context.js";

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

function toAppError(err: unknown): AppError | null {
  if (AppError.isAppError(err)) return err;
  if (err instanceof multer.MulterError) {
    const field = err.field ?? "files";
    return new ValidationError(err.message, { [field]: err.message }, { cause: err });
  }
  return null;
}

/**
 * Renders every failure in the standard error envelope. Errors that are not
 * AppErrors become 500 INTERNAL_ERROR without leaking their message.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const log = getRequestLogger(req, logger);
    const requestId = getRequestId(req);
    const appError = toAppError(err);

    if (appError) {
      if (appError.statusCode >= 500) {
        log.error({ err: appError, code: appError.code }, appError.message);
      } else {
        log.warn({ code: appError.code, details: appError.details }, appError.message);
      }
      const body: ApiResponse = { success: false, error: appError.toApiError(requestId) };
      res.status(appError.statusCode).json(body);
      return;
    }

    log.error({ err }, "Unhandled error");
    const body: ApiResponse = {
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
    };
    res.status(500).json(body);
  };
}
