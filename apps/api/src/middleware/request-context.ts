import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createChildLogger, type Logger } from "@indexflow/logger";

// Extend Express Request with the request id and its logger
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      log?: Logger;
    }
  }
}

const REQUEST_ID_HEADER = "x-request-id";

export function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}

export function getRequestLogger(req: Request, fallback: Logger): Logger {
  return req.log ?? fallback;
}

/**
 * Assigns a request id (honouring an incoming `X-Request-Id`) and a child
 * logger bound to it.
 */
export function createRequestContext(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();

    req.requestId = requestId;
    req.log = createChildLogger(logger, { requestId });
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  };
}

/** Forward rejections of an async handler to the Express error handler. */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
