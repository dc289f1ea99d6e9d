import type { RequestHandler } from "express";
import { ServerBusyError } from "@indexflow/errors";

/**
 * Caps the number of in-flight requests handled by this process. A slot is
 * released once the response finishes or the connection closes.
 */
export function createConcurrencyLimiter(limit: number): RequestHandler {
  let active = 0;

  return (_req, res, next) => {
    if (active >= limit) {
      next(new ServerBusyError(limit));
      return;
    }

    active++;
    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      active--;
    };
    res.on("finish", release);
    res.on("close", release);
    next();
  };
}
