/**
 * Root and request-scoped pino loggers. Pretty output in development, JSON
 * lines everywhere else.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redaction.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" in development). */
  level?: string;
  /** Service name attached to every log line. */
  service?: string;
  /** Static bindings attached to every log line (e.g. pid of the worker). */
  base?: Record<string, unknown>;
  /** Write to this stream instead of stdout; the pretty transport is then skipped. */
  destination?: pino.DestinationStream;
  /** Runtime environment; falls back to NODE_ENV. */
  nodeEnv?: "development" | "test" | "production";
}

function isDevelopment(nodeEnv: string | undefined): boolean {
  return (nodeEnv ?? process.env["NODE_ENV"]) === "development";
}

/**
 * Build the Pino transport configuration.
 *
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - In **production / test** we emit structured JSON (no transport needed).
 */
function buildTransport(development: boolean): pino.TransportSingleOptions | undefined {
  if (development) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

/**
 * Create a new root Pino logger.
 *
 * @param options - Optional overrides for level, service name and environment.
 * @returns A configured Pino `Logger` instance.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const development = isDevelopment(options?.nodeEnv);
  const level = options?.level ?? (development ? "debug" : "info");
  const service = options?.service ?? "indexflow";

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(options?.base ? { base: options.base } : {}),
  };

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }

  const transport = buildTransport(development);
  return pino({ ...pinoOptions, ...(transport ? { transport } : {}) });
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * request-scoped bindings (e.g. `requestId`, `collection`).
 *
 * @param parent   - The parent `Logger` to derive from.
 * @param bindings - Key/value pairs merged into every log line produced by the child.
 * @returns A child `Logger` instance.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
