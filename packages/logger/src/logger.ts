import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redact.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Runtime environment; read from NODE_ENV when omitted. */
  env?: string;
  /** Write nothing. Used by tests that do not assert on log output. */
  silent?: boolean;
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
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const development = (options?.env ?? process.env["NODE_ENV"]) === "development";
  const level = options?.silent ? "silent" : (options?.level ?? (development ? "debug" : "info"));
  const service = options?.service ?? "docrag";

  const transport = options?.silent ? undefined : buildTransport(development);

  return pino({
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err },
    ...(transport ? { transport } : {}),
  });
}

/**
 * Create a child logger carrying request-scoped bindings such as `requestId`
 * or `documentName`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
