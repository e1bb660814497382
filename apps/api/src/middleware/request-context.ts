import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createChildLogger, type Logger } from "@docrag/logger";

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

/**
 * Tags every request with an id (the caller's `x-request-id`, or a fresh
 * UUID) and a child logger bound to it.
 */
export function createRequestContext(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.get(REQUEST_ID_HEADER);
    const requestId = header && header.length <= 128 ? header : randomUUID();

    req.requestId = requestId;
    req.log = createChildLogger(logger, { requestId });
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const started = Date.now();
    res.on("finish", () => {
      req.log?.info(
        {
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - started,
        },
        "Request completed",
      );
    });

    next();
  };
}

export function requestLogger(req: Request, fallback: Logger): Logger {
  return req.log ?? fallback;
}
