import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import multer from "multer";
import type { ApiErrorResponse } from "@docrag/types";
import { AppError, PartialBatchFailureError, ValidationError } from "@docrag/errors";
import type { Logger } from "@docrag/logger";
import { requestLogger } from "./request-context.js";

function fromUploadError(err: multer.MulterError): AppError {
  if (err.code === "LIMIT_FILE_SIZE") {
    return new AppError({
      message: "File exceeds the maximum upload size",
      statusCode: 413,
      code: "PAYLOAD_TOO_LARGE",
      cause: err,
    });
  }
  return new ValidationError(err.message, { [err.field ?? "file"]: err.code }, { cause: err });
}

/**
 * Terminal error handler. Every failure leaves as
 * `{ success: false, detail, code, requestId }` with the AppError status;
 * unknown errors become a generic 500.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = req.requestId ?? "unknown";
    const appError = AppError.from(
      err instanceof multer.MulterError ? fromUploadError(err) : err,
      requestId,
    );
    const log = requestLogger(req, logger);

    if (appError.isOperational && appError.isClientError) {
      log.warn({ code: appError.code, detail: appError.message }, "Request rejected");
    } else {
      log.error({ err, code: appError.code }, "Request failed");
    }

    const body: ApiErrorResponse = {
      success: false,
      detail: appError.message,
      code: appError.code,
      requestId,
    };
    if (appError instanceof PartialBatchFailureError) {
      body.chunks = appError.insertedChunks;
    }

    res.status(appError.statusCode).json(body);
  };
}
