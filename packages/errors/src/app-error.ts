export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  isOperational?: boolean;
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly requestId?: string;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    statusCode,
    code,
    isOperational = true,
    requestId,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.requestId = requestId;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  get isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  /**
   * Normalize anything thrown into an AppError. Unknown errors become a
   * non-operational 500 whose message does not leak the original text.
   */
  static from(err: unknown, requestId?: string): AppError {
    if (AppError.isAppError(err)) return err;

    return new AppError({
      message: "Internal server error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      requestId,
      cause: err,
    });
  }
}
