import type { Request, Response, NextFunction, RequestHandler } from "express";

/** Forwards a rejected handler promise to the express error handler. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
