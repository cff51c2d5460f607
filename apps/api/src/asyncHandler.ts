import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Sends a rejected handler promise to `next()` so the error middleware answers it. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
