import type { Request, RequestHandler, Response } from "express";

/** Express 4 ignores rejected handler promises; forward them to the error middleware. */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}
