import type { NextFunction, Request, Response } from "express";
import type { ErrorResponse } from "../../../core/dto/todoDto";
import { AppError, BadRequestError, NotFoundError, ValidationError } from "../../../core/errors";
import { getLogger } from "../../../infrastructure/logging/logger";

const GENERIC_MESSAGE = "An unexpected error occurred. Please try again later.";

/** Errors raised by express.json() carry a `type` such as "entity.parse.failed" and an HTTP status. */
function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    "type" in err && typeof err.type === "string" &&
    "status" in err && typeof err.status === "number"
  );
}

function classify(err: unknown): AppError | null {
  if (err instanceof AppError) return err;
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    if (err.type === "entity.parse.failed") return new BadRequestError("Malformed JSON request body");
    // Other client errors such as 413 keep their own status.
    return new AppError(err.message, err.status, "BadRequest");
  }
  return null;
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const known = classify(err);
  const body: ErrorResponse = known
    ? { statusCode: known.statusCode, message: known.message, type: known.type, timestamp: new Date().toISOString() }
    : { statusCode: 500, message: GENERIC_MESSAGE, type: "InternalServerError", timestamp: new Date().toISOString() };

  if (known instanceof ValidationError) body.errors = known.errors;

  const log = getLogger("http");
  if (known) {
    log.warn({ method: req.method, path: req.originalUrl, status: body.statusCode, type: body.type }, known.message);
  } else {
    log.error({ err, method: req.method, path: req.originalUrl }, "Unhandled error");
  }

  res.status(body.statusCode).json(body);
}
