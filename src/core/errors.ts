import type { ErrorType } from "./dto/todoDto";

export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly type: ErrorType
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(message, 404, "NotFound");
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, "BadRequest");
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized access") {
    super(message, 401, "Unauthorized");
  }
}

/** Field name -> every message reported for it. */
export type FieldErrors = Record<string, string[]>;

export class ValidationError extends AppError {
  constructor(
    readonly errors: FieldErrors,
    message = "One or more validation errors occurred."
  ) {
    super(message, 400, "ValidationError");
  }
}
