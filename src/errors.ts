export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Forbidden") {
    super(403, message);
    this.name = "ForbiddenError";
  }
}

/** A username or email already belongs to another user */
export class UniqueViolationError extends Error {
  constructor(readonly field: "username" | "email", message: string) {
    super(message);
    this.name = "UniqueViolationError";
  }
}

export const errorMessage = (err: unknown) =>
  err instanceof Error ? err.message : String(err);
