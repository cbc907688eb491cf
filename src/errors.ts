export type EpiErrorCode =
  | "INVALID_BUNDLE"
  | "MISSING_CONTENT"
  | "CONFLICT"
  | "NOT_FOUND"
  | "MARKER_NOT_FOUND"
  | "DEPTH_EXCEEDED"
  | "VALIDATION_FAILED";

export class EpiError extends Error {
  constructor(
    message: string,
    public readonly code: EpiErrorCode,
    public readonly statusCode: number = 400
  ) {
    super(message);
    this.name = "EpiError";
  }
}

/** Zero or several Composition entries, or not a Bundle at all. */
export class InvalidBundleError extends EpiError {
  constructor(message: string) {
    super(message, "INVALID_BUNDLE", 400);
    this.name = "InvalidBundleError";
  }
}

export class MissingContentError extends EpiError {
  constructor(message: string) {
    super(message, "MISSING_CONTENT", 404);
    this.name = "MissingContentError";
  }
}

export class ConflictError extends EpiError {
  constructor(message: string) {
    super(message, "CONFLICT", 409);
    this.name = "ConflictError";
  }
}

export class NotFoundError extends EpiError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

export class MarkerNotFoundError extends EpiError {
  constructor(message: string) {
    super(message, "MARKER_NOT_FOUND", 422);
    this.name = "MarkerNotFoundError";
  }
}

export class DepthExceededError extends EpiError {
  constructor(public readonly maxDepth: number) {
    super(`Section nesting exceeds the maximum depth of ${maxDepth}`, "DEPTH_EXCEEDED", 422);
    this.name = "DepthExceededError";
  }
}

export class ValidationError extends EpiError {
  constructor(message: string) {
    super(message, "VALIDATION_FAILED", 400);
    this.name = "ValidationError";
  }
}

export function isEpiError(err: unknown): err is EpiError {
  return err instanceof EpiError;
}
