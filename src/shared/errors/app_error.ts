/**
 * Request-level failure that the error middleware renders as
 * `{ ok: false, error: code, message, details? }`.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "AppError";
  }

  static validation(details: unknown): AppError {
    return new AppError(400, "VALIDATION_ERROR", "Validation error", details);
  }

  static unauthorized(message = "Login required"): AppError {
    return new AppError(401, "UNAUTHORIZED", message);
  }
}
