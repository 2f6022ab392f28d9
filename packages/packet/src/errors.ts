/**
 * @ilpcore/packet — Validation errors.
 *
 * Raised synchronously while constructing values. A failed construction
 * never yields a partially-built object.
 */

/** Error codes for value construction. */
export type ValidationErrorCode =
  | "INVALID_ADDRESS"
  | "ARGUMENT_ERROR"
  | "INCOMPLETE_BUILDER";

/**
 * Structured validation error.
 * Always thrown, never returned.
 */
export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}
