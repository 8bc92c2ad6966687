import type { ZodError } from "zod";

export type FieldErrors = Record<string, string[]>;

export class ApiError extends Error {
  readonly httpStatus: number;

  constructor(message: string, httpStatus: number) {
    super(message);
    this.name = "ApiError";
    this.httpStatus = httpStatus;
  }

  toJSON(): { error: string } {
    return { error: this.message };
  }
}

export class ValidationError extends ApiError {
  readonly fieldErrors: FieldErrors;

  constructor(fieldErrors: FieldErrors, message = "Validation failed") {
    super(message, 400);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }

  static fromZodError(error: ZodError): ValidationError {
    const fieldErrors: FieldErrors = {};
    for (const issue of error.issues) {
      const field = issue.path.length > 0 ? issue.path.join(".") : "body";
      (fieldErrors[field] ??= []).push(issue.message);
    }
    return new ValidationError(fieldErrors);
  }

  override toJSON(): { error: string; fieldErrors: FieldErrors } {
    return { error: this.message, fieldErrors: this.fieldErrors };
  }
}

/**
 * Raised when the id in a replace request does not match the record being
 * replaced. Checked before the record is looked up.
 */
export class IdMismatchError extends ValidationError {
  constructor(expected: number, received: unknown) {
    super(
      { id: [`Expected id ${expected} but received ${String(received)}`] },
      "Product id in the path does not match the id in the body",
    );
    this.name = "IdMismatchError";
  }
}
