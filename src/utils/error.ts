export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum IDREF_ERROR {
  INVALID_OPTION = "INVALID_OPTION",
  ID_SPACE_EXHAUSTED = "ID_SPACE_EXHAUSTED",
  DUPLICATE_REFERENCE = "DUPLICATE_REFERENCE",
  TARGET_NOT_FOUND = "TARGET_NOT_FOUND",
  REFERENCE_VALIDATION_FAILED = "REFERENCE_VALIDATION_FAILED",
}

export class IDRefError extends AppError {
  constructor(
    public readonly category: IDREF_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

/**
 * Raised by ReferenceField.set when the target fails the field's validator.
 * Nothing is written when this is thrown.
 */
export class ValidationError extends IDRefError {
  constructor(message?: string, context?: Record<string, unknown>) {
    super(IDREF_ERROR.REFERENCE_VALIDATION_FAILED, message, context);
  }
}

export function is_idref_error(error: unknown): error is IDRefError {
  return error instanceof IDRefError;
}
