// src/utils/errors.ts

type ConstructorOptions = { position?: number; field?: string; cause?: unknown };

/**
 * Base class for every failure raised while parsing or formatting a list
 * parameter. Carries an HTTP status so route handlers can surface it as a
 * client error.
 */
export class CodecError extends Error {
  override readonly name: string = "CodecError";
  readonly statusCode: number = 400;
  /** Index of the offending list position, when one applies. */
  readonly position?: number;
  /** Field the value was destined for, when known. */
  readonly field?: string;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    this.field = options?.field;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, CodecError.prototype);
  }

  /** Field and position, e.g. `bearings[1]`. Empty when neither is known. */
  get location(): string {
    const field = this.field ?? "";
    if (this.position === undefined) return field;
    return `${field}[${this.position}]`;
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${loc}: ${this.message}` : this.message;
  }
}

/** A present token could not be read as its declared element type. */
export class MalformedElementError extends CodecError {
  override readonly name = "MalformedElementError";
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, MalformedElementError.prototype);
  }
}

/** A well-formed value broke a field-specific constraint. */
export class ValidationViolationError extends CodecError {
  override readonly name = "ValidationViolationError";
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ValidationViolationError.prototype);
  }
}

/**
 * Re-throws a codec error raised for a single element with the list
 * position attached. Non-codec errors pass through untouched.
 */
export function atPosition(error: unknown, position: number, field?: string): unknown {
  if (error instanceof MalformedElementError) {
    return new MalformedElementError(error.message, { position, field: field ?? error.field, cause: error });
  }
  if (error instanceof ValidationViolationError) {
    return new ValidationViolationError(error.message, { position, field: field ?? error.field, cause: error });
  }
  return error;
}
