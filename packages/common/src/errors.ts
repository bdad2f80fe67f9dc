/**
 * @otptoken/common - Errors
 *
 * @packageDocumentation
 */

/**
 * JSON body of an error response
 */
export interface OTPTokenErrorBody {
  error: string;
  name?: string;
  message: string;
}

/**
 * Base class of every error raised by the otptoken packages
 */
export class OTPTokenError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OTPTokenError";
  }

  /** Offending parameter, when there is one */
  get param(): string | undefined {
    return undefined;
  }

  toJSON(): OTPTokenErrorBody {
    const body: OTPTokenErrorBody = { error: this.name, message: this.message };
    if (this.param !== undefined) {
      body.name = this.param;
    }
    return body;
  }
}

/**
 * A value and its confirmation differ
 */
export class MismatchError extends OTPTokenError {
  constructor(readonly field: string) {
    super(`${field}: values do not match`);
    this.name = "MismatchError";
  }

  override get param(): string {
    return this.field;
  }
}

/**
 * A value could not be decoded
 */
export class EncodingError extends OTPTokenError {
  constructor(
    readonly field: string,
    readonly error: string,
    options?: { cause?: unknown },
  ) {
    super(`invalid '${field}': ${error}`, options);
    this.name = "EncodingError";
  }

  override get param(): string {
    return this.field;
  }
}

/**
 * A parameter breaks a constraint
 */
export class ValidationError extends OTPTokenError {
  constructor(
    readonly field: string,
    readonly error: string,
  ) {
    super(`invalid '${field}': ${error}`);
    this.name = "ValidationError";
  }

  override get param(): string {
    return this.field;
  }
}

/**
 * A principal or a token does not exist
 */
export class NotFoundError extends OTPTokenError {
  constructor(
    readonly key: string,
    readonly kind: "user" | "OTP token" = "user",
  ) {
    super(`${key}: ${kind} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * A token with the same id is already stored
 */
export class DuplicateEntryError extends OTPTokenError {
  constructor(readonly key: string) {
    super(`OTP token with unique ID "${key}" already exists`);
    this.name = "DuplicateEntryError";
  }
}

/**
 * An update request carries no change
 */
export class EmptyModlistError extends OTPTokenError {
  constructor() {
    super("no modifications to be performed");
    this.name = "EmptyModlistError";
  }
}
