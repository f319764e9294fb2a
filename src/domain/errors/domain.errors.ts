/**
 * Domain error taxonomy.
 *
 * Every error raised by the core carries a `kind` (how callers should treat it)
 * and a stable `code` (what exactly went wrong). Kinds map one-to-one onto the
 * HTTP statuses chosen by the error filter; codes are logged for observability.
 */

export type DomainErrorKind =
  | 'validation'
  | 'not_found'
  | 'state'
  | 'service_unavailable'
  | 'malformed_output'
  | 'cancelled';

export enum DomainErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  REQUIRED_FIELD = 'REQUIRED_FIELD',
  INVALID_IMPACT_SCORE = 'INVALID_IMPACT_SCORE',
  INVALID_PROFICIENCY_LEVEL = 'INVALID_PROFICIENCY_LEVEL',
  INVALID_MATCH_SCORE = 'INVALID_MATCH_SCORE',
  INVALID_DATE_FORMAT = 'INVALID_DATE_FORMAT',
  INVALID_DATE_RANGE = 'INVALID_DATE_RANGE',
  CURRENT_WITH_END_DATE = 'CURRENT_WITH_END_DATE',
  INVALID_EXPERIENCE_TYPE = 'INVALID_EXPERIENCE_TYPE',
  INVALID_LANGUAGE_PROFICIENCY = 'INVALID_LANGUAGE_PROFICIENCY',
  INVALID_LANGUAGE_CODE = 'INVALID_LANGUAGE_CODE',
  EMPTY_BULLET_CONTENT = 'EMPTY_BULLET_CONTENT',
  EMPTY_SKILL_NAME = 'EMPTY_SKILL_NAME',
  EMPTY_JOB_DESCRIPTION = 'EMPTY_JOB_DESCRIPTION',

  USER_NOT_FOUND = 'USER_NOT_FOUND',
  RESUME_NOT_FOUND = 'RESUME_NOT_FOUND',
  BULLET_NOT_FOUND = 'BULLET_NOT_FOUND',

  INVALID_RESUME_STATUS = 'INVALID_RESUME_STATUS',
  INVALID_STATUS_TRANSITION = 'INVALID_STATUS_TRANSITION',
  NO_BULLETS_AVAILABLE = 'NO_BULLETS_AVAILABLE',

  AI_SERVICE_UNAVAILABLE = 'AI_SERVICE_UNAVAILABLE',
  MALFORMED_AI_OUTPUT = 'MALFORMED_AI_OUTPUT',
  REQUEST_CANCELLED = 'REQUEST_CANCELLED',
}

export class DomainError extends Error {
  readonly kind: DomainErrorKind;
  readonly code: DomainErrorCode;
  readonly field?: string;

  constructor(
    kind: DomainErrorKind,
    code: DomainErrorCode,
    message: string,
    options: { field?: string; cause?: unknown } = {},
  ) {
    super(options.field ? `${options.field}: ${message}` : message, {
      cause: options.cause,
    });
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.field = options.field;
  }
}

export class ValidationError extends DomainError {
  constructor(code: DomainErrorCode, message: string, field?: string) {
    super('validation', code, message, { field });
  }
}

/**
 * Collects several field errors and surfaces them as one validation error.
 */
export class ValidationErrors extends DomainError {
  readonly errors: ValidationError[] = [];

  constructor() {
    super('validation', DomainErrorCode.VALIDATION_FAILED, 'validation failed');
  }

  add(error: ValidationError): void {
    this.errors.push(error);
    this.message = this.describe();
  }

  addFieldError(field: string, message: string): void {
    this.add(new ValidationError(DomainErrorCode.VALIDATION_FAILED, message, field));
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  private describe(): string {
    if (this.errors.length === 1) return this.errors[0].message;
    return `multiple validation errors: ${this.errors
      .map((e) => e.message)
      .join('; ')}`;
  }

  throwIfAny(): void {
    if (this.hasErrors()) throw this;
  }
}

export class NotFoundError extends DomainError {
  constructor(code: DomainErrorCode, message: string) {
    super('not_found', code, message);
  }
}

export class InvalidResumeStatusError extends DomainError {
  constructor(status: string) {
    super('state', DomainErrorCode.INVALID_RESUME_STATUS, `invalid resume status "${status}"`);
  }
}

export class InvalidStatusTransitionError extends DomainError {
  constructor(from: string, to: string) {
    super(
      'state',
      DomainErrorCode.INVALID_STATUS_TRANSITION,
      `invalid status transition from "${from}" to "${to}"`,
    );
  }
}

export class NoBulletsAvailableError extends DomainError {
  constructor() {
    super(
      'state',
      DomainErrorCode.NO_BULLETS_AVAILABLE,
      'no bullets available for resume generation',
    );
  }
}

export class AiServiceUnavailableError extends DomainError {
  constructor(operation: string, cause?: unknown) {
    super(
      'service_unavailable',
      DomainErrorCode.AI_SERVICE_UNAVAILABLE,
      `AI service is unavailable (${operation})`,
      { cause },
    );
  }
}

export class MalformedAiOutputError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super('malformed_output', DomainErrorCode.MALFORMED_AI_OUTPUT, message, {
      cause,
    });
  }
}

export class RequestCancelledError extends DomainError {
  constructor(cause?: unknown) {
    super('cancelled', DomainErrorCode.REQUEST_CANCELLED, 'request was cancelled', {
      cause,
    });
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
