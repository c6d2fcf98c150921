/**
 * Validation error class
 * @module @tidewater/shared/errors/validation-error
 */

import { TidewaterError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Validation error for configuration and descriptor failures
 */
export class ValidationError extends TidewaterError {
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create from a single field error
   */
  static field(field: string, message: string, rule?: string): ValidationError {
    return new ValidationError(message, [{ field, message, rule }], { field });
  }

  static required(field: string): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'This field is required', rule: 'required' }],
      { field },
      ErrorCode.MISSING_REQUIRED_FIELD,
    );
  }

  static invalidFormat(field: string, expected: string, received?: unknown): ValidationError {
    return new ValidationError(
      `Invalid format for field: ${field}`,
      [{ field, message: `Expected ${expected}`, rule: 'format', expected, received }],
      { field },
      ErrorCode.INVALID_FORMAT,
    );
  }

  static outOfRange(field: string, min?: number, max?: number, received?: number): ValidationError {
    let expected = '';
    if (min !== undefined && max !== undefined) {
      expected = `between ${min} and ${max}`;
    } else if (min !== undefined) {
      expected = `at least ${min}`;
    } else if (max !== undefined) {
      expected = `at most ${max}`;
    }

    return new ValidationError(
      `Value out of range for field: ${field}`,
      [{ field, message: `Expected value ${expected}`, rule: 'range', expected, received }],
      { field },
      ErrorCode.OUT_OF_RANGE,
    );
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[]): ValidationError {
    const fieldNames = errors.map((e) => e.field).join(', ');
    return new ValidationError(`Validation failed for fields: ${fieldNames}`, errors);
  }

  hasFieldError(field: string): boolean {
    return this.details.some((d) => d.field === field);
  }

  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: ValidationError };

export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value };
}

export function invalidResult<T>(error: ValidationError): ValidationResult<T> {
  return { valid: false, error };
}
