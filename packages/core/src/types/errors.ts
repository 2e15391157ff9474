/**
 * Error hierarchy for schemasmith
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // JSON Pointer into the input value (e.g., '/users/0/age')
  file?: string; // File the error relates to, when any
  value?: unknown; // Problematic value
  valueExcerpt?: string; // Safe excerpt of value
  suggestion?: string; // Single human-readable workaround
  [key: string]: unknown;
}

export interface SchemasmithErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

type SubclassParams<C extends ErrorContext = ErrorContext> = Omit<
  SchemasmithErrorParams,
  'errorCode' | 'context'
> & {
  errorCode?: ErrorCode;
  context?: C;
};

/**
 * Base error class for all schemasmith errors
 */
export abstract class SchemasmithError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  /** Follow-up hints shown under the error, closest first */
  public suggestions?: string[];

  constructor(params: SchemasmithErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Input errors (missing files, malformed JSON text, bad glob patterns)
 */
export class InputError extends SchemasmithError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_JSON,
    });
  }

  get file(): string | undefined {
    return this.context?.file;
  }
}

/**
 * Schema inference errors (unsupported values, depth guard, numeric bounds)
 */
export class InferenceError extends SchemasmithError {
  constructor(params: SubclassParams<ErrorContext & { path: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.UNSUPPORTED_VALUE,
    });
  }

  get path(): string {
    return this.context?.path ?? '';
  }
}

export type NumericBound = 'minimum' | 'maximum';

/**
 * Raised when a derived numeric bound leaves the representable range.
 */
export class NumericRangeError extends InferenceError {
  constructor(params: {
    value: number | bigint;
    bound: NumericBound;
    path: string;
  }) {
    const { value, bound, path } = params;
    super({
      message: `Cannot derive ${bound} for ${String(value)} at ${path || '/'}: result is outside the representable numeric range`,
      errorCode: ErrorCode.NUMERIC_RANGE_OVERFLOW,
      context: {
        path,
        valueExcerpt: String(value),
        bound,
        suggestion: 'Use a lower tier, which does not derive numeric bounds',
      },
    });
  }

  get bound(): NumericBound | undefined {
    const bound = this.context?.bound;
    return bound === 'minimum' || bound === 'maximum' ? bound : undefined;
  }
}

/**
 * Individual validation failure details
 */
export interface ValidationFailure {
  path: string;
  message: string;
  keyword: string;
  schemaPath: string;
  params?: Record<string, unknown>;
}

/**
 * Meta-schema validation errors for produced schema documents
 */
export class SchemaValidationError extends SchemasmithError {
  public readonly failures: ValidationFailure[];

  constructor(
    params: SubclassParams & {
      failures: ValidationFailure[];
    }
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SCHEMA_VALIDATION_FAILED,
      context: {
        failureCount: params.failures.length,
        ...(params.context ?? {}),
      },
    });
    this.failures = params.failures;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends SchemasmithError {
  constructor(params: SubclassParams<ErrorContext & { setting?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * File system errors raised while reading inputs or writing schemas
 */
export class IoError extends SchemasmithError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.IO_ERROR,
    });
  }

  get file(): string | undefined {
    return this.context?.file;
  }
}

export function isSchemasmithError(error: unknown): error is SchemasmithError {
  return error instanceof SchemasmithError;
}

export function createValidationFailure(
  path: string,
  message: string,
  keyword: string,
  schemaPath: string,
  params?: Record<string, unknown>
): ValidationFailure {
  return {
    path,
    message,
    keyword,
    schemaPath,
    params,
  };
}
