/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Input Errors (E001–E099)
  INPUT_NOT_FOUND = 'E001',
  INVALID_JSON = 'E002',
  INVALID_GLOB_PATTERN = 'E003',

  // Inference Errors (E100–E199)
  NUMERIC_RANGE_OVERFLOW = 'E100',
  DEPTH_LIMIT_EXCEEDED = 'E101',
  UNSUPPORTED_VALUE = 'E102',

  // Validation Errors (E200–E299)
  SCHEMA_VALIDATION_FAILED = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_TIER = 'E301',

  // I/O Errors (E400–E499)
  IO_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INPUT_NOT_FOUND]: 10,
  [ErrorCode.INVALID_JSON]: 11,
  [ErrorCode.INVALID_GLOB_PATTERN]: 12,
  [ErrorCode.NUMERIC_RANGE_OVERFLOW]: 20,
  [ErrorCode.DEPTH_LIMIT_EXCEEDED]: 21,
  [ErrorCode.UNSUPPORTED_VALUE]: 22,
  [ErrorCode.SCHEMA_VALIDATION_FAILED]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 40,
  [ErrorCode.INVALID_TIER]: 41,
  [ErrorCode.IO_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
