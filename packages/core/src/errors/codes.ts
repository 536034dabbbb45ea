/**
 * Error Code Infrastructure
 * Stable error codes and their process exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by pipeline stage
export enum ErrorCode {
  // Input Errors (E100–E199)
  INPUT_NOT_FOUND = 'E100',
  INPUT_PERMISSION_DENIED = 'E101',
  INPUT_INVALID_JSON = 'E102',
  INPUT_READ_FAILED = 'E103',

  // Schema Errors (E200–E299)
  INPUT_NOT_ARRAY = 'E200',
  RECORD_NOT_OBJECT = 'E201',
  MISSING_REQUIRED_FIELD = 'E202',
  INVALID_FIELD_TYPE = 'E203',
  EMPTY_NAME = 'E204',
  DUPLICATE_ID = 'E205',
  ID_OUT_OF_RANGE = 'E206',

  // Output Errors (E300–E399)
  OUTPUT_PERMISSION_DENIED = 'E300',
  OUTPUT_WRITE_FAILED = 'E301',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_SUCCESS = 0;

// CLI exit codes mapping; every failure currently exits with 1
export const EXIT_CODES = {
  [ErrorCode.INPUT_NOT_FOUND]: 1,
  [ErrorCode.INPUT_PERMISSION_DENIED]: 1,
  [ErrorCode.INPUT_INVALID_JSON]: 1,
  [ErrorCode.INPUT_READ_FAILED]: 1,
  [ErrorCode.INPUT_NOT_ARRAY]: 1,
  [ErrorCode.RECORD_NOT_OBJECT]: 1,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 1,
  [ErrorCode.INVALID_FIELD_TYPE]: 1,
  [ErrorCode.EMPTY_NAME]: 1,
  [ErrorCode.DUPLICATE_ID]: 1,
  [ErrorCode.ID_OUT_OF_RANGE]: 1,
  [ErrorCode.OUTPUT_PERMISSION_DENIED]: 1,
  [ErrorCode.OUTPUT_WRITE_FAILED]: 1,
  [ErrorCode.INTERNAL_ERROR]: 1,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
