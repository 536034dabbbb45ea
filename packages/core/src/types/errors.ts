/**
 * Error hierarchy for taskpipe
 * Every failure the pipeline can report is a PipelineError subclass
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
  path?: string; // File system path involved in the failure
  position?: number; // 0-based index of the offending record
  field?: string; // Record field that broke a rule
  value?: unknown; // Offending value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface PipelineErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all taskpipe errors
 */
export abstract class PipelineError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: PipelineErrorParams) {
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

  /**
   * Serialize error to JSON for logging
   * - dev: includes stack and the offending value
   * - prod: excludes both
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#withoutValue(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #withoutValue(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

type SubclassParams<C extends ErrorCode> = Omit<
  PipelineErrorParams,
  'errorCode'
> & { errorCode: C };

export type InputErrorCode =
  | ErrorCode.INPUT_NOT_FOUND
  | ErrorCode.INPUT_PERMISSION_DENIED
  | ErrorCode.INPUT_INVALID_JSON
  | ErrorCode.INPUT_READ_FAILED;

/**
 * Reading or decoding the input document failed
 */
export class InputError extends PipelineError {
  constructor(params: SubclassParams<InputErrorCode>) {
    super(params);
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

export type SchemaErrorCode =
  | ErrorCode.INPUT_NOT_ARRAY
  | ErrorCode.RECORD_NOT_OBJECT
  | ErrorCode.MISSING_REQUIRED_FIELD
  | ErrorCode.INVALID_FIELD_TYPE
  | ErrorCode.EMPTY_NAME
  | ErrorCode.DUPLICATE_ID
  | ErrorCode.ID_OUT_OF_RANGE;

/**
 * The decoded input breaks a container or record rule
 */
export class SchemaError extends PipelineError {
  public readonly failure?: ValidationFailure;

  constructor(
    params: SubclassParams<SchemaErrorCode> & { failure?: ValidationFailure }
  ) {
    const { failure, ...rest } = params;
    super({
      ...rest,
      context: failure
        ? {
            position: failure.position,
            field: failure.field,
            ...(rest.context ?? {}),
          }
        : rest.context,
    });
    this.failure = failure;
  }

  get position(): number | undefined {
    return this.failure?.position;
  }
}

export type OutputErrorCode =
  | ErrorCode.OUTPUT_PERMISSION_DENIED
  | ErrorCode.OUTPUT_WRITE_FAILED;

/**
 * Serialising or writing the output document failed
 */
export class OutputError extends PipelineError {
  constructor(params: SubclassParams<OutputErrorCode>) {
    super(params);
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

/**
 * Anything the pipeline did not anticipate
 */
export class InternalError extends PipelineError {
  constructor(params: Omit<PipelineErrorParams, 'errorCode'>) {
    super({ ...params, errorCode: ErrorCode.INTERNAL_ERROR });
  }
}

/**
 * The schema rule a record broke
 */
export type RecordRule =
  | 'object'
  | 'required'
  | 'integer'
  | 'string'
  | 'non-empty'
  | 'range'
  | 'numeric';

/**
 * Individual validation failure details
 */
export interface ValidationFailure {
  position: number;
  field?: string;
  rule: RecordRule;
  /** ajv keyword that reported the violation */
  keyword: string;
  message: string;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wrap any thrown value into a PipelineError, keeping PipelineErrors as-is
 */
export function toPipelineError(error: unknown): PipelineError {
  if (isPipelineError(error)) return error;
  const cause = error instanceof Error ? error : undefined;
  const detail = error instanceof Error ? error.message : String(error);
  return new InternalError({
    message: `Unexpected error: ${detail || 'unknown failure'}`,
    cause,
  });
}

export function createValidationFailure(
  position: number,
  rule: RecordRule,
  keyword: string,
  message: string,
  field?: string
): ValidationFailure {
  return {
    position,
    field,
    rule,
    keyword,
    message,
  };
}
