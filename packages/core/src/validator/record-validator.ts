/**
 * Schema Validator: checks one decoded record against TASK_RECORD_SCHEMA
 * and turns the first AJV violation into a positional SchemaError.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import {
  SchemaError,
  createValidationFailure,
  type RecordRule,
  type SchemaErrorCode,
  type ValidationFailure,
} from '../types/errors.js';
import type { TaskRecord } from '../types/record.js';
import { type Result, ok, err, isErr } from '../types/result.js';
import { TASK_RECORD_SCHEMA } from './record-schema.js';

// Stop at the first error so the reported rule is deterministic
const ajv = new Ajv({ allErrors: false, strict: true });
const validateShape: ValidateFunction<TaskRecord> =
  ajv.compile(TASK_RECORD_SCHEMA);

const CODE_BY_RULE: Record<RecordRule, SchemaErrorCode> = {
  object: ErrorCode.RECORD_NOT_OBJECT,
  required: ErrorCode.MISSING_REQUIRED_FIELD,
  integer: ErrorCode.INVALID_FIELD_TYPE,
  string: ErrorCode.INVALID_FIELD_TYPE,
  'non-empty': ErrorCode.EMPTY_NAME,
  range: ErrorCode.ID_OUT_OF_RANGE,
  numeric: ErrorCode.INVALID_FIELD_TYPE,
};

const TYPE_RULE_BY_FIELD: Record<string, RecordRule> = {
  id: 'integer',
  name: 'string',
  value: 'numeric',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Name the JSON type of a value for error messages. Booleans are reported
 * as `bool` and numbers are split into `int` and `float`.
 */
export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'boolean':
      return 'bool';
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    case 'string':
      return 'string';
    case 'object':
      return 'object';
    default:
      return typeof value;
  }
}

function describeRule(
  rule: RecordRule,
  position: number,
  field: string | undefined,
  actual: unknown
): string {
  const prefix = `Record at index ${position}`;
  switch (rule) {
    case 'object':
      return `${prefix} is not an object`;
    case 'required':
      return `${prefix} is missing required field '${field}'`;
    case 'integer':
      return `${prefix}: '${field}' must be an integer, got ${describeJsonType(actual)}`;
    case 'string':
      return `${prefix}: '${field}' must be a string, got ${describeJsonType(actual)}`;
    case 'non-empty':
      return `${prefix}: '${field}' must be a non-empty string`;
    case 'range':
      return `${prefix}: '${field}' is out of range, must be between ${Number.MIN_SAFE_INTEGER} and ${Number.MAX_SAFE_INTEGER}`;
    case 'numeric':
      return `${prefix}: '${field}' must be numeric, got ${describeJsonType(actual)}`;
  }
}

function ruleFor(error: ErrorObject): { rule: RecordRule; field?: string } {
  if (error.instancePath === '') {
    if (error.keyword === 'required') {
      const missing: unknown = error.params['missingProperty'];
      return {
        rule: 'required',
        field: typeof missing === 'string' ? missing : undefined,
      };
    }
    return { rule: 'object' };
  }

  const field = error.instancePath.slice(1);
  if (error.keyword === 'pattern') {
    return { rule: 'non-empty', field };
  }
  if (error.keyword === 'minimum' || error.keyword === 'maximum') {
    return { rule: 'range', field };
  }
  return { rule: TYPE_RULE_BY_FIELD[field] ?? 'object', field };
}

function toFailure(
  error: ErrorObject,
  record: unknown,
  position: number
): ValidationFailure {
  const { rule, field } = ruleFor(error);
  const actual =
    field !== undefined && isPlainObject(record) ? record[field] : record;
  return createValidationFailure(
    position,
    rule,
    error.keyword,
    describeRule(rule, position, field, actual),
    field
  );
}

/**
 * Validate one record without throwing.
 */
export function checkRecord(
  value: unknown,
  position: number
): Result<TaskRecord, SchemaError> {
  if (validateShape(value)) {
    return ok({ id: value.id, name: value.name, value: value.value });
  }

  const [first] = validateShape.errors ?? [];
  const failure: ValidationFailure = first
    ? toFailure(first, value, position)
    : createValidationFailure(
        position,
        'object',
        'unknown',
        describeRule('object', position, undefined, value)
      );

  return err(
    new SchemaError({
      message: failure.message,
      errorCode: CODE_BY_RULE[failure.rule],
      failure,
    })
  );
}

/**
 * Validate one record at its 0-based `position`, returning a copy holding
 * exactly `id`, `name` and `value`.
 *
 * @throws SchemaError naming the position and the first rule broken
 */
export function validateRecord(value: unknown, position: number): TaskRecord {
  const result = checkRecord(value, position);
  if (isErr(result)) throw result.error;
  return result.value;
}
