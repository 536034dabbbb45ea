import { describe, it, expect } from 'vitest';
/**
 * Tests for the PipelineError hierarchy
 */

import {
  PipelineError,
  InputError,
  SchemaError,
  OutputError,
  InternalError,
  isPipelineError,
  toPipelineError,
  createValidationFailure,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('Error Hierarchy', () => {
  describe('PipelineError base class', () => {
    class TestError extends PipelineError {
      constructor(message: string) {
        super({ message, errorCode: ErrorCode.INTERNAL_ERROR });
      }
    }

    it('creates error with params object', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('serializes differently for dev and prod', () => {
      const error = new InputError({
        message: 'Serialize me',
        errorCode: ErrorCode.INPUT_READ_FAILED,
        context: { path: 'in.json', value: { secret: 'test-secret' } },
        cause: new Error('root cause'),
      });

      const devJson = error.toJSON('dev');
      const prodJson = error.toJSON('prod');

      expect(devJson.stack).toBeDefined();
      expect(devJson.context?.value).toEqual({ secret: 'test-secret' });
      expect(devJson.cause).toEqual({ name: 'Error', message: 'root cause' });

      expect(prodJson.stack).toBeUndefined();
      expect(prodJson.context).toEqual({ path: 'in.json' });
      expect(prodJson.errorCode).toBe('E103');
    });
  });

  describe('subclasses', () => {
    it('InputError exposes the path', () => {
      const error = new InputError({
        message: 'Input file not found: missing.json',
        errorCode: ErrorCode.INPUT_NOT_FOUND,
        context: { path: 'missing.json' },
      });

      expect(error.name).toBe('InputError');
      expect(error.path).toBe('missing.json');
      expect(error.getExitCode()).toBe(1);
    });

    it('SchemaError copies the failure position and field into its context', () => {
      const failure = createValidationFailure(
        3,
        'integer',
        'type',
        "Record at index 3: 'id' must be an integer, got string",
        'id'
      );
      const error = new SchemaError({
        message: failure.message,
        errorCode: ErrorCode.INVALID_FIELD_TYPE,
        failure,
      });

      expect(error.name).toBe('SchemaError');
      expect(error.position).toBe(3);
      expect(error.failure).toEqual({
        position: 3,
        field: 'id',
        rule: 'integer',
        keyword: 'type',
        message: "Record at index 3: 'id' must be an integer, got string",
      });
      expect(error.context).toEqual({ position: 3, field: 'id' });
    });

    it('SchemaError without a failure keeps the given context', () => {
      const error = new SchemaError({
        message: 'Input must be a JSON array',
        errorCode: ErrorCode.INPUT_NOT_ARRAY,
      });

      expect(error.failure).toBeUndefined();
      expect(error.position).toBeUndefined();
      expect(error.context).toBeUndefined();
    });

    it('OutputError and InternalError carry their codes', () => {
      const output = new OutputError({
        message: 'Permission denied writing to file: out.json',
        errorCode: ErrorCode.OUTPUT_PERMISSION_DENIED,
        context: { path: 'out.json' },
      });
      const internal = new InternalError({ message: 'Unexpected error: boom' });

      expect(output.path).toBe('out.json');
      expect(output.errorCode).toBe(ErrorCode.OUTPUT_PERMISSION_DENIED);
      expect(internal.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
    });
  });

  describe('helpers', () => {
    it('isPipelineError separates pipeline errors from plain errors', () => {
      expect(isPipelineError(new InternalError({ message: 'x' }))).toBe(true);
      expect(isPipelineError(new Error('x'))).toBe(false);
      expect(isPipelineError('x')).toBe(false);
    });

    it('toPipelineError keeps pipeline errors unchanged', () => {
      const original = new SchemaError({
        message: 'Duplicate id found: 1',
        errorCode: ErrorCode.DUPLICATE_ID,
      });

      expect(toPipelineError(original)).toBe(original);
    });

    it('toPipelineError wraps plain errors and thrown values', () => {
      const cause = new TypeError('boom');
      const wrapped = toPipelineError(cause);

      expect(wrapped).toBeInstanceOf(InternalError);
      expect(wrapped.message).toBe('Unexpected error: boom');
      expect(wrapped.cause).toBe(cause);

      expect(toPipelineError('bad thing').message).toBe(
        'Unexpected error: bad thing'
      );
      expect(toPipelineError(new Error('')).message).toBe(
        'Unexpected error: unknown failure'
      );
    });
  });
});
