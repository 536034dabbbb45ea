import { describe, it, expect } from 'vitest';
/**
 * Property-based tests for the record and collection rules
 * Fixed seed so failures replay the same counterexample
 */

import fc from 'fast-check';

import { ErrorCode } from '../../errors/codes.js';
import { SchemaError } from '../../types/errors.js';
import { isErr, isOk } from '../../types/result.js';
import { REQUIRED_FIELDS } from '../../types/record.js';
import { checkRecord } from '../record-validator.js';
import { NAME_PATTERN } from '../record-schema.js';
import { validateCollection } from '../collection-validator.js';

const SEED = 424242;
const nameRule = new RegExp(NAME_PATTERN, 'u');

const nameArb = fc
  .string({ minLength: 1, maxLength: 12 })
  .filter((name) => nameRule.test(name));

const recordArb = fc.record({
  id: fc.integer({ min: -1000, max: 1000 }),
  name: nameArb,
  value: fc.oneof(
    fc.integer(),
    fc.double({ noNaN: true, noDefaultInfinity: true })
  ),
});

describe('record rules (properties)', () => {
  it('accepts every well-formed record unchanged', () => {
    fc.assert(
      fc.property(recordArb, fc.nat(50), (record, position) => {
        const result = checkRecord(record, position);
        expect(isOk(result) && result.value).toEqual(record);
      }),
      { seed: SEED }
    );
  });

  it('names the first missing field in id, name, value order', () => {
    fc.assert(
      fc.property(
        recordArb,
        fc.subarray([...REQUIRED_FIELDS], { minLength: 1 }),
        (record, dropped) => {
          const partial: Record<string, unknown> = { ...record };
          for (const field of dropped) delete partial[field];

          const expected = REQUIRED_FIELDS.find((f) => dropped.includes(f));
          const result = checkRecord(partial, 0);

          expect(isErr(result) && result.error.message).toBe(
            `Record at index 0 is missing required field '${expected}'`
          );
        }
      ),
      { seed: SEED }
    );
  });

  it('never takes a boolean for id or value', () => {
    fc.assert(
      fc.property(
        recordArb,
        fc.boolean(),
        fc.constantFrom('id', 'value'),
        (record, flag, field) => {
          const result = checkRecord({ ...record, [field]: flag }, 1);

          expect(isErr(result) && result.error.errorCode).toBe(
            ErrorCode.INVALID_FIELD_TYPE
          );
          expect(isErr(result) && result.error.message).toContain('got bool');
        }
      ),
      { seed: SEED }
    );
  });

  it('rejects every id whose magnitude exceeds the safe integer range', () => {
    fc.assert(
      fc.property(
        recordArb,
        fc.double({ min: 2 ** 53, max: Number.MAX_VALUE, noNaN: true }),
        fc.boolean(),
        (record, magnitude, negative) => {
          const id = negative ? -magnitude : magnitude;
          const result = checkRecord({ ...record, id }, 0);

          expect(isErr(result) && result.error.errorCode).toBe(
            ErrorCode.ID_OUT_OF_RANGE
          );
        }
      ),
      { seed: SEED }
    );
  });

  it('rejects a collection exactly when an id repeats', () => {
    fc.assert(
      fc.property(fc.array(recordArb, { maxLength: 20 }), (records) => {
        const ids = records.map((r) => r.id);
        const hasDuplicate = new Set(ids).size !== ids.length;

        if (!hasDuplicate) {
          expect(validateCollection(records)).toEqual(records);
          return;
        }

        const firstRepeat = ids.find((id, index) => ids.indexOf(id) !== index);
        expect(() => validateCollection(records)).toThrow(SchemaError);
        expect(() => validateCollection(records)).toThrow(
          `Duplicate id found: ${firstRepeat}`
        );
      }),
      { seed: SEED }
    );
  });
});
