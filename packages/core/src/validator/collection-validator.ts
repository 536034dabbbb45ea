import { ErrorCode } from '../errors/codes.js';
import { SchemaError } from '../types/errors.js';
import type { TaskRecord } from '../types/record.js';
import { validateRecord } from './record-validator.js';

/**
 * Input Validator: validates every record of the decoded document in
 * order and rejects the first repeated `id`.
 *
 * @throws SchemaError when `data` is not an array, when a record breaks a
 * schema rule, or on the first duplicate id
 */
export function validateCollection(data: unknown): TaskRecord[] {
  if (!Array.isArray(data)) {
    throw new SchemaError({
      message: 'Input must be a JSON array',
      errorCode: ErrorCode.INPUT_NOT_ARRAY,
    });
  }

  const records: TaskRecord[] = [];
  const seenIds = new Set<number>();

  data.forEach((item: unknown, position) => {
    const record = validateRecord(item, position);
    if (seenIds.has(record.id)) {
      throw new SchemaError({
        message: `Duplicate id found: ${record.id}`,
        errorCode: ErrorCode.DUPLICATE_ID,
        context: { position, field: 'id', value: record.id },
      });
    }
    seenIds.add(record.id);
    records.push(record);
  });

  return records;
}
