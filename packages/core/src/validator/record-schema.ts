import type { JSONSchemaType } from 'ajv';

import type { TaskRecord } from '../types/record.js';

/**
 * A name must hold at least one character outside this whitespace set:
 * ASCII whitespace, the information separators U+001C..U+001F, NEL and
 * the Unicode space separators. U+FEFF is not whitespace here.
 */
export const NAME_PATTERN =
  '[^\\t\\n\\v\\f\\r \\u001c-\\u001f\\u0085\\u00a0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000]';

/**
 * JSON Schema for one task record.
 *
 * Keyword order is significant: with `allErrors: false` AJV reports the
 * first violation in the order type → required (id, name, value) →
 * properties (id, name, value), which is the rule order surfaced to users.
 * `id` is bounded to the safe integer range: larger ids cannot be decoded
 * exactly, so they are rejected instead of rewritten.
 */
export const TASK_RECORD_SCHEMA: JSONSchemaType<TaskRecord> = {
  type: 'object',
  required: ['id', 'name', 'value'],
  properties: {
    id: {
      type: 'integer',
      minimum: Number.MIN_SAFE_INTEGER,
      maximum: Number.MAX_SAFE_INTEGER,
    },
    name: { type: 'string', pattern: NAME_PATTERN },
    value: { type: 'number' },
  },
  additionalProperties: true,
};
