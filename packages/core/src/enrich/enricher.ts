import type { EnrichedRecord, TaskRecord } from '../types/record.js';

/**
 * Count Unicode code points, so astral characters count once.
 */
export function countCharacters(text: string): number {
  let count = 0;
  for (const _char of text) count++;
  return count;
}

export function enrichRecord(record: TaskRecord): EnrichedRecord {
  // Literal order fixes the serialized key order
  return {
    id: record.id,
    name: record.name,
    value: record.value,
    processed: true,
    name_length: countCharacters(record.name),
  };
}

/**
 * Enricher: derive the output records. Pure and total; order is kept.
 */
export function enrich(records: readonly TaskRecord[]): EnrichedRecord[] {
  return records.map(enrichRecord);
}
