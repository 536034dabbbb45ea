/**
 * Record shapes flowing through the pipeline
 */

/** A decoded JSON value that has not been validated yet */
export type RawRecord = unknown;

/** A record that passed every schema rule */
export interface TaskRecord {
  readonly id: number;
  readonly name: string;
  readonly value: number;
}

/** A validated record plus the fields derived by the enricher */
export interface EnrichedRecord extends TaskRecord {
  readonly processed: true;
  readonly name_length: number;
}

export const REQUIRED_FIELDS = ['id', 'name', 'value'] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];
