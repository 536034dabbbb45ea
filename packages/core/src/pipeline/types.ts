import type { JsonReader, JsonWriter } from '../io/json-file.js';
import type { PipelineError } from '../types/errors.js';
import type { EnrichedRecord, TaskRecord } from '../types/record.js';
import type { Logger } from '../util/logger.js';

export type PipelineStageName = 'read' | 'validate' | 'enrich' | 'write';

export type PipelineStageStatus =
  | 'pending'
  | 'completed'
  | 'failed'
  | 'skipped';

export type PipelineStatus = 'completed' | 'failed';

export class PipelineStageError extends Error {
  public readonly stage: PipelineStageName;
  public override readonly cause: PipelineError;

  constructor(stage: PipelineStageName, cause: PipelineError) {
    super(cause.message, { cause });
    this.name = 'PipelineStageError';
    this.stage = stage;
    this.cause = cause;
  }

  get exitCode(): number {
    return this.cause.getExitCode();
  }
}

export interface PipelineStageReport<TOutput> {
  status: PipelineStageStatus;
  durationMs?: number;
  output?: TOutput;
  error?: PipelineStageError;
}

export interface PipelineStages {
  read: PipelineStageReport<unknown>;
  validate: PipelineStageReport<TaskRecord[]>;
  enrich: PipelineStageReport<EnrichedRecord[]>;
  write: PipelineStageReport<{ path: string; count: number }>;
}

export interface PipelineArtifacts {
  validated?: TaskRecord[];
  enriched?: EnrichedRecord[];
}

export interface PipelineOptions {
  /** Diagnostics sink; defaults to a silent logger */
  logger?: Logger;
  /** Replaces the file-system reader */
  reader?: JsonReader;
  /** Replaces the file-system writer */
  writer?: JsonWriter;
}

export interface PipelineResult {
  status: PipelineStatus;
  /** 0 on success, otherwise the exit code of the failing error */
  exitCode: number;
  inputPath: string;
  outputPath: string;
  stages: PipelineStages;
  timeline: PipelineStageName[];
  errors: PipelineStageError[];
  artifacts: PipelineArtifacts;
}
