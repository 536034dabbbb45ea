import { performance } from 'node:perf_hooks';

import { enrich } from '../enrich/enricher.js';
import { EXIT_SUCCESS } from '../errors/codes.js';
import { readJsonFile, writeJsonFile } from '../io/json-file.js';
import { toPipelineError } from '../types/errors.js';
import { type Result, ok, err, isErr } from '../types/result.js';
import { createSilentLogger, type Logger } from '../util/logger.js';
import { validateCollection } from '../validator/collection-validator.js';
import {
  PipelineStageError,
  type PipelineArtifacts,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStageName,
  type PipelineStages,
} from './types.js';

const STAGE_SEQUENCE: PipelineStageName[] = [
  'read',
  'validate',
  'enrich',
  'write',
];

interface RunContext {
  inputPath: string;
  outputPath: string;
  logger: Logger;
  stages: PipelineStages;
  timeline: PipelineStageName[];
  errors: PipelineStageError[];
  artifacts: PipelineArtifacts;
}

function createStages(): PipelineStages {
  return {
    read: { status: 'pending' },
    validate: { status: 'pending' },
    enrich: { status: 'pending' },
    write: { status: 'pending' },
  };
}

/**
 * Run one stage, recording its status and duration. Whatever the stage
 * throws comes back as a PipelineStageError.
 */
function runStage<T>(
  ctx: RunContext,
  stage: PipelineStageName,
  fn: () => T
): Result<T, PipelineStageError> {
  const report = ctx.stages[stage];
  ctx.timeline.push(stage);
  ctx.logger.debug({ stage }, `Stage ${stage} started`);
  const started = performance.now();

  try {
    const value = fn();
    report.status = 'completed';
    report.durationMs = performance.now() - started;
    ctx.logger.debug(
      { stage, durationMs: report.durationMs },
      `Stage ${stage} completed`
    );
    return ok(value);
  } catch (error) {
    const stageError = new PipelineStageError(stage, toPipelineError(error));
    report.status = 'failed';
    report.durationMs = performance.now() - started;
    report.error = stageError;
    ctx.errors.push(stageError);
    return err(stageError);
  }
}

function finish(ctx: RunContext, failure?: PipelineStageError): PipelineResult {
  for (const stage of STAGE_SEQUENCE) {
    if (ctx.stages[stage].status === 'pending') {
      ctx.stages[stage].status = 'skipped';
    }
  }

  if (failure) {
    ctx.logger.error(
      {
        stage: failure.stage,
        errorCode: failure.cause.errorCode,
        error: failure.cause.toJSON('prod'),
      },
      failure.message
    );
  }

  return {
    status: failure ? 'failed' : 'completed',
    exitCode: failure ? failure.exitCode : EXIT_SUCCESS,
    inputPath: ctx.inputPath,
    outputPath: ctx.outputPath,
    stages: ctx.stages,
    timeline: ctx.timeline,
    errors: ctx.errors,
    artifacts: ctx.artifacts,
  };
}

/**
 * Pipeline Orchestrator: read → validate → enrich → write.
 *
 * Never throws. The first failing stage ends the run, later stages are
 * marked `skipped`, and the returned result carries the exit code.
 */
export function executePipeline(
  inputPath: string,
  outputPath: string,
  options: PipelineOptions = {}
): PipelineResult {
  const reader = options.reader ?? readJsonFile;
  const writer = options.writer ?? writeJsonFile;
  const ctx: RunContext = {
    inputPath,
    outputPath,
    logger: options.logger ?? createSilentLogger(),
    stages: createStages(),
    timeline: [],
    errors: [],
    artifacts: {},
  };
  const { logger, stages, artifacts } = ctx;

  const read = runStage(ctx, 'read', () => reader(inputPath).unwrap());
  if (isErr(read)) return finish(ctx, read.error);
  const data = read.value;
  stages.read.output = data;
  logger.info(`Successfully read input file: ${inputPath}`);

  const validated = runStage(ctx, 'validate', () => validateCollection(data));
  if (isErr(validated)) return finish(ctx, validated.error);
  const records = validated.value;
  stages.validate.output = records;
  artifacts.validated = records;
  logger.debug({ count: records.length }, 'Input records validated');

  const enriched = runStage(ctx, 'enrich', () => enrich(records));
  if (isErr(enriched)) return finish(ctx, enriched.error);
  const output = enriched.value;
  stages.enrich.output = output;
  artifacts.enriched = output;

  const written = runStage(ctx, 'write', () => {
    writer(outputPath, output).unwrap();
    return { path: outputPath, count: output.length };
  });
  if (isErr(written)) return finish(ctx, written.error);
  stages.write.output = written.value;
  logger.info(`Successfully wrote output file: ${outputPath}`);
  logger.info(`Successfully processed ${output.length} records`);

  return finish(ctx);
}
