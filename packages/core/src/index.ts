// @taskpipe/core entry point
//
// Public API:
// - executePipeline(): read → validate → enrich → write, returning a PipelineResult
// - the stage building blocks (validateRecord/checkRecord, validateCollection, enrich)
//   and the JSON file collaborators they are wired to by default
// - the error taxonomy, Result type and the pino logger factory

export * from './types/index.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  EXIT_SUCCESS,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Stages
export {
  NAME_PATTERN,
  TASK_RECORD_SCHEMA,
  checkRecord,
  validateRecord,
  validateCollection,
  describeJsonType,
} from './validator/index.js';
export { enrich, enrichRecord, countCharacters } from './enrich/enricher.js';
export {
  readJsonFile,
  writeJsonFile,
  type JsonReader,
  type JsonWriter,
} from './io/json-file.js';

// Logging
export {
  createLogger,
  createSilentLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type Logger,
  type LoggerConfig,
} from './util/logger.js';

// Pipeline
export { executePipeline } from './pipeline/orchestrator.js';
export {
  PipelineStageError,
  type PipelineArtifacts,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStageName,
  type PipelineStageReport,
  type PipelineStageStatus,
  type PipelineStages,
  type PipelineStatus,
} from './pipeline/types.js';
