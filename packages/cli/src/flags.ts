import { isLogLevel, type LogLevel } from '@taskpipe/core';

export const LOG_LEVEL_ENV = 'TASKPIPE_LOG_LEVEL';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  input?: string;
  output?: string;
  verbose?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

/**
 * Effective settings of one `process` run
 */
export interface RunConfig {
  inputPath: string;
  outputPath: string;
  logLevel: LogLevel;
}

/**
 * --verbose wins; otherwise TASKPIPE_LOG_LEVEL when it names a known
 * level; otherwise info.
 */
export function resolveLogLevel(
  options: Pick<CliOptions, 'verbose'>,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  if (options.verbose === true) return 'debug';
  const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function resolveRunConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  if (!options.input) throw new Error('Missing --input <path>');
  if (!options.output) throw new Error('Missing --output <path>');
  return {
    inputPath: options.input,
    outputPath: options.output,
    logLevel: resolveLogLevel(options, env),
  };
}
