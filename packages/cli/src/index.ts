#!/usr/bin/env node

// CLI entry point
// - Command name: `taskpipe` with a single subcommand `process`.
// - `process` takes --input/--output and -v/--verbose, resolves the log level, then hands
//   the run to executePipeline() from @taskpipe/core, which reports every failure as a
//   PipelineResult instead of throwing.
// - Without a subcommand commander prints the usage on stderr and exits with 1.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  createLogger,
  executePipeline,
  toPipelineError,
  type LoggerConfig,
} from '@taskpipe/core';
import { renderCLIView } from './render.js';
import { resolveRunConfig, type CliOptions } from './flags.js';

export const VERSION = '0.1.0';

/**
 * Process-level collaborators, replaceable in tests
 */
export interface CliRuntime {
  /** Where log lines go; stderr when omitted */
  logDestination?: LoggerConfig['destination'];
  env?: NodeJS.ProcessEnv;
}

export function createProgram(runtime: CliRuntime = {}): Command {
  const program = new Command();

  program
    .name('taskpipe')
    .description('Validate task records from a JSON file and write them enriched')
    .version(VERSION);

  program
    .command('process')
    .description('Process a JSON input file')
    .requiredOption('--input <path>', 'Path to input JSON file')
    .requiredOption('--output <path>', 'Path to output JSON file')
    .option('-v, --verbose', 'Enable verbose (debug) logging', false)
    .action((options: CliOptions) => {
      const config = resolveRunConfig(options, runtime.env ?? process.env);
      const logger = createLogger({
        level: config.logLevel,
        destination: runtime.logDestination,
      });

      const result = executePipeline(config.inputPath, config.outputPath, {
        logger,
      });
      if (result.status !== 'completed') {
        process.exit(result.exitCode);
      }
    });

  return program;
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });
  const error = toPipelineError(err);

  console.error(renderCLIView(presenter.formatForCLI(error)));

  process.exit(error.getExitCode());
}

export async function main(
  argv: string[] = process.argv,
  runtime: CliRuntime = {}
): Promise<void> {
  await createProgram(runtime).parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
