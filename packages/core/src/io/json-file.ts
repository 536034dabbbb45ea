/**
 * File collaborators of the pipeline: read one JSON document, write one.
 * Both report failures as Results instead of throwing.
 */

import fs from 'node:fs';

import { ErrorCode } from '../errors/codes.js';
import { InputError, OutputError } from '../types/errors.js';
import { type Result, ok, err, tryCatch } from '../types/result.js';

export type JsonReader = (inputPath: string) => Result<unknown, InputError>;

export type JsonWriter = (
  outputPath: string,
  data: unknown
) => Result<void, OutputError>;

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const code: unknown = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function causeOf(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readFailure(inputPath: string, error: unknown): InputError {
  const cause = causeOf(error);
  const context = { path: inputPath };
  switch (errnoCode(error)) {
    case 'ENOENT':
      return new InputError({
        message: `Input file not found: ${inputPath}`,
        errorCode: ErrorCode.INPUT_NOT_FOUND,
        context,
        cause,
      });
    case 'EACCES':
    case 'EPERM':
      return new InputError({
        message: `Permission denied reading file: ${inputPath}`,
        errorCode: ErrorCode.INPUT_PERMISSION_DENIED,
        context,
        cause,
      });
    default:
      return new InputError({
        message: `Error reading input file: ${messageOf(error)}`,
        errorCode: ErrorCode.INPUT_READ_FAILED,
        context,
        cause,
      });
  }
}

// Invalid byte sequences throw instead of becoming U+FFFD; a BOM is kept
// so the JSON parser rejects it
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Read and decode a UTF-8 JSON document.
 */
export const readJsonFile: JsonReader = (inputPath) => {
  let raw: string;
  try {
    raw = utf8.decode(fs.readFileSync(inputPath));
  } catch (error) {
    return err(readFailure(inputPath, error));
  }

  return tryCatch(
    (): unknown => JSON.parse(raw),
    (error) =>
      new InputError({
        message: `Invalid JSON in input file: ${messageOf(error)}`,
        errorCode: ErrorCode.INPUT_INVALID_JSON,
        context: { path: inputPath },
        cause: causeOf(error),
      })
  );
};

/**
 * Serialize `data` with 2-space indentation and write it as UTF-8.
 */
export const writeJsonFile: JsonWriter = (outputPath, data) => {
  try {
    fs.writeFileSync(outputPath, JSON.stringify(data, null, 2) + '\n', 'utf8');
    return ok(undefined);
  } catch (error) {
    const code = errnoCode(error);
    const denied = code === 'EACCES' || code === 'EPERM';
    return err(
      new OutputError({
        message: denied
          ? `Permission denied writing to file: ${outputPath}`
          : `Error writing output file: ${messageOf(error)}`,
        errorCode: denied
          ? ErrorCode.OUTPUT_PERMISSION_DENIED
          : ErrorCode.OUTPUT_WRITE_FAILED,
        context: { path: outputPath },
        cause: causeOf(error),
      })
    );
  }
};
