import type { WriteStream } from 'node:fs';
import { open, stat } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { DateTime } from 'luxon';
import { ConfigurationError, FilePathSource, StreamSource, isNem12FormatError } from '@nem12sql/core';
import type { DataSource } from '@nem12sql/core';
import { SqlStatementGenerator } from '@nem12sql/sql';
import { USAGE, UsageError, parseCliArgs } from './args.js';
import type { CliCommand } from './args.js';
import { ExitCode } from './ExitCode.js';
import { createStreamLogger } from './Logger.js';
import type { Logger } from './Logger.js';
import { processFile } from './processFile.js';

export interface CliIo {
  readonly stdin: Readable;
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly clock?: () => DateTime;
}

/** Run the `nem12-sql` command and resolve with its exit code. */
export async function main(argv: readonly string[], io: CliIo): Promise<ExitCode> {
  const logger = createStreamLogger(io.stderr);

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(`Error: ${error.message}`);
      logger.error(USAGE);
      return ExitCode.USAGE;
    }
    throw error;
  }

  if (command.kind === 'help') {
    io.stdout.write(USAGE);
    return ExitCode.OK;
  }

  let generator: SqlStatementGenerator;
  try {
    generator = new SqlStatementGenerator({ batchSize: command.batchSize });
  } catch (error) {
    return reportFailure(error, logger);
  }

  let source: DataSource;
  if (command.inputPath === '-') {
    source = new StreamSource(io.stdin, { fileName: 'stdin' });
  } else {
    const problem = await checkInputFile(command.inputPath);
    if (problem !== null) {
      logger.error(`Error: ${problem.message}`);
      return problem.exitCode;
    }
    source = new FilePathSource(command.inputPath);
  }

  let fileOutput: WriteStream | null = null;
  let outputError: Error | null = null;
  if (command.outputPath !== undefined) {
    try {
      const handle = await open(command.outputPath, 'w');
      fileOutput = handle.createWriteStream({ encoding: 'utf-8' });
    } catch (error) {
      logger.error(`Error: Cannot open output file: ${errorMessage(error)}`);
      return ExitCode.FAILURE;
    }
    fileOutput.on('error', (error) => {
      outputError ??= error;
    });
  }

  let exitCode: ExitCode;
  try {
    const result = await processFile({ source, output: fileOutput ?? io.stdout, generator, logger, clock: io.clock });
    logger.info(`Successfully processed ${String(result.totalReadings)} readings.`);
    exitCode = ExitCode.OK;
  } catch (error) {
    exitCode = reportFailure(error, logger);
  }

  if (fileOutput !== null) {
    const closeError = await closeOutput(fileOutput);
    const writeFailure = outputError ?? closeError;
    if (writeFailure !== null && exitCode === ExitCode.OK) {
      logger.error(`Error: Cannot write output file: ${errorMessage(writeFailure)}`);
      return ExitCode.FAILURE;
    }
  }

  return exitCode;
}

/** End the stream and wait until it is flushed. Resolves with the stream's error, if any. */
async function closeOutput(stream: WriteStream): Promise<unknown> {
  stream.end();
  try {
    await finished(stream);
    return null;
  } catch (error) {
    return error;
  }
}

function reportFailure(error: unknown, logger: Logger): ExitCode {
  if (isNem12FormatError(error)) {
    logger.error(`Error: ${error.message}`);
    return ExitCode.DATA_ERROR;
  }
  if (error instanceof ConfigurationError) {
    logger.error(`Error: ${error.message}`);
    return ExitCode.USAGE;
  }
  logger.error(`Unexpected error: ${errorMessage(error)}`);
  return ExitCode.FAILURE;
}

interface InputProblem {
  readonly message: string;
  readonly exitCode: ExitCode;
}

async function checkInputFile(path: string): Promise<InputProblem | null> {
  try {
    const stats = await stat(path);
    return stats.isFile() ? null : { message: `Input path is not a file: ${path}`, exitCode: ExitCode.USAGE };
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { message: `Input file not found: ${path}`, exitCode: ExitCode.USAGE };
    }
    return { message: `Cannot read input file: ${errorMessage(error)}`, exitCode: ExitCode.FAILURE };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
