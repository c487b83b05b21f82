export { main } from './main.js';
export type { CliIo } from './main.js';
export { processFile } from './processFile.js';
export type { ProcessFileOptions, ProcessFileResult } from './processFile.js';
export { parseCliArgs, UsageError, USAGE } from './args.js';
export type { CliCommand } from './args.js';
export { ExitCode } from './ExitCode.js';
export { createStreamLogger, silentLogger } from './Logger.js';
export type { Logger } from './Logger.js';
