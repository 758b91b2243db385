import chalk from 'chalk';
import type { TraceFn } from './lint/engine.js';

/**
 * Output mode for commands.
 */
export type OutputMode = 'text' | 'json';

/**
 * JSON output wrapper for success results.
 */
export interface JsonSuccess<T = unknown> {
  success: true;
  data?: T;
  path?: string;
  message?: string;
}

/**
 * JSON output wrapper for error results.
 */
export interface JsonError {
  success: false;
  error: string;
  code?: number;
}

/**
 * Combined JSON result type.
 */
export type JsonResult<T = unknown> = JsonSuccess<T> | JsonError;

/**
 * Exit codes for the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,
  VALIDATION_ERROR: 1,
  IO_ERROR: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Print output as JSON.
 */
export function printJson(data: JsonResult): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Create a success JSON response.
 */
export function jsonSuccess<T = unknown>(
  options: Omit<JsonSuccess<T>, 'success'> = {}
): JsonSuccess<T> {
  return { success: true, ...options };
}

/**
 * Create an error JSON response.
 */
export function jsonError(
  error: string,
  options: Omit<JsonError, 'success' | 'error'> = {}
): JsonError {
  return { success: false, error, ...options };
}

/**
 * Determine output mode from command options.
 */
export function getOutputMode(options: { output?: string | undefined }): OutputMode {
  return options.output === 'json' ? 'json' : 'text';
}

// ============================================================================
// Console helpers
// ============================================================================

export function printError(message: string): void {
  console.error(chalk.red(message));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(message));
}

/**
 * Tracing logger for `--verbose`. Messages above the verbosity are dropped;
 * verbosity 0 yields no logger at all.
 */
export function createTraceLogger(verbosity: number): TraceFn | undefined {
  if (verbosity <= 0) return undefined;
  return (level, message) => {
    if (level <= verbosity) {
      console.log(chalk.dim(message));
    }
  };
}
