import { InvalidArgumentError, type Command } from 'commander';
import type { LintCliOptions } from './config.js';
import { ConfigError, InputReadError, OutputWriteError, UnknownRuleError } from './errors.js';
import { ExitCodes, jsonError, printError, printJson, type ExitCode } from './output.js';

/**
 * Global options available at the root command level.
 * These are defined on the main `mdblock` command and accessible from any subcommand.
 */
export interface GlobalOptions {
  config?: string;
}

/**
 * Get global options (like --config) from any command depth.
 *
 * Uses Commander's optsWithGlobals() so subcommands never walk `cmd.parent`.
 *
 * Note: the returned object has truly optional properties (absent if not
 * set) rather than properties with undefined values, as required by
 * exactOptionalPropertyTypes.
 */
export function getGlobalOpts(cmd: Command): GlobalOptions {
  const opts: Record<string, unknown> = cmd.optsWithGlobals();
  const result: GlobalOptions = {};
  if (typeof opts.config === 'string') result.config = opts.config;
  return result;
}

/**
 * Commander argument parser for non-negative integers.
 */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

/**
 * Commander argument parser for integers of at least 1.
 */
export function parsePositiveCount(value: string): number {
  const count = parseCount(value);
  if (count < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return count;
}

/**
 * Collect repeatable, comma-separable rule identifiers.
 */
export function collectRules(value: string, previous: string[]): string[] {
  const identifiers = value.split(',').map(part => part.trim()).filter(part => part !== '');
  return [...previous, ...identifiers];
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Options shared by every command that lints input files.
 */
export function addLintOptions(cmd: Command): Command {
  return cmd
    .option('-e, --error <rules>', 'Report these rules as errors (name or code, repeatable)', collectRules, [])
    .option('-w, --warn <rules>', 'Report these rules as warnings (name or code, repeatable)', collectRules, [])
    .option('-s, --skip <rules>', 'Do not run these rules (name or code, repeatable)', collectRules, [])
    .option('--warning-exit-code <code>', 'Exit code when only warnings are found', parseCount)
    .option('--min-prefix-length <n>', 'Shortest shared prefix that groups field names', parsePositiveCount)
    .option('--typo-threshold <n>', 'Largest edit distance reported as a likely typo', parseCount)
    .option('-v, --verbose', 'Print performed checks (repeat for more detail)', increaseVerbosity, 0);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

/**
 * Lint settings from a command's parsed options.
 */
export function getLintCliOptions(cmd: Command): LintCliOptions {
  const opts: Record<string, unknown> = cmd.opts();
  return {
    error: stringList(opts.error),
    warn: stringList(opts.warn),
    skip: stringList(opts.skip),
    warningExitCode: numberOption(opts.warningExitCode),
    minPrefixLength: numberOption(opts.minPrefixLength),
    typoThreshold: numberOption(opts.typoThreshold),
  };
}

export function getVerbosity(cmd: Command): number {
  const opts: Record<string, unknown> = cmd.opts();
  return numberOption(opts.verbose) ?? 0;
}

/**
 * Everything a lint run needs from the command line.
 */
export interface LintRunOptions {
  configPath?: string | undefined;
  cli: LintCliOptions;
  verbosity: number;
  jsonMode?: boolean | undefined;
}

export function getLintRunOptions(cmd: Command): LintRunOptions {
  const opts: Record<string, unknown> = cmd.opts();
  return {
    configPath: getGlobalOpts(cmd).config,
    cli: getLintCliOptions(cmd),
    verbosity: getVerbosity(cmd),
    jsonMode: opts.output === 'json',
  };
}

/**
 * Exit code for a fatal error.
 */
export function exitCodeForError(err: unknown): ExitCode | null {
  if (err instanceof UnknownRuleError || err instanceof ConfigError) return ExitCodes.CONFIG_ERROR;
  if (err instanceof InputReadError || err instanceof OutputWriteError) return ExitCodes.IO_ERROR;
  return null;
}

/**
 * Print a fatal error and return the exit code it maps to.
 * Unexpected errors are rethrown.
 */
export function reportFatalError(err: unknown, jsonMode = false): ExitCode {
  const code = exitCodeForError(err);
  if (code === null || !(err instanceof Error)) {
    throw err;
  }
  if (jsonMode) {
    printJson(jsonError(err.message, { code }));
  } else {
    printError(err.message);
  }
  return code;
}
