import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import type { ZodIssue } from 'zod';
import { LintConfigSchema, type LintConfig } from '../types/config.js';
import { ConfigError } from './errors.js';
import type { TraceFn } from './lint/engine.js';
import { buildOverrideConfig } from './lint/overrides.js';
import type { ValidationOptions } from './validation.js';

/**
 * Lint settings given on the command line. Lists are appended to the
 * configuration file's lists; scalars replace the file's values.
 */
export interface LintCliOptions {
  error?: string[] | undefined;
  warn?: string[] | undefined;
  skip?: string[] | undefined;
  warningExitCode?: number | undefined;
  minPrefixLength?: number | undefined;
  typoThreshold?: number | undefined;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validate raw configuration data.
 *
 * @throws ConfigError when the data does not match the schema
 */
export function parseLintConfig(raw: unknown, source = 'configuration'): LintConfig {
  const result = LintConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${source}:\n${result.error.issues.map(formatIssue).join('\n')}`
    );
  }
  return result.data;
}

/**
 * Load a YAML or JSON configuration file. Without a path the defaults apply.
 *
 * @throws ConfigError when the file cannot be read, parsed or validated
 */
export async function loadLintConfig(path?: string): Promise<LintConfig> {
  if (path === undefined) {
    return parseLintConfig({});
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not read configuration file '${path}': ${reason}`);
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
    throw new ConfigError(`Could not parse configuration file '${path}': ${reason}`);
  }

  return parseLintConfig(raw, `configuration file '${path}'`);
}

export function mergeCliOptions(config: LintConfig, cli: LintCliOptions): LintConfig {
  return {
    error: [...config.error, ...(cli.error ?? [])],
    warn: [...config.warn, ...(cli.warn ?? [])],
    skip: [...config.skip, ...(cli.skip ?? [])],
    warningExitCode: cli.warningExitCode ?? config.warningExitCode,
    minPrefixLength: cli.minPrefixLength ?? config.minPrefixLength,
    typoThreshold: cli.typoThreshold ?? config.typoThreshold,
  };
}

/**
 * Resolve a configuration into validation options.
 *
 * @throws UnknownRuleError for an unknown rule identifier
 */
export function toValidationOptions(config: LintConfig, trace?: TraceFn): ValidationOptions {
  return {
    overrides: buildOverrideConfig({ error: config.error, warn: config.warn, skip: config.skip }),
    minPrefixLength: config.minPrefixLength,
    typoThreshold: config.typoThreshold,
    trace,
  };
}

export interface LintSettings {
  config: LintConfig;
  validation: ValidationOptions;
}

/**
 * Configuration file plus command-line settings, resolved for a run.
 *
 * @throws ConfigError for an unreadable or invalid configuration file
 * @throws UnknownRuleError for an unknown rule identifier
 */
export async function resolveLintSettings(
  configPath: string | undefined,
  cli: LintCliOptions,
  trace?: TraceFn
): Promise<LintSettings> {
  const config = parseLintConfig(mergeCliOptions(await loadLintConfig(configPath), cli), 'command-line options');
  return { config, validation: toValidationOptions(config, trace) };
}
