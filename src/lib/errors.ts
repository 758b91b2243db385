/**
 * Shared error types for mdblock commands.
 *
 * Lint findings are never thrown; they are returned as violations. These
 * errors stand for conditions under which a run cannot proceed at all, and
 * are caught at the top of each command action to pick the exit code.
 */

/**
 * Thrown when a rule override names a rule that does not exist.
 *
 * @example
 * ```ts
 * buildOverrideConfig({ skip: ['no_such_rule'] }); // throws UnknownRuleError
 * ```
 */
export class UnknownRuleError extends Error {
  readonly identifier: string;
  readonly validNames: readonly string[];

  constructor(identifier: string, validNames: readonly string[]) {
    super(
      `Could not find lint with name or id '${identifier}'.\n`
        + `Valid lint names are:\n${validNames.join('\n')}`
    );
    this.name = 'UnknownRuleError';
    this.identifier = identifier;
    this.validNames = validNames;
  }
}

/**
 * Thrown when a configuration file cannot be read or does not match the
 * expected shape.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an input file cannot be read. All inputs are read before any
 * of them is linted, so this aborts the run before processing starts.
 */
export class InputReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read input file '${path}': ${reason}`);
    this.name = 'InputReadError';
    this.path = path;
  }
}

/**
 * Thrown when converted output cannot be written, including the case where
 * the output path is the input file itself.
 */
export class OutputWriteError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Could not write output file '${path}': ${reason}`);
    this.name = 'OutputWriteError';
    this.path = path;
  }
}
