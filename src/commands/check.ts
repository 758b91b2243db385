/**
 * Check command - lint metadata block files without writing anything.
 */

import { Command } from 'commander';
import { checkFiles } from '../lib/check.js';
import { addLintOptions, getLintRunOptions, reportFatalError, type LintRunOptions } from '../lib/command.js';
import { resolveLintSettings } from '../lib/config.js';
import { createTraceLogger } from '../lib/output.js';
import { calculateSummary, exitCodeFor, outputJsonResults, outputTextResults } from '../lib/report.js';

/**
 * Lint the given files and print the results.
 * Returns the process exit code.
 */
export async function runCheck(files: readonly string[], options: LintRunOptions): Promise<number> {
  const jsonMode = options.jsonMode ?? false;
  try {
    // Trace lines would corrupt JSON output
    const trace = jsonMode ? undefined : createTraceLogger(options.verbosity);
    const { config, validation } = await resolveLintSettings(options.configPath, options.cli, trace);

    const results = await checkFiles(files, validation);
    const summary = calculateSummary(results);

    if (jsonMode) {
      outputJsonResults(results, summary);
    } else {
      outputTextResults(results, summary);
    }

    return exitCodeFor(summary, config.warningExitCode);
  } catch (err) {
    return reportFatalError(err, jsonMode);
  }
}

export const checkCommand = addLintOptions(
  new Command('check')
    .description('Lint metadata block files (YAML or TSV) and report violations')
    .addHelpText('after', `
Exit codes:
  0  No violations (or only warnings, unless --warning-exit-code is set)
  1  At least one error
  2  An input file could not be read
  3  Invalid configuration or unknown rule

Examples:
  mdblock check citation.yml
  mdblock check blocks/*.tsv --skip name_prefix_typos
  mdblock check citation.yml -w e001 --warning-exit-code 4
  mdblock check citation.yml --output json`)
    .argument('<files...>', 'Metadata block files to check')
)
  .option('-o, --output <format>', 'Output format: text (default) or json')
  .action(async (files: string[], _options: unknown, cmd: Command) => {
    process.exitCode = await runCheck(files, getLintRunOptions(cmd));
  });
