/**
 * Convert command - lint a metadata block and write it as TSV.
 */

import { Command } from 'commander';
import { convertFile } from '../lib/check.js';
import { addLintOptions, getLintRunOptions, reportFatalError, type LintRunOptions } from '../lib/command.js';
import { resolveLintSettings } from '../lib/config.js';
import { createTraceLogger, printError, printSuccess } from '../lib/output.js';
import { calculateSummary, exitCodeFor, outputFileResult } from '../lib/report.js';

export interface ConvertRunOptions extends LintRunOptions {
  outfile?: string | undefined;
}

/**
 * Lint one file and write the TSV block when no errors were found.
 * Returns the process exit code.
 */
export async function runConvert(file: string, options: ConvertRunOptions): Promise<number> {
  try {
    const trace = createTraceLogger(options.verbosity);
    const { config, validation } = await resolveLintSettings(options.configPath, options.cli, trace);

    const { result, outfile, written } = await convertFile(file, validation, options.outfile);
    if (result.violations.length > 0) {
      outputFileResult(result);
    }

    if (written) {
      printSuccess(`Wrote ${outfile}`);
    } else {
      printError('Errors detected. Could not convert to TSV.');
    }

    return exitCodeFor(calculateSummary([result]), config.warningExitCode);
  } catch (err) {
    return reportFatalError(err);
  }
}

export const convertCommand = addLintOptions(
  new Command('convert')
    .description('Convert a metadata block into a TSV metadata block')
    .addHelpText('after', `
The file is linted first; the output is only written when no errors were
found. By default the output is placed next to the input with a .tsv
extension.

Examples:
  mdblock convert citation.yml
  mdblock convert citation.yml --outfile build/citation.tsv`)
    .argument('<file>', 'Metadata block file to convert')
)
  .option('--outfile <path>', 'Where to write the TSV output')
  .action(async (file: string, _options: unknown, cmd: Command) => {
    const opts: Record<string, unknown> = cmd.opts();
    process.exitCode = await runConvert(file, {
      ...getLintRunOptions(cmd),
      outfile: typeof opts.outfile === 'string' ? opts.outfile : undefined,
    });
  });
