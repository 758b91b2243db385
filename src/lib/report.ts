/**
 * Lint result reporting.
 *
 * Summaries, exit codes and the text and JSON renderings of a run.
 */

import chalk from 'chalk';
import {
  compareSeverity,
  formatViolation,
  mostSevere,
  type EffectiveSeverity,
  type LintViolation,
} from './lint/types.js';
import { ExitCodes, jsonSuccess, printJson } from './output.js';

/**
 * Lint outcome for one input file, reader findings included.
 */
export interface FileLintResult {
  path: string;
  violations: LintViolation[];
  longestRow: number;
}

export interface LintSummary {
  filesChecked: number;
  filesWithErrors: number;
  filesWithWarnings: number;
  totalErrors: number;
  totalWarnings: number;
  mostSevere: EffectiveSeverity;
}

// ============================================================================
// Summary Calculation
// ============================================================================

export function calculateSummary(results: readonly FileLintResult[]): LintSummary {
  let filesWithErrors = 0;
  let filesWithWarnings = 0;
  let totalErrors = 0;
  let totalWarnings = 0;
  let worst: EffectiveSeverity = 'none';

  for (const result of results) {
    const errors = result.violations.filter(v => v.severity === 'error').length;
    const warnings = result.violations.filter(v => v.severity === 'warning').length;

    if (errors > 0) filesWithErrors++;
    if (warnings > 0 && errors === 0) filesWithWarnings++;

    totalErrors += errors;
    totalWarnings += warnings;

    const fileSeverity = mostSevere(result.violations);
    if (compareSeverity(fileSeverity, worst) > 0) worst = fileSeverity;
  }

  return {
    filesChecked: results.length,
    filesWithErrors,
    filesWithWarnings,
    totalErrors,
    totalWarnings,
    mostSevere: worst,
  };
}

/**
 * Process exit code for a finished run.
 */
export function exitCodeFor(summary: LintSummary, warningExitCode: number): number {
  switch (summary.mostSevere) {
    case 'error':
      return ExitCodes.VALIDATION_ERROR;
    case 'warning':
      return warningExitCode;
    case 'none':
      return ExitCodes.SUCCESS;
  }
}

// ============================================================================
// JSON Output
// ============================================================================

export function outputJsonResults(results: readonly FileLintResult[], summary: LintSummary): void {
  printJson(jsonSuccess({
    data: {
      files: results.map(r => ({
        path: r.path,
        mostSevere: mostSevere(r.violations),
        violations: r.violations,
      })),
      summary,
    },
  }));
}

// ============================================================================
// Text Output
// ============================================================================

function formatLevel(level: EffectiveSeverity): string {
  switch (level) {
    case 'error':
      return chalk.red('ERROR');
    case 'warning':
      return chalk.yellow('WARNING');
    case 'none':
      return chalk.green('none');
  }
}

/**
 * Print the violations of one file.
 */
export function outputFileResult(result: FileLintResult): void {
  console.log(chalk.cyan(result.path));

  if (result.violations.length === 0) {
    console.log(chalk.green('  ✓ All checks passed'));
    console.log('');
    return;
  }

  console.log(`A total of ${result.violations.length} lint(s) failed.`);
  console.log(`Most severe level: ${formatLevel(mostSevere(result.violations))}`);
  for (const violation of result.violations) {
    const symbol = violation.severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
    console.log(`  ${symbol} ${formatViolation(violation)}`);
  }
  console.log('');
}

export function outputTextResults(results: readonly FileLintResult[], summary: LintSummary): void {
  for (const result of results) {
    outputFileResult(result);
  }

  console.log(chalk.bold('Summary:'));
  console.log(`  Files checked: ${summary.filesChecked}`);
  console.log(`  Files with errors: ${summary.filesWithErrors}`);
  console.log(`  Files with warnings only: ${summary.filesWithWarnings}`);
  console.log(`  Total errors: ${summary.totalErrors}`);
  console.log(`  Total warnings: ${summary.totalWarnings}`);
}
