/**
 * Rules command - list the lint catalog.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { RULE_CATALOG } from '../lib/lint/rules.js';
import type { RuleInfo } from '../lib/lint/types.js';
import { getOutputMode, jsonSuccess, printJson } from '../lib/output.js';

export function describeRules(): RuleInfo[] {
  return RULE_CATALOG.map(({ name, code, scope, defaultSeverity, description }) => ({
    name,
    code,
    scope,
    defaultSeverity,
    description,
  }));
}

export function outputRuleList(rules: readonly RuleInfo[]): void {
  const nameWidth = Math.max(...rules.map(rule => rule.name.length));
  const scopeWidth = Math.max(...rules.map(rule => rule.scope.length));

  for (const rule of rules) {
    const severity = rule.defaultSeverity === 'error' ? chalk.red('error  ') : chalk.yellow('warning');
    console.log(
      `${chalk.bold(rule.code)}  ${rule.name.padEnd(nameWidth)}  ${rule.scope.padEnd(scopeWidth)}  ${severity}  ${chalk.dim(rule.description)}`
    );
  }
}

export const rulesCommand = new Command('rules')
  .description('List all lint rules with their code, scope and default severity')
  .option('-o, --output <format>', 'Output format: text (default) or json')
  .action((options: { output?: string }) => {
    const rules = describeRules();
    if (getOutputMode(options) === 'json') {
      printJson(jsonSuccess({ data: rules }));
      return;
    }
    outputRuleList(rules);
  });
