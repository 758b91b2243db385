import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { describeRules, outputRuleList } from '../../../src/commands/rules.js';
import { captureConsole } from '../fixtures/setup.js';

describe('rules command', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should describe every rule in catalog order', () => {
    const rules = describeRules();

    expect(rules).toHaveLength(12);
    expect(rules[0]).toEqual({
      name: 'keywords_valid',
      code: 'k001',
      scope: 'top-level',
      defaultSeverity: 'error',
      description: expect.any(String),
    });
    expect(new Set(rules.map(rule => rule.code)).size).toBe(12);
  });

  it('should print one line per rule', () => {
    const output = captureConsole();

    outputRuleList(describeRules());

    expect(output.logs).toHaveLength(12);
    expect(output.logs[0]).toMatch(/^k001  keywords_valid +top-level  error {4}/);
  });
});
