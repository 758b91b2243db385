import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { runCheck } from '../../../src/commands/check.js';
import type { LintRunOptions } from '../../../src/lib/command.js';
import { captureConsole, cleanupTempDir, createTempDir, fixturePath, type CapturedConsole } from '../fixtures/setup.js';

const WARNED_BLOCK = 'metadataBlock:\n  - name: demo\n    dataverseAlias: "demo "\n    displayName: Demo\ndatasetField: []\n';
const BROKEN_BLOCK = 'metadataBlock:\n  - name: demo\n';

function options(overrides: Partial<LintRunOptions> = {}): LintRunOptions {
  return { cli: {}, verbosity: 0, ...overrides };
}

describe('check command', () => {
  let tempDir: string;
  let output: CapturedConsole;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    tempDir = await createTempDir();
    output = captureConsole();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  it('should pass a clean block', async () => {
    const exitCode = await runCheck([fixturePath('minimal.yml')], options());

    expect(exitCode).toBe(0);
    expect(output.logs).toEqual([
      fixturePath('minimal.yml'),
      '  ✓ All checks passed',
      '',
      'Summary:',
      '  Files checked: 1',
      '  Files with errors: 0',
      '  Files with warnings only: 0',
      '  Total errors: 0',
      '  Total warnings: 0',
    ]);
    expect(output.errors).toEqual([]);
  });

  it('should exit with 1 when errors are found', async () => {
    const file = join(tempDir, 'broken.yml');
    await writeFile(file, BROKEN_BLOCK);

    const exitCode = await runCheck([file], options());

    expect(exitCode).toBe(1);
    expect(output.logs).toContain('A total of 2 lint(s) failed.');
    expect(output.logs).toContain('Most severe level: ERROR');
    expect(output.logs).toContain('  Files with errors: 1');
  });

  it('should use the configured exit code for warnings', async () => {
    const file = join(tempDir, 'warned.yml');
    await writeFile(file, WARNED_BLOCK);

    expect(await runCheck([file], options())).toBe(0);
    expect(await runCheck([file], options({ cli: { warningExitCode: 4 } }))).toBe(4);
    expect(output.logs).toContain('Most severe level: WARNING');
    expect(output.logs).toContain('  Files with warnings only: 1');
  });

  it('should honour severity overrides', async () => {
    const file = join(tempDir, 'warned.yml');
    await writeFile(file, WARNED_BLOCK);

    expect(await runCheck([file], options({ cli: { error: ['e004'] } }))).toBe(1);
    expect(await runCheck([file], options({ cli: { skip: ['no_trailing_spaces'] } }))).toBe(0);
  });

  it('should read the configuration file', async () => {
    const file = join(tempDir, 'warned.yml');
    const config = join(tempDir, 'lint.yml');
    await writeFile(file, WARNED_BLOCK);
    await writeFile(config, 'error:\n  - no_trailing_spaces\n');

    expect(await runCheck([file], options({ configPath: config }))).toBe(1);
  });

  it('should exit with 2 for a missing input', async () => {
    const missing = join(tempDir, 'missing.yml');

    const exitCode = await runCheck([fixturePath('minimal.yml'), missing], options());

    expect(exitCode).toBe(2);
    expect(output.logs).toEqual([]);
    expect(output.errors).toHaveLength(1);
    expect(output.errors[0]).toMatch(/^Could not read input file '.*missing\.yml': /);
  });

  it('should exit with 3 for an unknown rule', async () => {
    const exitCode = await runCheck([fixturePath('minimal.yml')], options({ cli: { skip: ['no_such_rule'] } }));

    expect(exitCode).toBe(3);
    expect(output.errors[0]).toMatch(/^Could not find lint with name or id 'no_such_rule'\./);
  });

  it('should print JSON results', async () => {
    const file = join(tempDir, 'warned.yml');
    await writeFile(file, WARNED_BLOCK);

    const exitCode = await runCheck([fixturePath('minimal.yml'), file], options({ jsonMode: true, verbosity: 2 }));

    expect(exitCode).toBe(0);
    expect(output.logs).toHaveLength(1);
    const json: unknown = JSON.parse(output.logs[0] ?? '');
    expect(json).toMatchObject({
      success: true,
      data: {
        files: [
          { path: fixturePath('minimal.yml'), mostSevere: 'none', violations: [] },
          { path: file, mostSevere: 'warning', violations: [{ rule: 'no_trailing_spaces', severity: 'warning' }] },
        ],
        summary: {
          filesChecked: 2,
          filesWithErrors: 0,
          filesWithWarnings: 1,
          totalErrors: 0,
          totalWarnings: 1,
          mostSevere: 'warning',
        },
      },
    });
  });

  it('should print fatal errors as JSON', async () => {
    const exitCode = await runCheck([join(tempDir, 'missing.yml')], options({ jsonMode: true }));

    expect(exitCode).toBe(2);
    const json: unknown = JSON.parse(output.logs[0] ?? '');
    expect(json).toMatchObject({ success: false, code: 2 });
  });

  it('should trace checked files when verbose', async () => {
    await runCheck([fixturePath('minimal.yml')], options({ verbosity: 1 }));

    expect(output.logs[0]).toBe(`Checking input file: ${fixturePath('minimal.yml')}`);
  });
});
