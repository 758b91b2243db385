import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { access, copyFile, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { runConvert, type ConvertRunOptions } from '../../../src/commands/convert.js';
import { captureConsole, cleanupTempDir, createTempDir, fixturePath, type CapturedConsole } from '../fixtures/setup.js';

function options(overrides: Partial<ConvertRunOptions> = {}): ConvertRunOptions {
  return { cli: {}, verbosity: 0, ...overrides };
}

describe('convert command', () => {
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

  it('should write the TSV block next to the input', async () => {
    const input = join(tempDir, 'minimal.yml');
    await copyFile(fixturePath('minimal.yml'), input);

    const exitCode = await runConvert(input, options());

    expect(exitCode).toBe(0);
    expect(output.logs).toEqual([`Wrote ${join(tempDir, 'minimal.tsv')}`]);
    expect(await readFile(join(tempDir, 'minimal.tsv'), 'utf-8')).toBe(
      await readFile(fixturePath('minimal.tsv'), 'utf-8')
    );
  });

  it('should write to the requested output path', async () => {
    const outfile = join(tempDir, 'out.tsv');

    const exitCode = await runConvert(fixturePath('minimal.yml'), options({ outfile, verbosity: 1 }));

    expect(exitCode).toBe(0);
    expect(output.logs).toContain(`Writing output file to: ${outfile}`);
    await expect(access(outfile)).resolves.toBeUndefined();
  });

  it('should print violations and skip writing on errors', async () => {
    const input = join(tempDir, 'broken.yml');
    await writeFile(input, 'metadataBlock:\n  - name: demo\n');

    const exitCode = await runConvert(input, options());

    expect(exitCode).toBe(1);
    expect(output.logs[0]).toBe(input);
    expect(output.logs).toContain('A total of 2 lint(s) failed.');
    expect(output.errors).toEqual(['Errors detected. Could not convert to TSV.']);
    await expect(access(join(tempDir, 'broken.tsv'))).rejects.toThrow();
  });

  it('should exit with 2 rather than overwrite the input', async () => {
    const input = join(tempDir, 'block.tsv');
    await copyFile(fixturePath('minimal.tsv'), input);

    const exitCode = await runConvert(input, options());

    expect(exitCode).toBe(2);
    expect(output.errors).toEqual([`Could not write output file '${input}': refusing to overwrite the input file`]);
  });
});
