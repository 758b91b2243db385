/**
 * File-level orchestration for the check and convert commands.
 */

import { readFile, writeFile } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import type { MetadataDocument } from '../types/document.js';
import { InputReadError, OutputWriteError } from './errors.js';
import { mostSevere, type LintViolation } from './lint/types.js';
import { guessInputType } from './readers/input-type.js';
import { readTsvSource } from './readers/tsv.js';
import type { ReadResult } from './readers/types.js';
import { readYamlSource } from './readers/yaml.js';
import type { FileLintResult } from './report.js';
import { validateDocument, type ValidationOptions } from './validation.js';
import { renderMetadataBlock } from './writer.js';

export interface SourceFile {
  path: string;
  source: string;
}

export interface LintedSource extends FileLintResult {
  document: MetadataDocument | null;
}

export interface ConvertResult {
  result: FileLintResult;
  outfile: string;
  written: boolean;
}

/**
 * Read every input before any of them is linted.
 *
 * @throws InputReadError for the first file that cannot be read
 */
export async function loadFiles(paths: readonly string[]): Promise<SourceFile[]> {
  const files: SourceFile[] = [];
  for (const path of paths) {
    try {
      files.push({ path, source: await readFile(path, 'utf-8') });
    } catch (err) {
      throw new InputReadError(path, err);
    }
  }
  return files;
}

/**
 * Read, parse and validate one input. Reader findings come first, followed
 * by the rule violations.
 */
export function lintSource(path: string, source: string, options: ValidationOptions = {}): LintedSource {
  options.trace?.(1, `Checking input file: ${path}`);

  const guess = guessInputType(path);
  const violations: LintViolation[] = [...guess.violations];
  if (guess.inputType === null) {
    return { path, document: null, violations, longestRow: 0 };
  }

  const read: ReadResult = guess.inputType === 'yaml' ? readYamlSource(source) : readTsvSource(source);
  violations.push(...read.violations);
  if (read.document === null) {
    return { path, document: null, violations, longestRow: 0 };
  }

  const validation = validateDocument(read.document, options);
  violations.push(...validation.violations);
  return { path, document: read.document, violations, longestRow: validation.longestRow };
}

/**
 * Lint files in the order given.
 *
 * @throws InputReadError when any input cannot be read
 */
export async function checkFiles(
  paths: readonly string[],
  options: ValidationOptions = {}
): Promise<FileLintResult[]> {
  const files = await loadFiles(paths);
  return files.map(({ path, source }) => {
    const { violations, longestRow } = lintSource(path, source, options);
    return { path, violations, longestRow };
  });
}

/**
 * Output path used when none is given: the input's name with a .tsv extension.
 */
export function defaultOutfile(path: string): string {
  return join(dirname(path), `${basename(path, extname(path))}.tsv`);
}

/**
 * Lint one file and write it as a tab-separated block unless errors were found.
 *
 * @throws InputReadError when the input cannot be read
 * @throws OutputWriteError when the output would replace the input or cannot be written
 */
export async function convertFile(
  path: string,
  options: ValidationOptions = {},
  outfile: string = defaultOutfile(path)
): Promise<ConvertResult> {
  if (resolve(outfile) === resolve(path)) {
    throw new OutputWriteError(outfile, 'refusing to overwrite the input file');
  }

  const [file] = await loadFiles([path]);
  if (!file) {
    throw new InputReadError(path, 'no content');
  }

  const { document, ...result } = lintSource(file.path, file.source, options);
  if (document === null || mostSevere(result.violations) === 'error') {
    return { result, outfile, written: false };
  }

  options.trace?.(1, `Writing output file to: ${outfile}`);
  try {
    await writeFile(outfile, renderMetadataBlock(document, result.longestRow), 'utf-8');
  } catch (err) {
    throw new OutputWriteError(outfile, err instanceof Error ? err.message : String(err));
  }
  return { result, outfile, written: true };
}
