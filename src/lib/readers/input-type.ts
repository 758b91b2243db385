import { extname } from 'path';
import { createViolation, type LintViolation } from '../lint/types.js';
import type { InputType } from './types.js';

export interface InputTypeGuess {
  inputType: InputType | null;
  violations: LintViolation[];
}

/**
 * Choose a reader from the file extension (case-insensitive).
 */
export function guessInputType(path: string): InputTypeGuess {
  const extension = extname(path).toLowerCase();

  switch (extension) {
    case '.tsv':
      return { inputType: 'tsv', violations: [] };
    case '.csv':
      return {
        inputType: 'tsv',
        violations: [
          createViolation(
            'warning',
            'guess_input_type',
            `Reading '${path}' as tab-separated values. Other separators are not supported.`
          ),
        ],
      };
    case '.yml':
    case '.yaml':
      return { inputType: 'yaml', violations: [] };
    default:
      return {
        inputType: null,
        violations: [
          createViolation(
            'error',
            'guess_input_type',
            `Cannot determine the input type of '${path}'. Expected a .tsv, .csv, .yml or .yaml file.`
          ),
        ],
      };
  }
}
