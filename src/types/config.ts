import { z } from 'zod';

const RuleListSchema = z.array(z.string().min(1)).default([]);

const CountSchema = z.number().int().nonnegative();

// Lint configuration file (YAML or JSON)
export const LintConfigSchema = z
  .object({
    error: RuleListSchema,
    warn: RuleListSchema,
    skip: RuleListSchema,
    warningExitCode: z.number().int().min(0).max(255).default(0),
    minPrefixLength: CountSchema.min(1).optional(),
    typoThreshold: CountSchema.optional(),
  })
  .strict();

export type LintConfig = z.infer<typeof LintConfigSchema>;
export type LintConfigInput = z.input<typeof LintConfigSchema>;
