#!/usr/bin/env node

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { convertCommand } from './commands/convert.js';
import { rulesCommand } from './commands/rules.js';
import { MDBLOCK_VERSION } from './version.js';

const program = new Command();

program
  .name('mdblock')
  .description('Lint metadata block schemas and convert them to TSV')
  .version(MDBLOCK_VERSION)
  .option('-c, --config <path>', 'Lint configuration file (YAML or JSON)');

program.addCommand(checkCommand);
program.addCommand(convertCommand);
program.addCommand(rulesCommand);

await program.parseAsync();
