#!/usr/bin/env node

/**
 * py-helpdoc CLI
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { statusCommand } from './commands/status.js';
import { excludeCommand } from './commands/exclude.js';
import { watchCommand } from './commands/watch.js';

const program = new Command();

program
  .name('py-helpdoc')
  .description('Generate Markdown help files from Python modules, regenerating only when declarations change')
  .version('1.0.0');

program.addCommand(generateCommand);
program.addCommand(statusCommand);
program.addCommand(excludeCommand);
program.addCommand(watchCommand);

program.parse(process.argv);
