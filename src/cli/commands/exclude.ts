/**
 * exclude command - Manage names left out of rendered help files
 */

import { Command } from 'commander';
import path from 'node:path';
import { addExclusions, loadExclusions, removeExclusions } from '../../analyzer/exclusions.js';
import { errorMessage, resolveConfig, type CommonOptions } from '../options.js';

async function exclusionPath(options: CommonOptions): Promise<string> {
  const { config, rootDirectory } = await resolveConfig(options);
  return path.resolve(rootDirectory, config.stateDirectory, config.exclusionFile);
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <directory>', 'Project root', '.')
    .option('--state-dir <directory>', 'Directory holding the exclusion list');
}

const listCommand = withCommonOptions(new Command('list').description('Print the excluded names')).action(
  async (options: CommonOptions) => {
    try {
      const names = Array.from(loadExclusions(await exclusionPath(options))).sort();
      if (names.length === 0) {
        console.log('No excluded names.');
        return;
      }
      for (const name of names) {
        console.log(name);
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  }
);

const addCommand = withCommonOptions(
  new Command('add').description('Exclude names from rendering').argument('<names...>', 'Declaration names')
).action(async (names: string[], options: CommonOptions) => {
  try {
    const excluded = addExclusions(await exclusionPath(options), names);
    console.log(`Excluded: ${excluded.join(', ')}`);
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }
});

const removeCommand = withCommonOptions(
  new Command('remove').description('Render previously excluded names again').argument('<names...>', 'Declaration names')
).action(async (names: string[], options: CommonOptions) => {
  try {
    const excluded = removeExclusions(await exclusionPath(options), names);
    console.log(excluded.length > 0 ? `Excluded: ${excluded.join(', ')}` : 'No excluded names.');
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }
});

export const excludeCommand = new Command('exclude')
  .description('Manage the exclusion list')
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(removeCommand);
