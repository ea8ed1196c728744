/**
 * generate command - Render help documents for Python modules
 */

import { Command } from 'commander';
import { HelpGenerator } from '../../analyzer/index.js';
import { summarizeChanges } from '../../analyzer/change-detector.js';
import {
  errorMessage,
  expandModules,
  modulePatterns,
  resolveConfig,
  statusLine,
  type GenerateOptions,
} from '../options.js';

export const generateCommand = new Command('generate')
  .description('Generate Markdown help files for Python modules')
  .argument('[modules...]', 'Module paths or glob patterns (defaults to the configured include globs)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-r, --root <directory>', 'Project root that module keys are relative to', '.')
  .option('--suffix <suffix>', 'Suffix appended to the help file name')
  .option('--output-dir <directory>', 'Write help files into this directory')
  .option('--no-overwrite', 'Leave existing help files untouched')
  .option('--args', 'Include an Arguments section for each callable', false)
  .option('--state-dir <directory>', 'Directory holding fingerprints and the exclusion list')
  .option('--backend <backend>', 'Fingerprint store backend (json or sqlite)')
  .option('--verbose', 'Show verbose output', false)
  .action(async (patterns: string[], options: GenerateOptions) => {
    let generator: HelpGenerator | null = null;

    try {
      const { config, rootDirectory } = await resolveConfig(options);
      const { modules, unmatched } = expandModules(modulePatterns(patterns, config), rootDirectory, config.exclude);
      let failed = unmatched.length > 0;

      for (const pattern of unmatched) {
        console.error(`Error: No module matches ${pattern}`);
      }

      generator = HelpGenerator.fromConfig(config, rootDirectory);

      for (const modulePath of modules) {
        try {
          const result = generator.generate(modulePath);
          console.log(statusLine(result, rootDirectory));
          if (options.verbose && result.report) {
            console.log(`  ${summarizeChanges(result.report)}`);
          }
        } catch (error) {
          failed = true;
          console.error(`Error: ${errorMessage(error)}`);
        }
      }

      generator.close();
      generator = null;

      if (failed) {
        process.exit(1);
      }
    } catch (error) {
      generator?.close();
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
