/**
 * status command - Report declaration changes without writing anything
 */

import { Command } from 'commander';
import { HelpGenerator } from '../../analyzer/index.js';
import { summarizeChanges } from '../../analyzer/change-detector.js';
import {
  displayPath,
  errorMessage,
  expandModules,
  modulePatterns,
  resolveConfig,
  type CommonOptions,
} from '../options.js';

export const statusCommand = new Command('status')
  .description('Show which modules have changed since their help files were generated')
  .argument('[modules...]', 'Module paths or glob patterns (defaults to the configured include globs)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-r, --root <directory>', 'Project root that module keys are relative to', '.')
  .option('--state-dir <directory>', 'Directory holding fingerprints and the exclusion list')
  .option('--backend <backend>', 'Fingerprint store backend (json or sqlite)')
  .option('--verbose', 'List every added, removed and changed declaration', false)
  .action(async (patterns: string[], options: CommonOptions) => {
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
          const result = generator.check(modulePath);
          const state = result.willRender ? 'stale' : 'up to date';
          const output = result.outputExists ? '' : ' (no help file)';
          console.log(`${displayPath(result.modulePath, rootDirectory)}: ${state}, ${summarizeChanges(result.report)}${output}`);

          if (options.verbose) {
            for (const key of result.report.added) console.log(`  + ${key}`);
            for (const key of result.report.removed) console.log(`  - ${key}`);
            for (const key of result.report.changed) console.log(`  ~ ${key}`);
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
