/**
 * watch command - Regenerate help files as modules change
 */

import { Command } from 'commander';
import { HelpGenerator, ModuleWatcher } from '../../analyzer/index.js';
import {
  displayPath,
  errorMessage,
  expandModules,
  modulePatterns,
  resolveConfig,
  statusLine,
  type GenerateOptions,
} from '../options.js';

export const watchCommand = new Command('watch')
  .description('Watch Python modules and regenerate their help files on change')
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
    try {
      const { config, rootDirectory } = await resolveConfig(options);
      const generator = HelpGenerator.fromConfig(config, rootDirectory);

      const targets = modulePatterns(patterns, config);

      // Bring every matched module up to date before watching
      const { modules } = expandModules(targets, rootDirectory, config.exclude);
      for (const modulePath of modules) {
        try {
          console.log(statusLine(generator.generate(modulePath), rootDirectory));
        } catch (error) {
          console.error(`Error: ${errorMessage(error)}`);
        }
      }

      const watcher = new ModuleWatcher(generator, rootDirectory, targets, config.exclude, {
        debounceMs: config.watch.debounceMs,
      });

      watcher.on('generated', result => {
        console.log(statusLine(result, rootDirectory));
      });

      watcher.on('unchanged', result => {
        if (options.verbose) {
          console.log(statusLine(result, rootDirectory));
        }
      });

      watcher.on('removed', ({ filePath }) => {
        if (options.verbose) {
          console.log(`Removed: ${displayPath(filePath, rootDirectory)}`);
        }
      });

      watcher.on('error', ({ filePath, error }) => {
        console.error(`Error processing ${displayPath(filePath, rootDirectory)}: ${error.message}`);
      });

      watcher.on('ready', () => {
        console.log('Watching for changes... (Press Ctrl+C to stop)\n');
      });

      watcher.start();

      const shutdown = async (): Promise<void> => {
        console.log('\nShutting down...');
        await watcher.stop();
        generator.close();
        process.exit(0);
      };

      const onSignal = (): void => {
        shutdown().catch((error: unknown) => {
          console.error('Error:', errorMessage(error));
          process.exit(1);
        });
      };

      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
