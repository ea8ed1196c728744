/**
 * Shared option handling for CLI commands
 */

import fg from 'fast-glob';
import path from 'node:path';
import { loadConfig, loadConfigOrDefault, parseConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import type { GenerationResult } from '../types/index.js';

export interface CommonOptions {
  config?: string;
  root: string;
  stateDir?: string;
  backend?: string;
  verbose: boolean;
}

export interface GenerateOptions extends CommonOptions {
  suffix?: string;
  outputDir?: string;
  overwrite: boolean;
  args: boolean;
}

export interface ResolvedConfig {
  config: Config;
  rootDirectory: string;
}

/**
 * Load the config file (explicit, or discovered from the root upwards) and
 * layer command-line overrides on top. The result is validated again.
 */
export async function resolveConfig(options: CommonOptions & Partial<GenerateOptions>): Promise<ResolvedConfig> {
  const rootDirectory = path.resolve(options.root);
  const config = options.config
    ? await loadConfig(path.resolve(options.config))
    : await loadConfigOrDefault(rootDirectory);

  const merged = parseConfig({
    ...config,
    stateDirectory: options.stateDir ?? config.stateDirectory,
    // --no-overwrite can only turn overwriting off
    overwrite: options.overwrite === false ? false : config.overwrite,
    includeArguments: options.args === true ? true : config.includeArguments,
    output: {
      ...config.output,
      suffix: options.suffix ?? config.output.suffix,
      directory: options.outputDir ?? config.output.directory,
    },
    storage: {
      ...config.storage,
      backend: options.backend ?? config.storage.backend,
    },
  });

  return { config: merged, rootDirectory };
}

/**
 * Module patterns from the command line, or the configured `include` globs
 */
export function modulePatterns(patterns: string[], config: Config): string[] {
  return patterns.length > 0 ? patterns : config.include;
}

/**
 * Expand module arguments (paths or glob patterns) into sorted absolute paths.
 * Patterns that match nothing are reported separately.
 */
export function expandModules(
  patterns: string[],
  rootDirectory: string,
  ignore: string[]
): { modules: string[]; unmatched: string[] } {
  const modules = new Set<string>();
  const unmatched: string[] = [];

  for (const pattern of patterns) {
    const matches = fg.sync(fg.isDynamicPattern(pattern) ? pattern : fg.escapePath(pattern), {
      cwd: rootDirectory,
      absolute: true,
      onlyFiles: true,
      ignore,
    });
    if (matches.length === 0) {
      unmatched.push(pattern);
    }
    for (const match of matches) {
      modules.add(path.normalize(match));
    }
  }

  return { modules: Array.from(modules).sort(), unmatched };
}

export function displayPath(filePath: string, rootDirectory: string): string {
  const relative = path.relative(rootDirectory, filePath);
  return relative.startsWith('..') || path.isAbsolute(relative) ? filePath : relative;
}

/**
 * One status line per generation pass
 */
export function statusLine(result: GenerationResult, rootDirectory: string): string {
  const modulePath = displayPath(result.modulePath, rootDirectory);
  const outputPath = displayPath(result.outputPath, rootDirectory);

  switch (result.status) {
    case 'unchanged':
      return `No changes detected in module ${modulePath}, help file is up to date.`;
    case 'generated':
      return `Help file generated/updated: ${outputPath}`;
    case 'skipped':
      return `Help file already exists and overwrite is set to False: ${outputPath}`;
    case 'empty':
      return `No documentable declarations in module ${modulePath}, no help file written.`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
