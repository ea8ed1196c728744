/**
 * Help generation orchestration
 */

import fs from 'node:fs';
import path from 'node:path';

import type { ChangeReport, GenerationResult, ModuleTree } from '../types/index.js';
import type { Config } from '../config/schema.js';
import { renderDocument } from '../render/markdown.js';
import { detectChanges, shouldRender } from './change-detector.js';
import { OutputWriteError, ParseFailure } from './errors.js';
import { loadExclusions } from './exclusions.js';
import { collectFingerprints } from './fingerprint.js';
import { FileTextOutput, type TextOutput } from './output.js';
import { ParserRegistry, createDefaultRegistry, type ParserOptions } from './parsers/index.js';
import { deriveOutputPath, moduleKey } from './paths.js';
import {
  JsonFingerprintStore,
  SqliteFingerprintStore,
  type FingerprintStore,
} from './storage/index.js';

export interface GeneratorConfig {
  rootDirectory: string;
  /** Holds the exclusion list and, for the JSON backend, the checksum files */
  stateDirectory: string;
  exclusionFile?: string;
  outputSuffix?: string;
  outputDirectory?: string;
  overwrite?: boolean;
  includeArguments?: boolean;
  store?: FingerprintStore;
  output?: TextOutput;
  parserOptions?: ParserOptions;
}

export interface CheckResult {
  modulePath: string;
  outputPath: string;
  outputExists: boolean;
  report: ChangeReport;
  willRender: boolean;
}

export class HelpGenerator {
  private config: Required<Omit<GeneratorConfig, 'outputDirectory' | 'store' | 'output' | 'parserOptions'>> &
    Pick<GeneratorConfig, 'outputDirectory' | 'parserOptions'>;
  private store: FingerprintStore;
  private output: TextOutput;
  private registry: ParserRegistry | null = null;
  private exclusions: Set<string> | null = null;

  constructor(config: GeneratorConfig) {
    const rootDirectory = path.resolve(config.rootDirectory);
    const stateDirectory = path.resolve(rootDirectory, config.stateDirectory);

    this.config = {
      rootDirectory,
      stateDirectory,
      exclusionFile: config.exclusionFile ?? 'exclude_help_ast.json',
      outputSuffix: config.outputSuffix ?? 'help.md',
      outputDirectory: config.outputDirectory,
      overwrite: config.overwrite ?? true,
      includeArguments: config.includeArguments ?? false,
      parserOptions: config.parserOptions,
    };
    this.store = config.store ?? new JsonFingerprintStore(stateDirectory);
    this.output = config.output ?? new FileTextOutput();
  }

  /**
   * Build a generator from a loaded configuration
   */
  static fromConfig(config: Config, rootDirectory: string): HelpGenerator {
    const root = path.resolve(rootDirectory);
    const stateDirectory = path.resolve(root, config.stateDirectory);
    const store =
      config.storage.backend === 'sqlite'
        ? new SqliteFingerprintStore(path.resolve(stateDirectory, config.storage.database))
        : new JsonFingerprintStore(stateDirectory);

    return new HelpGenerator({
      rootDirectory: root,
      stateDirectory,
      exclusionFile: config.exclusionFile,
      outputSuffix: config.output.suffix,
      outputDirectory: config.output.directory,
      overwrite: config.overwrite,
      includeArguments: config.includeArguments,
      store,
      parserOptions: { maxFileSize: config.parser.maxFileSize },
    });
  }

  get exclusionPath(): string {
    return path.resolve(this.config.stateDirectory, this.config.exclusionFile);
  }

  initialize(): void {
    if (this.registry) return;

    fs.mkdirSync(this.config.stateDirectory, { recursive: true });
    this.store.initialize();
    this.exclusions = loadExclusions(this.exclusionPath);
    this.registry = createDefaultRegistry(this.config.parserOptions);
  }

  close(): void {
    this.store.close();
    this.registry = null;
    this.exclusions = null;
  }

  outputPathFor(modulePath: string): string {
    const { rootDirectory, outputSuffix, outputDirectory } = this.config;
    const relative = path.relative(rootDirectory, path.resolve(rootDirectory, modulePath));
    const directory = outputDirectory ? path.resolve(rootDirectory, outputDirectory) : undefined;
    return path.resolve(rootDirectory, deriveOutputPath(relative, outputSuffix, directory));
  }

  /**
   * Run one generation pass for a module.
   *
   * Fingerprints are persisted on every pass that parsed the module, except
   * when writing the document failed; the old baseline then forces a retry.
   */
  generate(modulePath: string): GenerationResult {
    this.initialize();

    const absolutePath = path.resolve(this.config.rootDirectory, modulePath);
    const outputPath = this.outputPathFor(absolutePath);

    if (!this.config.overwrite && this.output.exists(outputPath)) {
      return {
        status: 'skipped',
        modulePath: absolutePath,
        outputPath,
        content: '',
        report: null,
        fingerprints: {},
      };
    }

    const tree = this.parseModule(absolutePath);
    const key = moduleKey(absolutePath, this.config.rootDirectory);
    const current = collectFingerprints(tree);
    const report = detectChanges(current, this.store.load(key));

    if (!shouldRender(report, this.output.exists(outputPath))) {
      this.store.save(key, current);
      return { status: 'unchanged', modulePath: absolutePath, outputPath, content: '', report, fingerprints: current };
    }

    const content = renderDocument(tree, {
      exclusions: this.exclusions ?? new Set(),
      includeArguments: this.config.includeArguments,
    });

    if (content) {
      try {
        this.output.write(outputPath, content);
      } catch (error) {
        throw new OutputWriteError(outputPath, { cause: error });
      }
    }

    this.store.save(key, current);
    return {
      status: content ? 'generated' : 'empty',
      modulePath: absolutePath,
      outputPath,
      content,
      report,
      fingerprints: current,
    };
  }

  /**
   * Compare a module against its baseline without writing anything
   */
  check(modulePath: string): CheckResult {
    this.initialize();

    const absolutePath = path.resolve(this.config.rootDirectory, modulePath);
    const outputPath = this.outputPathFor(absolutePath);
    const tree = this.parseModule(absolutePath);
    const report = detectChanges(
      collectFingerprints(tree),
      this.store.load(moduleKey(absolutePath, this.config.rootDirectory))
    );
    const outputExists = this.output.exists(outputPath);

    return {
      modulePath: absolutePath,
      outputPath,
      outputExists,
      report,
      willRender: (this.config.overwrite || !outputExists) && shouldRender(report, outputExists),
    };
  }

  private parseModule(absolutePath: string): ModuleTree {
    const parser = this.registry?.getByFilePath(absolutePath);
    if (!parser) {
      throw new ParseFailure(absolutePath, 'Unsupported module type');
    }

    let content: string;
    try {
      content = fs.readFileSync(absolutePath, 'utf-8');
    } catch (error) {
      throw new ParseFailure(absolutePath, 'Unable to read module', null, { cause: error });
    }

    return parser.parse(absolutePath, content);
  }
}

export { ModuleWatcher, type WatcherOptions, type WatcherEvents } from './watcher.js';
