/**
 * File watcher that regenerates help documents as modules change
 */

import chokidar, { type FSWatcher } from 'chokidar';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { GenerationResult } from '../types/index.js';
import type { HelpGenerator } from './index.js';

export interface WatcherEvents {
  generated: GenerationResult;
  unchanged: GenerationResult;
  removed: { filePath: string };
  error: { filePath: string; error: Error };
  ready: void;
}

export interface WatcherOptions {
  debounceMs?: number;
  ignoreInitial?: boolean;
}

export class ModuleWatcher extends EventEmitter {
  private generator: HelpGenerator;
  private watcher: FSWatcher | null = null;
  private rootDirectory: string;
  private patterns: string[];
  private ignored: string[];
  private options: Required<WatcherOptions>;
  private debounceTimers: Map<string, NodeJS.Timeout> = new Map();

  constructor(
    generator: HelpGenerator,
    rootDirectory: string,
    patterns: string[],
    ignored: string[],
    options: WatcherOptions = {}
  ) {
    super();
    this.generator = generator;
    this.rootDirectory = rootDirectory;
    this.patterns = patterns;
    this.ignored = ignored;
    this.options = {
      debounceMs: options.debounceMs ?? 300,
      ignoreInitial: options.ignoreInitial ?? true,
    };
  }

  start(): void {
    const watchPatterns = this.patterns.map(p => path.resolve(this.rootDirectory, p));

    this.watcher = chokidar.watch(watchPatterns, {
      ignored: this.ignored,
      persistent: true,
      ignoreInitial: this.options.ignoreInitial,
      awaitWriteFinish: {
        stabilityThreshold: 200,
        pollInterval: 100,
      },
    });

    this.watcher.on('add', (filePath: string) => this.handleFileChange(filePath));
    this.watcher.on('change', (filePath: string) => this.handleFileChange(filePath));
    this.watcher.on('unlink', (filePath: string) => this.handleFileRemove(filePath));
    this.watcher.on('error', (err: unknown) => {
      const error = err instanceof Error ? err : new Error(String(err));
      this.emit('error', { filePath: '', error });
    });
    this.watcher.on('ready', () => this.emit('ready'));
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();
  }

  private handleFileChange(filePath: string): void {
    const existingTimer = this.debounceTimers.get(filePath);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(filePath);

      try {
        const result = this.generator.generate(filePath);
        this.emit(result.status === 'unchanged' ? 'unchanged' : 'generated', result);
      } catch (error) {
        this.emit('error', {
          filePath,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }, this.options.debounceMs);

    this.debounceTimers.set(filePath, timer);
  }

  private handleFileRemove(filePath: string): void {
    const existingTimer = this.debounceTimers.get(filePath);
    if (existingTimer) {
      clearTimeout(existingTimer);
      this.debounceTimers.delete(filePath);
    }
    this.emit('removed', { filePath });
  }

  override on<K extends keyof WatcherEvents>(
    event: K,
    listener: (arg: WatcherEvents[K]) => void
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  override emit<K extends keyof WatcherEvents>(
    event: K,
    arg?: WatcherEvents[K]
  ): boolean {
    // An fs error with no listener attached must not crash the process
    if (event === 'error' && this.listenerCount('error') === 0) {
      return false;
    }

    return super.emit(event, arg);
  }
}
