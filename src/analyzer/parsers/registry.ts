/**
 * Parser registry for managing module parsers
 */

import { ModuleParser, type ParserOptions } from './base.js';
import { PythonParser } from './python.js';

export class ParserRegistry {
  private extensionMap: Map<string, ModuleParser> = new Map();

  /**
   * Register a parser for its extensions
   */
  register(parser: ModuleParser): void {
    for (const ext of parser.extensions) {
      this.extensionMap.set(ext.toLowerCase(), parser);
    }
  }

  /**
   * Get a parser for a file path based on extension
   */
  getByFilePath(filePath: string): ModuleParser | undefined {
    const ext = this.getExtension(filePath);
    return this.extensionMap.get(ext);
  }

  /**
   * Check if a file can be parsed
   */
  canParse(filePath: string): boolean {
    const parser = this.getByFilePath(filePath);
    return parser?.canParse(filePath) ?? false;
  }

  /**
   * Get all supported extensions
   */
  getExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  /**
   * Get file extension (lowercase, without dot)
   */
  private getExtension(filePath: string): string {
    const match = filePath.match(/\.([^./\\]+)$/);
    return match?.[1]?.toLowerCase() ?? '';
  }
}

/**
 * Create a parser registry with default parsers
 */
export function createDefaultRegistry(options: ParserOptions = {}): ParserRegistry {
  const registry = new ParserRegistry();
  registry.register(new PythonParser(options));
  return registry;
}

// Singleton registry instance
let defaultRegistry: ParserRegistry | null = null;

export function getDefaultRegistry(options: ParserOptions = {}): ParserRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultRegistry(options);
  }
  return defaultRegistry;
}

export function resetRegistry(): void {
  defaultRegistry = null;
}
