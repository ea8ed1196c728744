/**
 * Abstract base class for module parsers
 */

import type { ModuleTree } from '../../types/index.js';

export interface ParserOptions {
  maxFileSize?: number;
}

export abstract class ModuleParser {
  protected options: ParserOptions;

  constructor(options: ParserOptions = {}) {
    this.options = {
      maxFileSize: 1024 * 1024, // 1MB
      ...options,
    };
  }

  /**
   * Get file extensions this parser handles
   */
  abstract get extensions(): string[];

  /**
   * Parse module source into its declaration tree.
   * Throws ParseFailure when the source is not valid.
   */
  abstract parse(filePath: string, content: string): ModuleTree;

  /**
   * Check if this parser can handle the given file
   */
  canParse(filePath: string): boolean {
    const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
    return this.extensions.includes(ext);
  }

  /**
   * Check if content exceeds max file size (0 = unlimited)
   */
  protected isFileTooLarge(content: string): boolean {
    const limit = this.options.maxFileSize ?? 0;
    return limit > 0 && Buffer.byteLength(content, 'utf8') > limit;
  }
}
