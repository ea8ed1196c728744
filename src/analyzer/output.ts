/**
 * Destination for rendered documents
 */

import fs from 'node:fs';

import { writeFileAtomic } from './fs-utils.js';

export interface TextOutput {
  exists(filePath: string): boolean;
  write(filePath: string, text: string): void;
}

export class FileTextOutput implements TextOutput {
  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  write(filePath: string, text: string): void {
    writeFileAtomic(filePath, text);
  }
}
