/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import type { ExpressionNode } from '../../src/types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read a fixture file's contents
 */
export function readFixture(...parts: string[]): string {
  return fs.readFileSync(getFixturePath(...parts), 'utf-8');
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  readFile: (relativePath: string) => string;
  exists: (relativePath: string) => boolean;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'helpdoc-project-'));

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => path.join(rootDir, relativePath);

  return {
    rootDir,
    cleanup,
    addFile,
    readFile: relativePath => fs.readFileSync(getFilePath(relativePath), 'utf-8'),
    exists: relativePath => fs.existsSync(getFilePath(relativePath)),
    getFilePath,
  };
}

/**
 * Build an expression snapshot by hand
 */
export function expr(
  type: string,
  text: string,
  children: ExpressionNode[] = [],
  operators: string[] = []
): ExpressionNode {
  return { type, text, operators, children };
}

export const ident = (name: string): ExpressionNode => expr('identifier', name);
export const int = (text: string): ExpressionNode => expr('integer', text);
export const str = (text: string): ExpressionNode => expr('string', text);

export const GREETER_SOURCE = readFixture('python', 'greeter.py');
export const GREETER_HELP = readFixture('help', 'greeter-help.md');
export const GREETER_EXCLUDED_HELP = readFixture('help', 'greeter-excluded-help.md');
