/**
 * Exclusion list: declaration names left out of the rendered document
 */

import fs from 'node:fs';
import { z } from 'zod';

import { StoreError } from './errors.js';
import { isNotFound, writeFileAtomic } from './fs-utils.js';

const exclusionListSchema = z.array(z.string());

/**
 * Load the exclusion list, creating an empty one on first use
 */
export function loadExclusions(filePath: string): Set<string> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (!isNotFound(error)) {
      throw new StoreError(`Failed to read exclusion list: ${filePath}`, { cause: error });
    }
    saveExclusions(filePath, []);
    return new Set();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StoreError(`Invalid JSON in exclusion list: ${filePath}`, { cause: error });
  }

  const result = exclusionListSchema.safeParse(raw);
  if (!result.success) {
    throw new StoreError(`Exclusion list must be an array of names: ${filePath}`);
  }
  return new Set(result.data);
}

export function saveExclusions(filePath: string, names: Iterable<string>): void {
  const sorted = Array.from(new Set(names)).sort();
  try {
    writeFileAtomic(filePath, `${JSON.stringify(sorted, null, 2)}\n`);
  } catch (error) {
    throw new StoreError(`Failed to write exclusion list: ${filePath}`, { cause: error });
  }
}

export function addExclusions(filePath: string, names: string[]): string[] {
  const exclusions = loadExclusions(filePath);
  for (const name of names) exclusions.add(name);
  saveExclusions(filePath, exclusions);
  return Array.from(exclusions).sort();
}

export function removeExclusions(filePath: string, names: string[]): string[] {
  const exclusions = loadExclusions(filePath);
  for (const name of names) exclusions.delete(name);
  saveExclusions(filePath, exclusions);
  return Array.from(exclusions).sort();
}
