/**
 * JSON file storage: one checksum file per module
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { FingerprintRecord } from '../../types/index.js';
import { serializeFingerprints } from '../change-detector.js';
import { StoreError } from '../errors.js';
import { isNotFound, writeFileAtomic } from '../fs-utils.js';
import type { FingerprintStore } from './index.js';

const fingerprintRecordSchema = z.record(z.string(), z.string());

export class JsonFingerprintStore implements FingerprintStore {
  private directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  initialize(): void {
    fs.mkdirSync(this.directory, { recursive: true });
  }

  pathFor(moduleKey: string): string {
    return path.join(this.directory, `${moduleKey}.checksums.json`);
  }

  load(moduleKey: string): FingerprintRecord {
    const filePath = this.pathFor(moduleKey);

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return {};
      throw new StoreError(`Failed to read fingerprint file: ${filePath}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StoreError(`Invalid JSON in fingerprint file: ${filePath}`, { cause: error });
    }

    const result = fingerprintRecordSchema.safeParse(raw);
    if (!result.success) {
      throw new StoreError(`Invalid fingerprint file: ${filePath}`);
    }
    return result.data;
  }

  save(moduleKey: string, record: FingerprintRecord): void {
    const filePath = this.pathFor(moduleKey);
    try {
      writeFileAtomic(filePath, serializeFingerprints(record));
    } catch (error) {
      throw new StoreError(`Failed to write fingerprint file: ${filePath}`, { cause: error });
    }
  }

  close(): void {}
}
