/**
 * In-process storage, for tests and embedding
 */

import type { FingerprintRecord } from '../../types/index.js';
import type { FingerprintStore } from './index.js';

export class MemoryFingerprintStore implements FingerprintStore {
  private records: Map<string, FingerprintRecord> = new Map();

  initialize(): void {}

  load(moduleKey: string): FingerprintRecord {
    return { ...(this.records.get(moduleKey) ?? {}) };
  }

  save(moduleKey: string, record: FingerprintRecord): void {
    this.records.set(moduleKey, { ...record });
  }

  close(): void {}
}
