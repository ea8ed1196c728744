/**
 * Fingerprint storage interface and exports
 */

import type { FingerprintRecord } from '../../types/index.js';

export interface FingerprintStore {
  initialize(): void;
  /** Previous fingerprints of a module, empty when none were stored */
  load(moduleKey: string): FingerprintRecord;
  /** Replace the stored fingerprints of a module as a whole */
  save(moduleKey: string, record: FingerprintRecord): void;
  close(): void;
}

export { JsonFingerprintStore } from './json.js';
export { SqliteFingerprintStore } from './sqlite.js';
export { MemoryFingerprintStore } from './memory.js';
