/**
 * Compares fresh fingerprints against the persisted baseline
 */

import type { ChangeReport, FingerprintRecord } from '../types/index.js';

/**
 * Regeneration is needed when the key sets differ or a shared key's hash changed.
 */
export function detectChanges(current: FingerprintRecord, previous: FingerprintRecord): ChangeReport {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];

  for (const [key, hash] of Object.entries(current)) {
    if (!Object.hasOwn(previous, key)) {
      added.push(key);
    } else if (previous[key] !== hash) {
      changed.push(key);
    }
  }

  for (const key of Object.keys(previous)) {
    if (!Object.hasOwn(current, key)) {
      removed.push(key);
    }
  }

  return {
    needsRegeneration: added.length > 0 || removed.length > 0 || changed.length > 0,
    added: added.sort(),
    removed: removed.sort(),
    changed: changed.sort(),
  };
}

/**
 * The renderer is skipped only when nothing changed and an output already exists.
 */
export function shouldRender(report: ChangeReport, outputExists: boolean): boolean {
  return report.needsRegeneration || !outputExists;
}

/**
 * Copy with keys in sorted order, so equal records persist byte-identically
 */
export function sortFingerprints(record: FingerprintRecord): FingerprintRecord {
  const sorted: FingerprintRecord = {};
  for (const key of Object.keys(record).sort()) {
    const hash = record[key];
    if (hash !== undefined) sorted[key] = hash;
  }
  return sorted;
}

export function serializeFingerprints(record: FingerprintRecord): string {
  return `${JSON.stringify(sortFingerprints(record), null, 2)}\n`;
}

export function summarizeChanges(report: ChangeReport): string {
  if (!report.needsRegeneration) return 'no changes';
  const parts: string[] = [];
  if (report.added.length > 0) parts.push(`${report.added.length} added`);
  if (report.removed.length > 0) parts.push(`${report.removed.length} removed`);
  if (report.changed.length > 0) parts.push(`${report.changed.length} changed`);
  return parts.join(', ');
}
