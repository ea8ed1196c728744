/**
 * Fingerprint and change-detection types
 */

/** Qualified declaration key -> sha256 hex digest */
export type FingerprintRecord = Record<string, string>;

export interface ChangeReport {
  needsRegeneration: boolean;
  added: string[];
  removed: string[];
  changed: string[];
}

export type GenerationStatus = 'generated' | 'unchanged' | 'skipped' | 'empty';

export interface GenerationResult {
  status: GenerationStatus;
  modulePath: string;
  outputPath: string;
  /** Rendered document, empty when nothing was regenerated */
  content: string;
  report: ChangeReport | null;
  fingerprints: FingerprintRecord;
}
