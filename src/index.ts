/**
 * py-helpdoc - Markdown help files for Python modules
 *
 * Parses Python sources, fingerprints every declaration, and regenerates a
 * module's help file only when one of those fingerprints changes.
 */

// Types
export * from './types/index.js';

// Generator
export {
  HelpGenerator,
  ModuleWatcher,
  type GeneratorConfig,
  type CheckResult,
  type WatcherOptions,
  type WatcherEvents,
} from './analyzer/index.js';

// Analysis
export { fingerprint, qualifiedKey, collectFingerprints } from './analyzer/fingerprint.js';
export {
  detectChanges,
  shouldRender,
  serializeFingerprints,
  summarizeChanges,
} from './analyzer/change-detector.js';
export { normalizeParameters, formatParameter, functionSignature, ANY_TYPE } from './analyzer/signature.js';
export {
  renderExpression,
  canonicalText,
  dumpExpression,
  OPAQUE_PLACEHOLDER,
  type RenderResult,
} from './analyzer/expression.js';
export { HelpDocError, ParseFailure, StoreError, OutputWriteError } from './analyzer/errors.js';
export { loadExclusions, saveExclusions, addExclusions, removeExclusions } from './analyzer/exclusions.js';
export { FileTextOutput, type TextOutput } from './analyzer/output.js';
export { deriveOutputPath, moduleKey } from './analyzer/paths.js';

// Parsers
export {
  ModuleParser,
  ParserRegistry,
  PythonParser,
  createDefaultRegistry,
  getDefaultRegistry,
  type ParserOptions,
} from './analyzer/parsers/index.js';

// Storage
export {
  JsonFingerprintStore,
  SqliteFingerprintStore,
  MemoryFingerprintStore,
  type FingerprintStore,
} from './analyzer/storage/index.js';

// Rendering
export { renderDocument, planDocument, renderUsage, type RenderOptions } from './render/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
