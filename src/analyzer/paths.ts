/**
 * Output naming and module identity
 */

import path from 'node:path';

const KEY_SEPARATOR = '__';

/**
 * `pkg/my module.py` -> `pkg/my_module-help.md`. With `directory`, the module's
 * relative path is kept beneath it, so same-named modules never share a file.
 */
export function deriveOutputPath(modulePath: string, suffix: string, directory?: string): string {
  const base = modulePath.replace(/\.pyi?$/i, '').replace(/ /g, '_');
  const fileName = `${base}-${suffix}`;
  return directory ? path.join(directory, fileName) : fileName;
}

/**
 * A segment that could be mistaken for a separator (it holds `__`, or starts or
 * ends with `_`) has its underscores percent-encoded. `%` is always encoded.
 */
function escapeSegment(segment: string): string {
  const escaped = segment.replace(/%/g, '%25');
  const ambiguous = escaped.includes(KEY_SEPARATOR) || escaped.startsWith('_') || escaped.endsWith('_');
  return ambiguous ? escaped.replace(/_/g, '%5F') : escaped;
}

/**
 * Persistence key: module path relative to the root, separators replaced by `__`
 */
export function moduleKey(modulePath: string, rootDirectory: string): string {
  const relative = path.relative(rootDirectory, path.resolve(rootDirectory, modulePath));
  return relative.split(/[\\/]/).map(escapeSegment).join(KEY_SEPARATOR);
}
