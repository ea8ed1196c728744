/**
 * Parser exports
 */

export { ModuleParser, type ParserOptions } from './base.js';
export { ParserRegistry, createDefaultRegistry, getDefaultRegistry, resetRegistry } from './registry.js';
export { PythonParser } from './python.js';
