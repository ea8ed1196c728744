/**
 * Type exports
 */

export * from './declarations.js';
export * from './fingerprints.js';
