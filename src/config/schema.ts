/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const outputConfigSchema = z.object({
  suffix: z.string().min(1).default('help.md'),
  directory: z.string().optional(),
});

export const storageConfigSchema = z.object({
  backend: z.enum(['json', 'sqlite']).default('json'),
  // Resolved against stateDirectory
  database: z.string().default('fingerprints.db'),
});

export const watchConfigSchema = z.object({
  debounceMs: z.number().int().min(0).default(300),
});

export const parserConfigSchema = z.object({
  maxFileSize: z.number().default(1024 * 1024), // 1MB default, 0 = unlimited
});

export const configSchema = z.object({
  stateDirectory: z.string().default('.jsondata'),
  exclusionFile: z.string().default('exclude_help_ast.json'),
  output: outputConfigSchema.default({}),
  overwrite: z.boolean().default(true),
  includeArguments: z.boolean().default(false),
  storage: storageConfigSchema.default({}),
  include: z.array(z.string()).default(['**/*.py']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/.git/**',
    '**/venv/**',
    '**/.venv/**',
    '**/__pycache__/**',
  ]),
  watch: watchConfigSchema.default({}),
  parser: parserConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
export type StorageConfig = z.infer<typeof storageConfigSchema>;
export type WatchConfig = z.infer<typeof watchConfigSchema>;
export type ParserConfig = z.infer<typeof parserConfigSchema>;
