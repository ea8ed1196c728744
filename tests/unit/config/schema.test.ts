import { describe, it, expect } from 'vitest';
import { configSchema, storageConfigSchema } from '../../../src/config/schema.js';

describe('configSchema', () => {
  it('should fill every default from an empty object', () => {
    expect(configSchema.parse({})).toEqual({
      stateDirectory: '.jsondata',
      exclusionFile: 'exclude_help_ast.json',
      output: { suffix: 'help.md' },
      overwrite: true,
      includeArguments: false,
      storage: { backend: 'json', database: 'fingerprints.db' },
      include: ['**/*.py'],
      exclude: ['**/node_modules/**', '**/.git/**', '**/venv/**', '**/.venv/**', '**/__pycache__/**'],
      watch: { debounceMs: 300 },
      parser: { maxFileSize: 1024 * 1024 },
    });
  });

  it('should fill nested defaults for partial sections', () => {
    const config = configSchema.parse({ storage: { backend: 'sqlite' }, output: { directory: 'docs' } });
    expect(config.storage).toEqual({ backend: 'sqlite', database: 'fingerprints.db' });
    expect(config.output).toEqual({ suffix: 'help.md', directory: 'docs' });
  });

  it('should reject unknown backends', () => {
    expect(storageConfigSchema.safeParse({ backend: 'postgres' }).success).toBe(false);
  });

  it('should reject an empty suffix', () => {
    expect(configSchema.safeParse({ output: { suffix: '' } }).success).toBe(false);
  });

  it('should reject a negative debounce', () => {
    expect(configSchema.safeParse({ watch: { debounceMs: -1 } }).success).toBe(false);
  });
});
