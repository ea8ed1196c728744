import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  findConfig,
  getDefaultConfig,
  loadConfig,
  loadConfigOrDefault,
  parseConfig,
} from '../../../src/config/loader.js';
import { createTempProject, getFixturePath, type TempProjectResult } from '../../helpers/fixtures.js';

describe('Config Loader', () => {
  describe('loadConfig', () => {
    it('should load and parse a valid config file', async () => {
      const config = await loadConfig(getFixturePath('configs', 'valid-config.json'));

      expect(config.stateDirectory).toBe('.state');
      expect(config.exclusionFile).toBe('exclude.json');
      expect(config.output).toEqual({ suffix: 'docs.md', directory: 'docs' });
      expect(config.overwrite).toBe(false);
      expect(config.includeArguments).toBe(true);
      expect(config.storage).toEqual({ backend: 'sqlite', database: 'hashes.db' });
      expect(config.include).toEqual(['src/**/*.py']);
      expect(config.watch.debounceMs).toBe(50);
    });

    it('should apply defaults for missing optional fields', async () => {
      const config = await loadConfig(getFixturePath('configs', 'minimal-config.json'));
      expect(config).toEqual(getDefaultConfig());
    });

    it('should throw for non-existent config file', async () => {
      await expect(loadConfig('/non/existent/config.json')).rejects.toThrow('Config file not found');
    });

    it('should throw for invalid JSON', async () => {
      await expect(loadConfig(getFixturePath('configs', 'invalid-json.json'))).rejects.toThrow('Invalid JSON');
    });

    it('should throw with field path for schema validation errors', async () => {
      await expect(loadConfig(getFixturePath('configs', 'invalid-schema.json'))).rejects.toThrow(
        /Invalid configuration:\n {2}- storage\.backend: /
      );
    });
  });

  describe('parseConfig', () => {
    it('should validate plain objects', () => {
      expect(parseConfig({ overwrite: false }).overwrite).toBe(false);
      expect(() => parseConfig({ overwrite: 'no' })).toThrow('overwrite');
    });
  });

  describe('findConfig', () => {
    let project: TempProjectResult;

    beforeEach(() => {
      project = createTempProject();
    });

    afterEach(() => {
      project.cleanup();
    });

    it('should find a config file in the start directory', async () => {
      project.addFile('helpdoc.config.json', '{"stateDirectory": ".found"}');
      const config = await findConfig(project.rootDir);
      expect(config?.stateDirectory).toBe('.found');
    });

    it('should walk up to parent directories', async () => {
      project.addFile('.helpdocrc', '{"output": {"suffix": "api.md"}}');
      project.addFile('pkg/sub/mod.py', '');
      const config = await findConfig(project.getFilePath('pkg/sub'));
      expect(config?.output.suffix).toBe('api.md');
    });

    it('should read the helpdoc key from package.json', async () => {
      project.addFile('package.json', JSON.stringify({ name: 'demo', helpdoc: { includeArguments: true } }));
      const config = await findConfig(project.rootDir);
      expect(config?.includeArguments).toBe(true);
    });

    it('should prefer a config file over package.json in the same directory', async () => {
      project.addFile('package.json', JSON.stringify({ helpdoc: { stateDirectory: '.pkg' } }));
      project.addFile('.helpdocrc.json', '{"stateDirectory": ".rc"}');
      const config = await findConfig(project.rootDir);
      expect(config?.stateDirectory).toBe('.rc');
    });

    it('should throw for a package.json that is not JSON', async () => {
      project.addFile('package.json', '{');
      await expect(findConfig(project.rootDir)).rejects.toThrow('Invalid JSON in');
    });
  });

  describe('loadConfigOrDefault', () => {
    it('should load a discovered config', async () => {
      const project = createTempProject({ 'helpdoc.config.json': '{"overwrite": false}' });
      try {
        expect((await loadConfigOrDefault(project.rootDir)).overwrite).toBe(false);
      } finally {
        project.cleanup();
      }
    });
  });
});
