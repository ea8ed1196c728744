/**
 * End-to-end generation runs against real files in a temporary project
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { HelpGenerator } from '../../src/analyzer/index.js';
import { addExclusions } from '../../src/analyzer/exclusions.js';
import {
  createTempProject,
  GREETER_EXCLUDED_HELP,
  GREETER_HELP,
  GREETER_SOURCE,
  type TempProjectResult,
} from '../helpers/fixtures.js';

const STATE_FILE = '.jsondata/greeter.py.checksums.json';

describe('help generation pipeline', () => {
  let project: TempProjectResult;
  let generators: HelpGenerator[];

  function run(modulePath = 'greeter.py') {
    const generator = new HelpGenerator({ rootDirectory: project.rootDir, stateDirectory: '.jsondata' });
    generators.push(generator);
    return generator.generate(modulePath);
  }

  beforeEach(() => {
    project = createTempProject({ 'greeter.py': GREETER_SOURCE });
    generators = [];
  });

  afterEach(() => {
    for (const generator of generators) generator.close();
    project.cleanup();
  });

  describe('Greeter module', () => {
    it('writes the help file and exactly one key per declaration', () => {
      const result = run();

      expect(result.status).toBe('generated');
      expect(project.readFile('greeter-help.md')).toBe(GREETER_HELP);
      expect(Object.keys(JSON.parse(project.readFile(STATE_FILE)))).toEqual([
        'class_Greeter',
        'def_Greeter.__init__',
        'def_Greeter.greet',
      ]);
    });

    it('produces no output on a second run without edits', () => {
      run();
      const second = run();

      expect(second.status).toBe('unchanged');
      expect(second.content).toBe('');
      expect(second.report?.needsRegeneration).toBe(false);
    });
  });

  describe('idempotence', () => {
    it('leaves the state and the help file byte-identical across runs', () => {
      run();
      const state = project.readFile(STATE_FILE);
      const help = project.readFile('greeter-help.md');
      const helpModified = fs.statSync(project.getFilePath('greeter-help.md')).mtimeMs;

      run();
      run();

      expect(project.readFile(STATE_FILE)).toBe(state);
      expect(project.readFile('greeter-help.md')).toBe(help);
      expect(fs.statSync(project.getFilePath('greeter-help.md')).mtimeMs).toBe(helpModified);
    });
  });

  describe('sensitivity', () => {
    it('regenerates when a default changes', () => {
      run();
      project.addFile('greeter.py', GREETER_SOURCE.replace('"World"', '"There"'));

      const result = run();
      expect(result.status).toBe('generated');
      expect(result.report?.changed).toEqual(['class_Greeter', 'def_Greeter.__init__']);
      expect(project.readFile('greeter-help.md')).toContain("self.greeter_obj = Greeter(name='There')");
    });

    it('does not regenerate for whitespace and quote-style edits', () => {
      run();
      const reformatted = [
        'class Greeter :',
        '',
        "    def __init__( self, name : str='World' ):",
        '        self.name = name  # stored',
        '',
        '',
        '    def greet( self ):',
        "        '''Say hello.'''",
        '        print(f"Hello, {self.name}!")',
        '',
      ].join('\n');
      project.addFile('greeter.py', reformatted);

      expect(run().status).toBe('unchanged');
    });
  });

  describe('membership changes', () => {
    it('regenerates when a declaration is added', () => {
      run();
      project.addFile('greeter.py', `${GREETER_SOURCE}\n\ndef shout():\n    pass\n`);

      const result = run();
      expect(result.report?.added).toEqual(['def_shout']);
      expect(project.readFile('greeter-help.md')).toContain('## Function: `shout`');
    });

    it('regenerates when a declaration is removed', () => {
      project.addFile('greeter.py', `${GREETER_SOURCE}\n\ndef shout():\n    pass\n`);
      run();
      project.addFile('greeter.py', GREETER_SOURCE);

      const result = run();
      expect(result.status).toBe('generated');
      expect(result.report?.removed).toEqual(['def_shout']);
      expect(project.readFile('greeter-help.md')).toBe(GREETER_HELP);
    });
  });

  describe('exclusions', () => {
    it('drops an excluded method on the next render without touching fingerprints', () => {
      run();
      const state = project.readFile(STATE_FILE);

      addExclusions(project.getFilePath('.jsondata/exclude_help_ast.json'), ['greet']);
      expect(run().status).toBe('unchanged');
      expect(project.readFile(STATE_FILE)).toBe(state);

      fs.rmSync(project.getFilePath('greeter-help.md'));
      expect(run().status).toBe('generated');
      expect(project.readFile('greeter-help.md')).toBe(GREETER_EXCLUDED_HELP);
      expect(project.readFile(STATE_FILE)).toBe(state);
    });
  });

  describe('overwrite disabled', () => {
    it('keeps an existing help file', () => {
      project.addFile('greeter-help.md', 'hand written\n');
      const generator = new HelpGenerator({
        rootDirectory: project.rootDir,
        stateDirectory: '.jsondata',
        overwrite: false,
      });
      generators.push(generator);

      expect(generator.generate('greeter.py').status).toBe('skipped');
      expect(project.readFile('greeter-help.md')).toBe('hand written\n');
      expect(project.exists(STATE_FILE)).toBe(false);
    });
  });

  describe('nested modules', () => {
    it('keys state by the module path relative to the root', () => {
      project.addFile('pkg/util.py', 'def helper():\n    pass\n');
      run('pkg/util.py');

      expect(project.exists('.jsondata/pkg__util.py.checksums.json')).toBe(true);
      expect(project.exists('pkg/util-help.md')).toBe(true);
    });
  });

  describe('output failures', () => {
    it('keeps the previous baseline when the help file cannot be written', () => {
      run();
      const state = project.readFile(STATE_FILE);

      // A directory in place of the help file makes the write fail
      fs.rmSync(project.getFilePath('greeter-help.md'));
      project.addFile('greeter-help.md/keep', '');
      project.addFile('greeter.py', GREETER_SOURCE.replace('"World"', '"There"'));

      expect(() => run()).toThrow('Failed to write help file');
      expect(project.readFile(STATE_FILE)).toBe(state);
    });
  });
});
