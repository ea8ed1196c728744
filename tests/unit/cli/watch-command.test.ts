/**
 * Unit tests for the watch CLI command
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createTempProject, GREETER_SOURCE, type TempProjectResult } from '../../helpers/fixtures.js';
import { spyOnCli, type CliSpies } from '../../helpers/console.js';
import type { MockChokidar } from '../../helpers/mocks/chokidar.js';

// Held outside the module registry, which vi.resetModules clears between tests
const watchers = vi.hoisted((): MockChokidar[] => []);

vi.mock('chokidar', async () => {
  const { createMockChokidar } = await import('../../helpers/mocks/chokidar.js');
  const watch = () => {
    const watcher = createMockChokidar();
    watchers.push(watcher);
    return watcher;
  };
  return { watch, default: { watch } };
});

function lastWatcher(): MockChokidar {
  const watcher = watchers[watchers.length - 1];
  if (!watcher) throw new Error('chokidar.watch was not called');
  return watcher;
}

describe('CLI watch command', () => {
  let project: TempProjectResult;
  let cli: CliSpies;
  let onSpy: MockInstance<typeof process.on>;

  async function runWatch(args: string[]): Promise<void> {
    const { watchCommand } = await import('../../../src/cli/commands/watch.js');
    await watchCommand.parseAsync(args, { from: 'user' });
  }

  let handlers: Map<string, () => void>;

  function signalHandler(signal: string): () => void {
    const handler = handlers.get(signal);
    if (!handler) throw new Error(`No handler for ${signal}`);
    return handler;
  }

  beforeEach(() => {
    vi.resetModules();
    project = createTempProject({ 'greeter.py': GREETER_SOURCE });
    cli = spyOnCli();
    handlers = new Map();
    onSpy = vi.spyOn(process, 'on').mockImplementation(((event: string, listener: () => void) => {
      handlers.set(event, listener);
      return process;
    }) as never);
  });

  afterEach(() => {
    onSpy.mockRestore();
    cli.restore();
    project.cleanup();
  });

  it('brings modules up to date before watching', async () => {
    await runWatch(['*.py', '--root', project.rootDir]);

    expect(cli.stdout()).toEqual(['Help file generated/updated: greeter-help.md']);
    expect(project.exists('greeter-help.md')).toBe(true);
  });

  it('announces readiness and registers shutdown handlers', async () => {
    await runWatch(['*.py', '--root', project.rootDir]);
    lastWatcher().simulateReady();

    expect(cli.stdout()).toContain('Watching for changes... (Press Ctrl+C to stop)\n');
    expect(onSpy).toHaveBeenCalledWith('SIGINT', expect.any(Function));
    expect(onSpy).toHaveBeenCalledWith('SIGTERM', expect.any(Function));
  });

  it('closes the watcher and exits on SIGINT', async () => {
    await runWatch(['*.py', '--root', project.rootDir]);
    const watcher = lastWatcher();

    signalHandler('SIGINT')();

    await vi.waitFor(() => {
      expect(cli.exit).toHaveBeenCalledWith(0);
    });
    expect(watcher.isClosed()).toBe(true);
  });

  it('reports configuration errors', async () => {
    await runWatch(['*.py', '--root', project.rootDir, '--backend', 'postgres']);

    expect(cli.stderr()[0]).toContain('Invalid configuration');
    expect(cli.exit).toHaveBeenCalledWith(1);
  });
});
