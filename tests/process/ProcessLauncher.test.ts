import { describe, it, expect, vi } from 'vitest';
import { LaunchFailedError } from '../../src/process/errors';
import { ProcessLauncher } from '../../src/process/ProcessLauncher';
import { ServiceHandle } from '../../src/process/ServiceHandle';
import type { ServiceSpec } from '../../src/process/types';
import { createFakeSpawner } from '../helpers/MockChildProcess';

const backend: ServiceSpec<'background'> = {
  name: 'backend',
  command: 'node',
  args: [ 'server.js' ],
  cwd: '/srv/app',
  env: { PORT: '5000' },
  mode: 'background',
};

const dashboard: ServiceSpec<'foreground'> = {
  name: 'dashboard',
  command: 'npm',
  args: [ 'run', 'dashboard' ],
  mode: 'foreground',
};

describe('ProcessLauncher', () => {
  it('starts a background service and hands back its handle', async() => {
    const spawner = createFakeSpawner();
    const launcher = new ProcessLauncher({ processFactory: spawner.spawn, killTree: vi.fn() });

    const handle = await launcher.launch(backend);

    expect(handle).toBeInstanceOf(ServiceHandle);
    expect(handle.name).toBe('backend');
    expect(handle.pid).toBe(spawner.calls[0].child.pid);
    expect(handle.isRunning()).toBe(true);
    expect(spawner.calls).toHaveLength(1);
    const [ call ] = spawner.calls;
    expect(call.command).toBe('node');
    expect(call.args).toEqual([ 'server.js' ]);
    expect(call.options.cwd).toBe('/srv/app');
    expect(call.options.stdio).toBe('inherit');
    expect(call.options.env?.PORT).toBe('5000');
  });

  it('passes the parent environment through to children', async() => {
    process.env.STARTGATE_TEST_MARKER = 'inherited';
    try {
      const spawner = createFakeSpawner();
      const launcher = new ProcessLauncher({ processFactory: spawner.spawn, killTree: vi.fn() });
      await launcher.launch(backend);
      expect(spawner.calls[0].options.env?.STARTGATE_TEST_MARKER).toBe('inherited');
    } finally {
      delete process.env.STARTGATE_TEST_MARKER;
    }
  });

  it('uses the handle to stop a background service through the tree killer', async() => {
    const spawner = createFakeSpawner();
    const killTree = vi.fn((pid: number, signal: NodeJS.Signals, callback: (error?: Error) => void) => {
      spawner.byPid(pid)?.emit('exit', null, signal);
      callback();
    });
    const launcher = new ProcessLauncher({ processFactory: spawner.spawn, killTree });

    const handle = await launcher.launch(backend);
    await expect(handle.stop(1_000)).resolves.toEqual({ code: null, signal: 'SIGTERM' });
    expect(killTree).toHaveBeenCalledWith(handle.pid, 'SIGTERM', expect.any(Function));
  });

  it('runs a foreground service to completion', async() => {
    const spawner = createFakeSpawner();
    const launcher = new ProcessLauncher({ processFactory: spawner.spawn });
    const onStarted = vi.fn((pid: number) => {
      spawner.byPid(pid)?.emit('exit', 3, null);
    });

    const status = await launcher.launch(dashboard, { onStarted });

    expect(status).toEqual({ code: 3, signal: null });
    expect(onStarted).toHaveBeenCalledTimes(1);
    expect(spawner.calls[0].command).toBe('npm');
  });

  it('forwards the abort reason to a foreground child as a signal', async() => {
    const spawner = createFakeSpawner();
    const launcher = new ProcessLauncher({ processFactory: spawner.spawn });
    const controller = new AbortController();

    const status = await launcher.launch(dashboard, {
      signal: controller.signal,
      onStarted: () => controller.abort('SIGINT'),
    });

    expect(status).toEqual({ code: null, signal: 'SIGINT' });
    expect(spawner.calls[0].child.killSignals).toEqual([ 'SIGINT' ]);
  });

  it('falls back to SIGTERM when the abort reason is not a signal', async() => {
    const spawner = createFakeSpawner();
    const launcher = new ProcessLauncher({ processFactory: spawner.spawn });
    const controller = new AbortController();
    controller.abort();

    const status = await launcher.launch(dashboard, { signal: controller.signal });

    expect(status).toEqual({ code: null, signal: 'SIGTERM' });
    expect(spawner.calls[0].child.killSignals).toEqual([ 'SIGTERM' ]);
  });

  it('rejects with LaunchFailedError when the command cannot be spawned', async() => {
    const spawner = createFakeSpawner([ 'npm' ]);
    const launcher = new ProcessLauncher({ processFactory: spawner.spawn });
    const onStarted = vi.fn();

    const launching = launcher.launch(dashboard, { onStarted });

    await expect(launching).rejects.toBeInstanceOf(LaunchFailedError);
    await expect(launching).rejects.toThrow('Failed to launch dashboard (npm run dashboard): spawn npm ENOENT');
    expect(onStarted).not.toHaveBeenCalled();
  });

  it('rejects with LaunchFailedError when the factory throws', async() => {
    const launcher = new ProcessLauncher({
      processFactory: () => {
        throw new Error('EACCES');
      },
    });

    await expect(launcher.launch(backend)).rejects.toThrow('Failed to launch backend (node server.js): EACCES');
  });

  it('reports a missing executable from a real spawn', async() => {
    const launcher = new ProcessLauncher();
    const missing: ServiceSpec<'background'> = {
      name: 'ghost',
      command: 'startgate-command-that-does-not-exist',
      args: [],
      mode: 'background',
    };

    const error: unknown = await launcher.launch(missing).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LaunchFailedError);
    expect(error).toMatchObject({ service: 'ghost', command: 'startgate-command-that-does-not-exist' });
  });
});
