import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ProcessSlotRegistry } from './ProcessSlotRegistry.js';
import { FakeProcessTable } from '../test/helpers/fakeProcesses.js';
import { delay } from '../utils/async.js';

describe('ProcessSlotRegistry', () => {
  let table: FakeProcessTable;
  let registry: ProcessSlotRegistry;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    table = new FakeProcessTable();
    registry = new ProcessSlotRegistry({ terminateGraceMs: 1, spawn: table.spawn, kill: table.kill });
  });

  it('should track spawned processes per slot', () => {
    const first = registry.spawn('display:100', 'xvfb', 'Xvfb', [':100']);
    registry.spawn('display:100', 'x11vnc', 'x11vnc', []);

    expect(registry.processes('display:100').map((p) => p.stage)).toEqual(['xvfb', 'x11vnc']);
    expect(registry.isAlive(first.pid)).toBe(true);
    expect(table.byCommand('Xvfb')?.args).toEqual([':100']);
  });

  it('should log a failing stderr pipe instead of crashing', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const tracked = registry.spawn('display:100', 'xvfb', 'Xvfb', [':100']);

    table.byCommand('Xvfb')?.stderr.emit('error', new Error('read EPIPE'));

    expect(errors).toHaveBeenCalledWith('[ProcessRegistry] display:100: stderr of xvfb failed:', 'read EPIPE');
    expect(registry.isAlive(tracked.pid)).toBe(true);
  });

  it('should report a process that exited as dead', async () => {
    table.setBehavior('Xvfb', { kind: 'exit', code: 1, stderr: 'Server is already active for display 100' });
    const tracked = registry.spawn('display:100', 'xvfb', 'Xvfb', [':100']);

    await delay(10);

    expect(registry.isAlive(tracked.pid)).toBe(false);
    expect(tracked.exitInfo()?.code).toBe(1);
    expect(tracked.stderrTail()).toBe('Server is already active for display 100');
  });

  it('should record a spawn failure without a pid', async () => {
    table.setBehavior('Xvfb', { kind: 'enoent' });
    const tracked = registry.spawn('display:100', 'xvfb', 'Xvfb', []);

    await delay(5);

    expect(tracked.pid).toBe(0);
    expect(tracked.hasExited()).toBe(true);
    expect(tracked.exitInfo()?.spawnError?.message).toBe('spawn Xvfb ENOENT');
    expect(registry.isAlive(tracked.pid)).toBe(false);
  });

  it('should stop with SIGTERM when the process honours it', async () => {
    const tracked = registry.spawn('s', 'stage', 'sleep', []);

    await registry.terminate(tracked.pid);

    expect(table.byCommand('sleep')?.signals).toEqual(['SIGTERM']);
    expect(registry.isAlive(tracked.pid)).toBe(false);
  });

  it('should escalate to SIGKILL after the grace period', async () => {
    table.ignoreSigterm.add('stubborn');
    const tracked = registry.spawn('s', 'stage', 'stubborn', []);

    await registry.terminate(tracked.pid);

    expect(table.byCommand('stubborn')?.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(registry.isAlive(tracked.pid)).toBe(false);
  });

  it('should be idempotent and quiet for processes that are already gone', async () => {
    const tracked = registry.spawn('s', 'stage', 'sleep', []);
    await registry.terminate(tracked.pid);

    await expect(registry.terminate(tracked.pid)).resolves.toBeUndefined();
    await expect(registry.terminate(999999)).resolves.toBeUndefined();
    expect(table.byCommand('sleep')?.signals).toEqual(['SIGTERM']);
  });

  it('should tear a slot down newest first and forget it', async () => {
    registry.spawn('display:100', 'xvfb', 'Xvfb', []);
    registry.spawn('display:100', 'x11vnc', 'x11vnc', []);
    registry.spawn('display:100', 'websockify', 'websockify', []);
    registry.spawn('display:101', 'xvfb', 'Xvfb', []);

    await registry.terminateSlot('display:100');

    expect(table.signalLog).toEqual(['websockify:SIGTERM', 'x11vnc:SIGTERM', 'Xvfb:SIGTERM']);
    expect(registry.slotKeys()).toEqual(['display:101']);
    expect(table.alive().map((p) => p.command)).toEqual(['Xvfb']);
  });

  it('should keep tearing down when one process already died', async () => {
    const xvfb = registry.spawn('display:100', 'xvfb', 'Xvfb', []);
    registry.spawn('display:100', 'x11vnc', 'x11vnc', []);
    table.crash(registry.processes('display:100')[1].pid);

    await registry.terminateSlot('display:100');

    expect(registry.isAlive(xvfb.pid)).toBe(false);
    expect(table.alive()).toHaveLength(0);
  });
});
