import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TerminalBridgeManager } from './TerminalBridge.js';
import { FakeMultiplexer, FakePtyFactory } from '../test/helpers/fakeTerminal.js';
import type { BridgeConfig } from '../config/index.js';
import type { SessionId } from '../types/Session.js';
import { toSessionId } from '../utils/identity.js';
import { delay } from '../utils/async.js';

const config: BridgeConfig = {
  graceMs: 30,
  preAttachDelayMs: 0,
  attachSettleMs: 0,
  filterQuerySequences: true,
};

const id = (name: string): SessionId => toSessionId(name, 'term-');

describe('TerminalBridgeManager', () => {
  let tmux: FakeMultiplexer;
  let ptys: FakePtyFactory;
  let bridge: TerminalBridgeManager;
  let output: Array<[string, string]>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    tmux = new FakeMultiplexer();
    ptys = new FakePtyFactory();
    bridge = new TerminalBridgeManager(tmux, config, ptys.spawn);
    output = [];
    bridge.setOutputHandler((sessionId, data) => output.push([sessionId, data]));
    tmux.addSession('term-build');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('acquire', () => {
    it('should attach a PTY to the tmux session', async () => {
      const info = await bridge.acquire(id('build'), 'client-1', 120, 40);

      expect(info?.sessionId).toBe('term-build');
      expect(info?.subscriberCount).toBe(1);
      expect(info?.dimensions).toEqual({ cols: 120, rows: 40 });
      expect(ptys.spawned).toHaveLength(1);
      expect(ptys.last()?.args).toEqual(['-L', 'test', 'attach-session', '-t', '=term-build']);
      expect(ptys.last()?.options.name).toBe('xterm-256color');
      expect(tmux.calls).toEqual(['resize-window term-build 120x40', 'resize-window term-build 120x40']);
    });

    it('should return null and spawn nothing for a missing session', async () => {
      const info = await bridge.acquire(id('ghost'), 'client-1', 80, 24);

      expect(info).toBeNull();
      expect(ptys.spawned).toHaveLength(0);
      expect(bridge.info(id('ghost'))).toBeNull();
    });

    it('should create one PTY for concurrent subscribers', async () => {
      const results = await Promise.all([
        bridge.acquire(id('build'), 'a', 80, 24),
        bridge.acquire(id('build'), 'b', 80, 24),
        bridge.acquire(id('build'), 'c', 80, 24),
      ]);

      expect(ptys.spawned).toHaveLength(1);
      expect(new Set(results.map((r) => r?.pid)).size).toBe(1);
      expect(bridge.info(id('build'))?.subscriberCount).toBe(3);
    });

    it('should re-attach when the previous reader stopped', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);
      const first = ptys.last();
      first?.emitExit(1);

      const info = await bridge.acquire(id('build'), 'a', 80, 24);

      expect(ptys.spawned).toHaveLength(2);
      expect(info?.pid).toBe(ptys.last()?.pid);
      expect(info?.readerStopped).toBe(false);
      expect(first?.killed).toBe(false);
    });

    it('should report a PTY that cannot be spawned as a stream fault', async () => {
      ptys.failSpawn = true;

      await expect(bridge.acquire(id('build'), 'a', 80, 24)).rejects.toMatchObject({ kind: 'StreamFault' });
      expect(bridge.info(id('build'))).toBeNull();
    });
  });

  describe('output', () => {
    it('should forward PTY output with terminal queries removed', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);

      ptys.last()?.emitData('hi\x1b]11;?\x07 there');

      expect(output).toEqual([['term-build', 'hi there']]);
    });

    it('should keep split sequences out of the stream', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);

      ptys.last()?.emitData('a\x1b]1');
      ptys.last()?.emitData('0;?\x07b');

      expect(output).toEqual([['term-build', 'a'], ['term-build', 'b']]);
    });

    it('should pass output through untouched when filtering is off', async () => {
      bridge = new TerminalBridgeManager(tmux, { ...config, filterQuerySequences: false }, ptys.spawn);
      bridge.setOutputHandler((sessionId, data) => output.push([sessionId, data]));
      await bridge.acquire(id('build'), 'a', 80, 24);

      ptys.last()?.emitData('\x1b]11;?\x07');

      expect(output).toEqual([['term-build', '\x1b]11;?\x07']]);
    });

    it('should notify subscribers when the reader stops', async () => {
      const closed = vi.fn();
      bridge.setClosedHandler(closed);
      await bridge.acquire(id('build'), 'a', 80, 24);

      ptys.last()?.emitExit(0);

      expect(closed).toHaveBeenCalledWith('term-build', ['a']);
      expect(bridge.info(id('build'))?.readerStopped).toBe(true);
    });
  });

  describe('release', () => {
    it('should keep the PTY when a client comes back within the grace period', async () => {
      const first = await bridge.acquire(id('build'), 'a', 80, 24);
      bridge.release(id('build'), 'a');
      await delay(5);

      const second = await bridge.acquire(id('build'), 'a', 80, 24);
      await delay(config.graceMs + 20);

      expect(second?.pid).toBe(first?.pid);
      expect(ptys.spawned).toHaveLength(1);
      expect(ptys.last()?.killed).toBe(false);
      expect(bridge.info(id('build'))?.subscriberCount).toBe(1);
    });

    it('should ignore the first timer when a client leaves, returns and leaves again', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);
      vi.useFakeTimers();

      bridge.release(id('build'), 'a');
      vi.advanceTimersByTime(20);
      await bridge.acquire(id('build'), 'a', 80, 24);
      bridge.release(id('build'), 'a');

      // Past the first timer's deadline, inside the second grace period
      vi.advanceTimersByTime(15);
      expect(bridge.info(id('build'))?.subscriberCount).toBe(0);
      expect(ptys.last()?.killed).toBe(false);

      vi.advanceTimersByTime(14);
      expect(bridge.info(id('build'))).not.toBeNull();

      vi.advanceTimersByTime(1);
      expect(bridge.info(id('build'))).toBeNull();
      expect(ptys.last()?.killed).toBe(true);
      expect(ptys.spawned).toHaveLength(1);
    });

    it('should detach after the grace period with no subscribers', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);
      bridge.release(id('build'), 'a');

      await delay(config.graceMs + 20);

      expect(bridge.info(id('build'))).toBeNull();
      expect(ptys.last()?.killed).toBe(true);
      expect(ptys.last()?.listenerCount()).toBe(0);
      expect(tmux.sessions.has('term-build')).toBe(true);
    });

    it('should not detach while other subscribers remain', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);
      await bridge.acquire(id('build'), 'b', 80, 24);
      bridge.release(id('build'), 'a');

      await delay(config.graceMs + 20);

      expect(bridge.info(id('build'))?.subscriberCount).toBe(1);
    });

    it('should release a disconnected client from every session', async () => {
      tmux.addSession('term-logs');
      await bridge.acquire(id('build'), 'a', 80, 24);
      await bridge.acquire(id('logs'), 'a', 80, 24);
      await bridge.acquire(id('logs'), 'b', 80, 24);

      const released = bridge.releaseSubscriber('a');

      expect(released).toEqual(['term-build', 'term-logs']);
      expect(bridge.subscribersOf(id('logs'))).toEqual(['b']);
      expect(bridge.subscribersOf(id('build'))).toEqual([]);
    });
  });

  describe('write', () => {
    it('should write through the live PTY', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);

      expect(await bridge.write(id('build'), 'ls\r')).toBe(true);

      expect(ptys.last()?.written).toEqual(['ls\r']);
      expect(tmux.sessions.get('term-build')?.literal).toEqual([]);
    });

    it('should fall back to send-keys without a PTY', async () => {
      expect(await bridge.write(id('build'), 'echo hi\n')).toBe(true);

      expect(tmux.sessions.get('term-build')?.literal).toEqual(['echo hi\n']);
    });

    it('should fall back to send-keys when the PTY write fails', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);
      const fake = ptys.last();
      if (fake) fake.failWrites = true;

      expect(await bridge.write(id('build'), 'x')).toBe(true);

      expect(tmux.sessions.get('term-build')?.literal).toEqual(['x']);
    });

    it('should return false for an unknown session', async () => {
      expect(await bridge.write(id('ghost'), 'x')).toBe(false);
    });

    it('should keep the order of concurrent writes', async () => {
      await Promise.all(['a', 'b', 'c', 'd'].map((key) => bridge.write(id('build'), key)));

      expect(tmux.sessions.get('term-build')?.literal).toEqual(['a', 'b', 'c', 'd']);
    });
  });

  describe('resize', () => {
    it('should resize both the PTY and the tmux window', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);
      tmux.calls.length = 0;

      await bridge.resize(id('build'), 132, 50);

      expect(ptys.last()?.resizes).toEqual([[132, 50]]);
      expect(tmux.calls).toEqual(['resize-window term-build 132x50']);
      expect(bridge.info(id('build'))?.dimensions).toEqual({ cols: 132, rows: 50 });
    });
  });

  describe('teardown', () => {
    it('should detach immediately and stop forwarding output', async () => {
      await bridge.acquire(id('build'), 'a', 80, 24);
      const fake = ptys.last();

      expect(bridge.teardown(id('build'))).toBe(true);
      fake?.emitData('late');

      expect(fake?.killed).toBe(true);
      expect(output).toEqual([]);
      expect(bridge.teardown(id('build'))).toBe(false);
    });

    it('should detach every session on shutdown', async () => {
      tmux.addSession('term-logs');
      await bridge.acquire(id('build'), 'a', 80, 24);
      await bridge.acquire(id('logs'), 'a', 80, 24);

      bridge.destroyAll();

      expect(bridge.infoAll()).toEqual([]);
      expect(ptys.spawned.every((p) => p.killed)).toBe(true);
    });
  });
});
