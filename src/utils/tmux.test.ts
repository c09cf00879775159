import { describe, expect, it } from 'vitest';
import { TmuxClient, execFailureOutput } from './tmux.js';
import { toSessionId } from './identity.js';

describe('execFailureOutput', () => {
  it('should take the output attached to a failed exec', () => {
    const err = Object.assign(new Error('Command failed'), { stdout: '', stderr: "can't find session: term-x\n" });

    expect(execFailureOutput(err)).toEqual({ stdout: '', stderr: "can't find session: term-x\n" });
  });

  it('should fall back to the error message', () => {
    expect(execFailureOutput(new Error('spawn tmux ENOENT'))).toEqual({ stdout: '', stderr: 'spawn tmux ENOENT' });
  });

  it('should stringify non-objects', () => {
    expect(execFailureOutput('boom')).toEqual({ stdout: '', stderr: 'boom' });
  });
});

describe('TmuxClient', () => {
  it('should attach through its own socket', () => {
    const client = new TmuxClient('termpanel', '/usr/bin/tmux');

    expect(client.attachCommand(toSessionId('build', 'term-'))).toEqual({
      file: '/usr/bin/tmux',
      args: ['-L', 'termpanel', 'attach-session', '-t', '=term-build'],
    });
  });
});

describe('TmuxClient targets', () => {
  function recordingClient() {
    const calls: string[][] = [];
    const client = new TmuxClient('termpanel', 'tmux', async (_file, args) => {
      calls.push(args);
      return { stdout: '4242\n', stderr: '' };
    });
    return { client, calls };
  }

  const id = toSessionId('b', 'term-');

  it('should anchor session targets so a missing name never matches by prefix', async () => {
    const { client, calls } = recordingClient();

    await client.hasSession(id);
    await client.setOption(id, 'mouse', 'off');
    await client.setEnvironment(id, 'DISPLAY', ':100');
    await client.unsetEnvironment(id, 'DISPLAY');
    await client.killSession(id);

    expect(calls.map((args) => args.slice(2, 5))).toEqual([
      ['has-session', '-t', '=term-b'],
      ['set-option', '-t', '=term-b'],
      ['set-environment', '-t', '=term-b'],
      ['set-environment', '-t', '=term-b'],
      ['kill-session', '-t', '=term-b'],
    ]);
  });

  it('should anchor pane and window targets', async () => {
    const { client, calls } = recordingClient();

    await client.setOption(id, 'aggressive-resize', 'on', true);
    await client.resizeWindow(id, 100, 30);
    await client.sendLiteral(id, 'ls');
    await client.sendKeys(id, 'Enter');
    await client.panePid(id);
    await client.capturePane(id, -50);
    await client.historySize(id);
    await client.copyMode(id);

    expect(calls.map((args) => args.slice(2, 5))).toEqual([
      ['set-window-option', '-t', '=term-b:'],
      ['resize-window', '-t', '=term-b:'],
      ['refresh-client', '-t', '=term-b:'],
      ['send-keys', '-t', '=term-b:'],
      ['send-keys', '-t', '=term-b:'],
      ['display-message', '-t', '=term-b:'],
      ['capture-pane', '-t', '=term-b:'],
      ['display-message', '-t', '=term-b:'],
      ['copy-mode', '-t', '=term-b:'],
    ]);
  });

  it('should repeat a copy-mode key with -N', async () => {
    const { client, calls } = recordingClient();

    await client.repeatKey(id, 'C-y', 5);

    expect(calls).toEqual([['-L', 'termpanel', 'send-keys', '-t', '=term-b:', '-N', '5', 'C-y']]);
  });

  it('should report a failed command as not ok', async () => {
    const client = new TmuxClient('termpanel', 'tmux', async () => {
      throw Object.assign(new Error('Command failed'), { stdout: '', stderr: "can't find pane: =term-b:\n" });
    });

    expect(await client.panePid(id)).toBeNull();
    expect(await client.sendLiteral(id, 'x')).toBe(false);
  });
});
