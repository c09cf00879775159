import { execFile as execFileCallback } from 'child_process';
import { promisify } from 'util';
import type { SessionId } from '../types/Session.js';
import { SUPPORTED_SIGNALS, type SupportedSignal } from '../types/Terminal.js';
import type { Multiplexer } from '../utils/tmux.js';
import { errorMessage } from '../utils/errors.js';

const execFile = promisify(execFileCallback);

export interface ProcessSignaller {
  /** Direct children of `parentPid`; empty when there are none */
  childPids(parentPid: number): Promise<number[]>;
  kill(pid: number, signal: SupportedSignal): void;
}

function hasExitCode(err: unknown, code: number): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export class SystemSignaller implements ProcessSignaller {
  async childPids(parentPid: number): Promise<number[]> {
    try {
      const { stdout } = await execFile('pgrep', ['-P', String(parentPid)], { encoding: 'utf8' });
      return stdout
        .split('\n')
        .map((line) => parseInt(line.trim(), 10))
        .filter((pid) => !Number.isNaN(pid));
    } catch (err) {
      // pgrep exits 1 when nothing matched
      if (hasExitCode(err, 1)) return [];
      throw err;
    }
  }

  kill(pid: number, signal: SupportedSignal): void {
    process.kill(pid, signal);
  }
}

function isSupportedSignal(name: string): name is SupportedSignal {
  return SUPPORTED_SIGNALS.some((signal) => signal === name);
}

/** Maps a client-supplied name to a signal; anything unrecognised is SIGINT */
export function toSupportedSignal(name: string | undefined): SupportedSignal {
  if (!name) return 'SIGINT';
  const upper = name.toUpperCase();
  const normalized = upper.startsWith('SIG') ? upper : `SIG${upper}`;
  return isSupportedSignal(normalized) ? normalized : 'SIGINT';
}

/**
 * Delivers POSIX signals to whatever runs in a session's pane.
 *
 * The pane process is usually the shell, so the signal goes to its
 * children (the foreground job); a bare shell gets it directly.
 */
export class SignalRouter {
  constructor(
    private readonly tmux: Multiplexer,
    private readonly signaller: ProcessSignaller = new SystemSignaller()
  ) {}

  async deliver(sessionId: SessionId, signal: SupportedSignal): Promise<boolean> {
    const panePid = await this.tmux.panePid(sessionId);
    if (panePid === null) {
      console.error(`[SignalRouter] ${sessionId}: no pane pid`);
      return false;
    }

    let targets: number[];
    try {
      const children = await this.signaller.childPids(panePid);
      targets = children.length > 0 ? children : [panePid];
    } catch (err) {
      console.error(`[SignalRouter] ${sessionId}: failed to list children of ${panePid}:`, errorMessage(err));
      return false;
    }

    let delivered = true;
    for (const pid of targets) {
      try {
        this.signaller.kill(pid, signal);
      } catch (err) {
        console.error(`[SignalRouter] ${sessionId}: ${signal} to ${pid} failed:`, errorMessage(err));
        delivered = false;
      }
    }

    if (delivered) {
      console.log(`[SignalRouter] ${sessionId}: sent ${signal} to ${targets.join(', ')}`);
    }
    return delivered;
  }
}
