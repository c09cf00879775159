import { spawn as spawnChild } from 'child_process';
import type { Readable } from 'stream';
import { delay } from '../utils/async.js';
import { errorMessage, isErrnoException } from '../utils/errors.js';

const STDERR_TAIL_BYTES = 4096;

/** The parts of a ChildProcess the registry relies on */
export interface ChildHandle {
  readonly pid: number | undefined;
  readonly stderr: Readable | null;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (err: Error) => void): void;
}

export type SpawnFn = (command: string, args: string[], env: NodeJS.ProcessEnv) => ChildHandle;
export type KillFn = (pid: number, signal: NodeJS.Signals | 0) => void;

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all (e.g. ENOENT) */
  spawnError?: NodeJS.ErrnoException | Error;
}

const defaultSpawn: SpawnFn = (command, args, env) => {
  const child = spawnChild(command, args, { env, stdio: ['ignore', 'ignore', 'pipe'] });
  return {
    pid: child.pid,
    stderr: child.stderr,
    onExit: (listener) => {
      child.on('exit', listener);
    },
    onError: (listener) => {
      child.on('error', listener);
    },
  };
};

const defaultKill: KillFn = (pid, signal) => {
  process.kill(pid, signal);
};

export class TrackedProcess {
  private exit: ExitInfo | null = null;
  private stderrBuffer = '';

  constructor(
    readonly slotKey: string,
    readonly stage: string,
    readonly command: string,
    private readonly child: ChildHandle
  ) {
    child.onExit((code, signal) => {
      this.exit = { code, signal, spawnError: this.exit?.spawnError };
    });
    child.onError((err) => {
      this.exit = { code: null, signal: null, spawnError: err };
    });
    child.stderr?.on('data', (chunk: Buffer | string) => {
      this.stderrBuffer = (this.stderrBuffer + chunk.toString()).slice(-STDERR_TAIL_BYTES);
    });
    child.stderr?.on('error', (err) => {
      console.error(`[ProcessRegistry] ${slotKey}: stderr of ${stage} failed:`, err.message);
    });
  }

  /** 0 when the OS never assigned a pid (spawn failed) */
  get pid(): number {
    return this.child.pid ?? 0;
  }

  hasExited(): boolean {
    return this.exit !== null;
  }

  exitInfo(): ExitInfo | null {
    return this.exit;
  }

  stderrTail(): string {
    return this.stderrBuffer.trim();
  }
}

export interface ProcessSlotRegistryOptions {
  terminateGraceMs: number;
  spawn?: SpawnFn;
  kill?: KillFn;
}

/**
 * Table of child processes keyed by the resource they serve (a display
 * number, a session name). Teardown is SIGTERM, a short grace period,
 * then SIGKILL.
 */
export class ProcessSlotRegistry {
  private slots = new Map<string, TrackedProcess[]>();
  private readonly spawnFn: SpawnFn;
  private readonly killFn: KillFn;
  private readonly terminateGraceMs: number;

  constructor(options: ProcessSlotRegistryOptions) {
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.killFn = options.kill ?? defaultKill;
    this.terminateGraceMs = options.terminateGraceMs;
  }

  spawn(slotKey: string, stage: string, command: string, args: string[], env: NodeJS.ProcessEnv = process.env): TrackedProcess {
    const child = this.spawnFn(command, args, env);
    const tracked = new TrackedProcess(slotKey, stage, command, child);

    const list = this.slots.get(slotKey) ?? [];
    list.push(tracked);
    this.slots.set(slotKey, list);

    console.log(`[ProcessRegistry] ${slotKey}: started ${stage} (${command}) pid=${tracked.pid}`);
    return tracked;
  }

  processes(slotKey: string): TrackedProcess[] {
    return [...(this.slots.get(slotKey) ?? [])];
  }

  private findByPid(pid: number): TrackedProcess | undefined {
    for (const list of this.slots.values()) {
      const found = list.find((p) => p.pid === pid);
      if (found) return found;
    }
    return undefined;
  }

  /** Signal 0: checks existence without delivering anything */
  isAlive(pid: number): boolean {
    if (pid <= 0) return false;
    if (this.findByPid(pid)?.hasExited()) return false;

    try {
      this.killFn(pid, 0);
      return true;
    } catch (err) {
      // EPERM: exists but belongs to someone else
      return isErrnoException(err) && err.code === 'EPERM';
    }
  }

  /** Idempotent; never throws */
  async terminate(pid: number): Promise<void> {
    if (!this.isAlive(pid)) return;

    if (!this.signal(pid, 'SIGTERM')) return;
    await delay(this.terminateGraceMs);

    if (this.isAlive(pid)) {
      this.signal(pid, 'SIGKILL');
    }
  }

  /**
   * Terminates every process of a slot, newest first, and forgets the slot.
   * A failure on one process does not stop the others.
   */
  async terminateSlot(slotKey: string): Promise<void> {
    const list = this.slots.get(slotKey) ?? [];

    for (const tracked of [...list].reverse()) {
      try {
        await this.terminate(tracked.pid);
      } catch (err) {
        console.error(`[ProcessRegistry] ${slotKey}: failed to stop ${tracked.stage}:`, errorMessage(err));
      }
    }

    if (this.slots.get(slotKey) === list) {
      this.slots.delete(slotKey);
    }
  }

  slotKeys(): string[] {
    return [...this.slots.keys()];
  }

  /** Returns false when the process is already gone */
  private signal(pid: number, signal: NodeJS.Signals): boolean {
    try {
      this.killFn(pid, signal);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ESRCH') {
        return false;
      }
      console.error(`[ProcessRegistry] ${signal} to ${pid} failed:`, errorMessage(err));
      return false;
    }
  }
}
