import { execFile as execFileCallback } from 'child_process';
import { promisify } from 'util';
import type { SessionId } from '../types/Session.js';

const execFile = promisify(execFileCallback);

// Use a simple multi-character delimiter that won't appear in tmux formats
export const DELIMITER = '|||';

const EXEC_TIMEOUT_MS = 5000;

export interface TmuxResult {
  ok: boolean;
  stdout: string;
  stderr: string;
}

export interface TmuxSessionRow {
  name: string;
  createdAt: number;
  width: number;
  height: number;
  panePid: number | null;
  currentPath: string | null;
  currentCommand: string | null;
}

export interface NewSessionOptions {
  cwd?: string;
  cols: number;
  rows: number;
  /** Program run in the first pane; tmux's default-shell when omitted */
  shell?: string;
}

/**
 * The slice of tmux the server drives. Everything talks to tmux through
 * this interface so tests can substitute an in-memory multiplexer.
 */
export interface Multiplexer {
  readonly socket: string;
  listSessions(): Promise<TmuxSessionRow[]>;
  hasSession(name: SessionId): Promise<boolean>;
  newSession(name: SessionId, options: NewSessionOptions): Promise<TmuxResult>;
  setOption(name: SessionId, option: string, value: string, windowOption?: boolean): Promise<TmuxResult>;
  killSession(name: SessionId): Promise<TmuxResult>;
  resizeWindow(name: SessionId, cols: number, rows: number): Promise<void>;
  sendLiteral(name: SessionId, text: string): Promise<boolean>;
  sendKeys(name: SessionId, ...keys: string[]): Promise<boolean>;
  /** Puts the active pane into copy mode for scrolling */
  copyMode(name: SessionId): Promise<boolean>;
  /** `send-keys -N count key` */
  repeatKey(name: SessionId, key: string, count: number): Promise<boolean>;
  setEnvironment(name: SessionId, variable: string, value: string): Promise<boolean>;
  unsetEnvironment(name: SessionId, variable: string): Promise<boolean>;
  panePid(name: SessionId): Promise<number | null>;
  capturePane(name: SessionId, start: number, end?: number): Promise<string>;
  historySize(name: SessionId): Promise<number>;
  /** argv for a client that attaches interactively, for use inside a PTY */
  attachCommand(name: SessionId): { file: string; args: string[] };
}

function toInt(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

/** execFile rejects with stdout/stderr attached on a non-zero exit */
export function execFailureOutput(err: unknown): { stdout: string; stderr: string } {
  if (typeof err !== 'object' || err === null) {
    return { stdout: '', stderr: String(err) };
  }
  const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
  let stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
  if (!stderr && err instanceof Error) {
    stderr = err.message;
  }
  return { stdout, stderr };
}

/** Runs a binary and resolves with its output; rejects on a non-zero exit */
export type ExecFn = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = (file, args) => execFile(file, args, { timeout: EXEC_TIMEOUT_MS, encoding: 'utf8' });

/**
 * tmux resolves a bare `-t name` by prefix when no session matches exactly,
 * so every target is anchored with `=`.
 */
export function sessionTarget(name: SessionId): string {
  return `=${name}`;
}

/** Active window/pane of exactly `name` */
export function paneTarget(name: SessionId): string {
  return `=${name}:`;
}

export class TmuxClient implements Multiplexer {
  constructor(
    readonly socket: string,
    private readonly binary: string = 'tmux',
    private readonly exec: ExecFn = defaultExec
  ) {}

  async run(...args: string[]): Promise<TmuxResult> {
    try {
      const { stdout, stderr } = await this.exec(this.binary, ['-L', this.socket, ...args]);
      return { ok: true, stdout, stderr };
    } catch (err) {
      return { ok: false, ...execFailureOutput(err) };
    }
  }

  async listSessions(): Promise<TmuxSessionRow[]> {
    const format = [
      '#{session_name}',
      '#{session_created}',
      '#{window_width}',
      '#{window_height}',
      '#{pane_pid}',
      '#{pane_current_path}',
      '#{pane_current_command}',
    ].join(DELIMITER);
    const result = await this.run('list-sessions', '-F', format);
    if (!result.ok || !result.stdout.trim()) return [];

    return result.stdout.trim().split('\n').map((line) => {
      const [name, createdAt, width, height, pid, currentPath, currentCommand] = line.split(DELIMITER);
      return {
        name,
        createdAt: toInt(createdAt) ?? 0,
        width: toInt(width) ?? 0,
        height: toInt(height) ?? 0,
        panePid: toInt(pid),
        currentPath: currentPath || null,
        currentCommand: currentCommand || null,
      };
    });
  }

  async hasSession(name: SessionId): Promise<boolean> {
    const result = await this.run('has-session', '-t', sessionTarget(name));
    return result.ok;
  }

  newSession(name: SessionId, options: NewSessionOptions): Promise<TmuxResult> {
    const args = ['new-session', '-d', '-s', name, '-x', String(options.cols), '-y', String(options.rows)];
    if (options.cwd) {
      args.push('-c', options.cwd);
    }
    if (options.shell) {
      args.push(options.shell);
    }
    return this.run(...args);
  }

  setOption(name: SessionId, option: string, value: string, windowOption = false): Promise<TmuxResult> {
    if (windowOption) {
      return this.run('set-window-option', '-t', paneTarget(name), option, value);
    }
    return this.run('set-option', '-t', sessionTarget(name), option, value);
  }

  killSession(name: SessionId): Promise<TmuxResult> {
    return this.run('kill-session', '-t', sessionTarget(name));
  }

  async resizeWindow(name: SessionId, cols: number, rows: number): Promise<void> {
    await this.run('resize-window', '-t', paneTarget(name), '-x', String(cols), '-y', String(rows));
    await this.run('refresh-client', '-t', paneTarget(name));
  }

  async sendLiteral(name: SessionId, text: string): Promise<boolean> {
    const result = await this.run('send-keys', '-t', paneTarget(name), '-l', text);
    return result.ok;
  }

  async sendKeys(name: SessionId, ...keys: string[]): Promise<boolean> {
    const result = await this.run('send-keys', '-t', paneTarget(name), ...keys);
    return result.ok;
  }

  async copyMode(name: SessionId): Promise<boolean> {
    const result = await this.run('copy-mode', '-t', paneTarget(name));
    return result.ok;
  }

  async repeatKey(name: SessionId, key: string, count: number): Promise<boolean> {
    const result = await this.run('send-keys', '-t', paneTarget(name), '-N', String(count), key);
    return result.ok;
  }

  async setEnvironment(name: SessionId, variable: string, value: string): Promise<boolean> {
    const result = await this.run('set-environment', '-t', sessionTarget(name), variable, value);
    return result.ok;
  }

  async unsetEnvironment(name: SessionId, variable: string): Promise<boolean> {
    const result = await this.run('set-environment', '-t', sessionTarget(name), '-u', variable);
    return result.ok;
  }

  async panePid(name: SessionId): Promise<number | null> {
    const result = await this.run('display-message', '-t', paneTarget(name), '-p', '#{pane_pid}');
    return result.ok ? toInt(result.stdout.trim()) : null;
  }

  async capturePane(name: SessionId, start: number, end?: number): Promise<string> {
    const args = ['capture-pane', '-t', paneTarget(name), '-p', '-e', '-J', '-S', String(start)];
    if (end !== undefined) {
      args.push('-E', String(end));
    }
    const result = await this.run(...args);
    return result.ok ? result.stdout : '';
  }

  async historySize(name: SessionId): Promise<number> {
    const result = await this.run('display-message', '-t', paneTarget(name), '-p', '#{history_size}');
    return result.ok ? toInt(result.stdout.trim()) ?? 0 : 0;
  }

  attachCommand(name: SessionId): { file: string; args: string[] } {
    return { file: this.binary, args: ['-L', this.socket, 'attach-session', '-t', sessionTarget(name)] };
  }
}
