import type { SessionId } from '../../types/Session.js';
import type { Multiplexer, NewSessionOptions, TmuxResult, TmuxSessionRow } from '../../utils/tmux.js';
import type { PtyOptions, PtyProcess, PtySpawnFn } from '../../services/TerminalBridge.js';

export interface FakeTmuxSession {
  name: string;
  cwd: string | null;
  /** Program given to new-session, if any */
  shell: string | null;
  cols: number;
  rows: number;
  panePid: number;
  createdAt: number;
  options: Map<string, string>;
  environment: Map<string, string>;
  /** Text delivered with send-keys -l */
  literal: string[];
  /** Key batches delivered with plain send-keys */
  keys: string[][];
  history: string[];
  copyMode: boolean;
}

const ok: TmuxResult = { ok: true, stdout: '', stderr: '' };

/** In-memory tmux server. Records every mutating call in `calls`. */
export class FakeMultiplexer implements Multiplexer {
  readonly socket = 'test';
  readonly sessions = new Map<string, FakeTmuxSession>();
  readonly calls: string[] = [];
  failSendKeys = false;
  private nextPanePid = 7000;

  addSession(
    name: string,
    options: { cwd?: string; cols?: number; rows?: number; shell?: string } = {}
  ): FakeTmuxSession {
    const session: FakeTmuxSession = {
      name,
      cwd: options.cwd ?? null,
      shell: options.shell ?? null,
      cols: options.cols ?? 80,
      rows: options.rows ?? 24,
      panePid: this.nextPanePid++,
      createdAt: 1700000000,
      options: new Map(),
      environment: new Map(),
      literal: [],
      keys: [],
      history: [],
      copyMode: false,
    };
    this.sessions.set(name, session);
    return session;
  }

  async listSessions(): Promise<TmuxSessionRow[]> {
    return [...this.sessions.values()].map((s) => ({
      name: s.name,
      createdAt: s.createdAt,
      width: s.cols,
      height: s.rows,
      panePid: s.panePid,
      currentPath: s.cwd,
      currentCommand: 'bash',
    }));
  }

  async hasSession(name: SessionId): Promise<boolean> {
    return this.sessions.has(name);
  }

  async newSession(name: SessionId, options: NewSessionOptions): Promise<TmuxResult> {
    this.calls.push(`new-session ${name}${options.cwd ? ` -c ${options.cwd}` : ''}`);
    if (this.sessions.has(name)) {
      return { ok: false, stdout: '', stderr: `duplicate session: ${name}` };
    }
    this.addSession(name, options);
    return ok;
  }

  async setOption(name: SessionId, option: string, value: string): Promise<TmuxResult> {
    const session = this.sessions.get(name);
    if (!session) return { ok: false, stdout: '', stderr: `can't find session: ${name}` };
    session.options.set(option, value);
    return ok;
  }

  async killSession(name: SessionId): Promise<TmuxResult> {
    this.calls.push(`kill-session ${name}`);
    return this.sessions.delete(name) ? ok : { ok: false, stdout: '', stderr: `can't find session: ${name}` };
  }

  async resizeWindow(name: SessionId, cols: number, rows: number): Promise<void> {
    this.calls.push(`resize-window ${name} ${cols}x${rows}`);
    const session = this.sessions.get(name);
    if (session) {
      session.cols = cols;
      session.rows = rows;
    }
  }

  async sendLiteral(name: SessionId, text: string): Promise<boolean> {
    const session = this.sessions.get(name);
    if (!session || this.failSendKeys) return false;
    session.literal.push(text);
    return true;
  }

  async sendKeys(name: SessionId, ...keys: string[]): Promise<boolean> {
    const session = this.sessions.get(name);
    if (!session || this.failSendKeys) return false;
    session.keys.push(keys);
    return true;
  }

  async copyMode(name: SessionId): Promise<boolean> {
    const session = this.sessions.get(name);
    if (!session) return false;
    this.calls.push(`copy-mode ${name}`);
    session.copyMode = true;
    return true;
  }

  async repeatKey(name: SessionId, key: string, count: number): Promise<boolean> {
    const session = this.sessions.get(name);
    if (!session || this.failSendKeys) return false;
    session.keys.push(['-N', String(count), key]);
    return true;
  }

  async setEnvironment(name: SessionId, variable: string, value: string): Promise<boolean> {
    const session = this.sessions.get(name);
    if (!session) return false;
    session.environment.set(variable, value);
    return true;
  }

  async unsetEnvironment(name: SessionId, variable: string): Promise<boolean> {
    const session = this.sessions.get(name);
    if (!session) return false;
    session.environment.delete(variable);
    this.calls.push(`set-environment -u ${name} ${variable}`);
    return true;
  }

  async panePid(name: SessionId): Promise<number | null> {
    return this.sessions.get(name)?.panePid ?? null;
  }

  async capturePane(name: SessionId, start: number, end?: number): Promise<string> {
    const session = this.sessions.get(name);
    if (!session) return '';
    this.calls.push(`capture-pane ${name} ${start}${end === undefined ? '' : ` ${end}`}`);
    return session.history.join('\n');
  }

  async historySize(name: SessionId): Promise<number> {
    return this.sessions.get(name)?.history.length ?? 0;
  }

  attachCommand(name: SessionId): { file: string; args: string[] } {
    return { file: 'tmux', args: ['-L', this.socket, 'attach-session', '-t', `=${name}`] };
  }
}

type Listener<T> = (event: T) => void;

function listenerSet<T>(listeners: Set<Listener<T>>) {
  return (listener: Listener<T>) => {
    listeners.add(listener);
    return {
      dispose: () => {
        listeners.delete(listener);
      },
    };
  };
}

export class FakePty implements PtyProcess {
  readonly written: string[] = [];
  readonly resizes: Array<[number, number]> = [];
  killed = false;
  echo = false;
  failWrites = false;
  private dataListeners = new Set<Listener<string>>();
  private exitListeners = new Set<Listener<{ exitCode: number; signal?: number }>>();

  constructor(readonly pid: number, readonly file: string, readonly args: string[], readonly options: PtyOptions) {}

  onData = listenerSet(this.dataListeners);
  onExit = listenerSet(this.exitListeners);

  write(data: string): void {
    if (this.failWrites) throw new Error('EIO');
    this.written.push(data);
    if (this.echo) this.emitData(data);
  }

  resize(cols: number, rows: number): void {
    this.resizes.push([cols, rows]);
  }

  kill(): void {
    this.killed = true;
  }

  emitData(data: string): void {
    this.dataListeners.forEach((listener) => listener(data));
  }

  emitExit(exitCode = 0): void {
    this.exitListeners.forEach((listener) => listener({ exitCode }));
  }

  listenerCount(): number {
    return this.dataListeners.size + this.exitListeners.size;
  }
}

export class FakePtyFactory {
  readonly spawned: FakePty[] = [];
  echo = false;
  failSpawn = false;
  private nextPid = 9000;

  spawn: PtySpawnFn = (file, args, options) => {
    if (this.failSpawn) throw new Error('posix_spawnp failed.');
    const fake = new FakePty(this.nextPid++, file, args, options);
    fake.echo = this.echo;
    this.spawned.push(fake);
    return fake;
  };

  last(): FakePty | undefined {
    return this.spawned[this.spawned.length - 1];
  }
}
