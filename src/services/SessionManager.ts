import { randomBytes } from 'crypto';
import { stat } from 'fs/promises';
import type { TmuxConfig } from '../config/index.js';
import type { CreateSessionRequest, Scrollback, SessionId, SessionInfo } from '../types/Session.js';
import type { DisplayEnvironment } from '../types/Display.js';
import type { ScrollCommand } from '../types/Terminal.js';
import type { Multiplexer, TmuxSessionRow } from '../utils/tmux.js';
import { AppError, notFound } from '../utils/errors.js';
import { isValidSessionName, toSessionId } from '../utils/identity.js';
import { delay } from '../utils/async.js';
import type { TerminalBridgeManager } from './TerminalBridge.js';
import { exportCommand, type DisplayManager } from './DisplayManager.js';

// Sessions start small; the first attach resizes them to the viewer
const INITIAL_COLS = 80;
const INITIAL_ROWS = 24;

export const DEFAULT_SCROLLBACK_START = -1000;

const BOUND_VARIABLES: ReadonlyArray<keyof DisplayEnvironment> = [
  'DISPLAY',
  'GDK_BACKEND',
  'QT_QPA_PLATFORM',
  'LIBGL_ALWAYS_SOFTWARE',
];

/**
 * First program of a session in login mode: asks for a username and hands
 * over to `su -l`, looping until a login succeeds.
 */
export const LOGIN_PROMPT_COMMAND = [
  "bash -c '",
  'while true; do',
  '  echo ""',
  '  echo "  Terminal login required"',
  '  echo ""',
  '  read -p "Username: " username',
  '  if [ -n "$username" ]; then',
  '    su -l "$username" && break',
  '    echo ""',
  '    echo "Login failed. Please try again."',
  '    sleep 1',
  '  fi',
  'done',
  "'",
].join('\n');

// Copy-mode keys for each scroll command; up/down repeat by line count
const SCROLL_KEYS: Record<Exclude<ScrollCommand, 'enter'>, string> = {
  exit: 'q',
  up: 'C-y',
  down: 'C-e',
  page_up: 'C-b',
  page_down: 'C-f',
  top: 'g',
  bottom: 'G',
};

type SessionBridge = Pick<TerminalBridgeManager, 'teardown' | 'write' | 'info'>;
type DisplayLookup = Pick<DisplayManager, 'bindingEnvironment'>;

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export class SessionManager {
  constructor(
    private readonly tmux: Multiplexer,
    private readonly bridge: SessionBridge,
    private readonly displays: DisplayLookup,
    private readonly config: TmuxConfig
  ) {}

  private canonical(name: string): SessionId {
    return toSessionId(name, this.config.sessionPrefix);
  }

  async create(request: CreateSessionRequest = {}): Promise<SessionInfo> {
    const id = this.canonical(request.name ?? `session-${randomBytes(4).toString('hex')}`);

    if (await this.tmux.hasSession(id)) {
      throw new AppError('Conflict', `Session ${id} already exists`);
    }

    const cwd = request.cwd && (await isDirectory(request.cwd)) ? request.cwd : undefined;
    const result = await this.tmux.newSession(id, {
      cwd,
      cols: INITIAL_COLS,
      rows: INITIAL_ROWS,
      shell: this.config.loginShell ? LOGIN_PROMPT_COMMAND : this.config.defaultShell,
    });
    if (!result.ok) {
      throw new AppError('ProcessStartFailure', `Failed to create session ${id}: ${result.stderr.trim()}`, {
        stage: 'tmux',
        stderr: result.stderr.trim() || undefined,
      });
    }

    await this.tmux.setOption(id, 'mouse', 'off');
    await this.tmux.setOption(id, 'history-limit', String(this.config.scrollbackLimit));
    await this.tmux.setOption(id, 'aggressive-resize', 'on', true);
    await this.tmux.setOption(id, 'default-terminal', 'xterm-256color');

    if (request.command && this.config.loginShell) {
      // Nobody is logged in yet to run it
      console.log(`[SessionManager] Skipping initial command for ${id}: login required`);
    } else if (request.command) {
      await delay(this.config.commandDelayMs);
      await this.tmux.sendLiteral(id, request.command);
      await this.tmux.sendKeys(id, 'Enter');
    }

    console.log(`[SessionManager] Created session ${id}${cwd ? ` in ${cwd}` : ''}`);
    return this.get(id);
  }

  async list(): Promise<SessionInfo[]> {
    const rows = await this.tmux.listSessions();
    return rows
      .filter((row) => row.name.startsWith(this.config.sessionPrefix) && isValidSessionName(row.name))
      .map((row) => this.toInfo(row));
  }

  async get(id: SessionId): Promise<SessionInfo> {
    const row = (await this.tmux.listSessions()).find((r) => r.name === id);
    if (!row) {
      throw notFound(`Session ${id} not found`);
    }
    return this.toInfo(row);
  }

  exists(id: SessionId): Promise<boolean> {
    return this.tmux.hasSession(id);
  }

  private async requireSession(id: SessionId): Promise<void> {
    if (!(await this.tmux.hasSession(id))) {
      throw notFound(`Session ${id} not found`);
    }
  }

  async destroy(id: SessionId): Promise<void> {
    await this.requireSession(id);

    this.bridge.teardown(id);
    const result = await this.tmux.killSession(id);
    if (!result.ok) {
      // Gone between the check and the kill
      throw notFound(`Session ${id} not found`);
    }
    console.log(`[SessionManager] Destroyed session ${id}`);
  }

  async runCommand(id: SessionId, command: string): Promise<void> {
    await this.requireSession(id);

    if (!(await this.bridge.write(id, `${command}\n`))) {
      throw new AppError('StreamFault', `Failed to send command to ${id}`);
    }
  }

  async scrollback(id: SessionId, start: number = DEFAULT_SCROLLBACK_START, end?: number): Promise<Scrollback> {
    await this.requireSession(id);

    const [content, historySize] = await Promise.all([
      this.tmux.capturePane(id, start, end),
      this.tmux.historySize(id),
    ]);
    return { session: id, content, historySize, start };
  }

  /** Drives tmux copy mode, the way a scroll wheel would */
  async scroll(id: SessionId, command: ScrollCommand, lines = 1): Promise<void> {
    await this.requireSession(id);

    let sent: boolean;
    if (command === 'enter') {
      sent = await this.tmux.copyMode(id);
    } else if (command === 'up' || command === 'down') {
      sent = await this.tmux.repeatKey(id, SCROLL_KEYS[command], lines);
    } else {
      sent = await this.tmux.sendKeys(id, SCROLL_KEYS[command]);
    }
    if (!sent) {
      throw new AppError('StreamFault', `Failed to scroll ${id}`);
    }
  }

  /**
   * Points a session's GUI programs at a running display: tmux's session
   * environment for new panes, plus an export typed into the current shell.
   */
  async bindDisplay(id: SessionId, displayNumber: number): Promise<string> {
    await this.requireSession(id);

    const binding = this.displays.bindingEnvironment(displayNumber);
    if (!binding) {
      throw notFound(`Display :${displayNumber} is not running`);
    }

    for (const variable of BOUND_VARIABLES) {
      await this.tmux.setEnvironment(id, variable, binding.set[variable]);
    }
    for (const variable of binding.unset) {
      await this.tmux.unsetEnvironment(id, variable);
    }

    const command = exportCommand(binding);
    if (!(await this.bridge.write(id, `${command}\n`))) {
      throw new AppError('StreamFault', `Failed to send display binding to ${id}`);
    }
    console.log(`[SessionManager] Bound ${id} to display :${displayNumber}`);
    return command;
  }

  async unbindDisplay(id: SessionId): Promise<string> {
    await this.requireSession(id);

    for (const variable of BOUND_VARIABLES) {
      await this.tmux.unsetEnvironment(id, variable);
    }

    const command = `unset ${BOUND_VARIABLES.join(' ')}`;
    if (!(await this.bridge.write(id, `${command}\n`))) {
      throw new AppError('StreamFault', `Failed to send display unbinding to ${id}`);
    }
    return command;
  }

  private toInfo(row: TmuxSessionRow): SessionInfo {
    const id = this.canonical(row.name);
    const connection = this.bridge.info(id);
    return {
      id,
      cwd: row.currentPath,
      command: row.currentCommand,
      pid: row.panePid,
      dimensions: { cols: row.width, rows: row.height },
      createdAt: new Date(row.createdAt * 1000).toISOString(),
      attached: connection !== null && !connection.readerStopped,
      subscribers: connection?.subscriberCount ?? 0,
    };
  }
}
