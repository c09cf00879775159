import * as pty from 'node-pty';
import type { BridgeConfig } from '../config/index.js';
import type { Dimensions, SessionId } from '../types/Session.js';
import type { PtyConnectionInfo } from '../types/Terminal.js';
import type { Multiplexer } from '../utils/tmux.js';
import { EscapeSequenceFilter } from '../utils/escapeFilter.js';
import { InFlight, KeyedLock, delay } from '../utils/async.js';
import { AppError, errorMessage } from '../utils/errors.js';

/** The parts of a node-pty process the bridge drives */
export type PtyProcess = Pick<pty.IPty, 'pid' | 'onData' | 'onExit' | 'write' | 'resize' | 'kill'>;

export interface PtyOptions {
  name: string;
  cols: number;
  rows: number;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type PtySpawnFn = (file: string, args: string[], options: PtyOptions) => PtyProcess;

const defaultPtySpawn: PtySpawnFn = (file, args, options) => pty.spawn(file, args, options);

interface PtyConnection {
  sessionId: SessionId;
  ptyProcess: PtyProcess;
  dimensions: Dimensions;
  subscriberIds: Set<string>;
  readerStopped: boolean;
  /** Cancels the reader; aborted exactly once, on teardown */
  reader: AbortController;
  filter: EscapeSequenceFilter | null;
  /** Bumped on every subscribe; a grace timer only fires for the version it was armed with */
  version: number;
  graceTimeout: NodeJS.Timeout | null;
  createdAt: Date;
  lastActivityAt: Date;
}

type OutputCallback = (sessionId: SessionId, data: string) => void;
type ClosedCallback = (sessionId: SessionId, subscriberIds: string[]) => void;

/**
 * One PTY per tmux session, shared by every subscribed client.
 *
 * The PTY runs an interactive `tmux attach` client, so output arrives
 * already rendered by tmux. When the last subscriber leaves the PTY lingers
 * for `graceMs` so a page reload does not cost a re-attach.
 */
export class TerminalBridgeManager {
  private connections = new Map<SessionId, PtyConnection>();
  private creating = new InFlight<PtyConnection | null>();
  private writeLock = new KeyedLock();
  private onOutput: OutputCallback | null = null;
  private onClosed: ClosedCallback | null = null;

  constructor(
    private readonly tmux: Multiplexer,
    private readonly config: BridgeConfig,
    private readonly spawnPty: PtySpawnFn = defaultPtySpawn
  ) {}

  setOutputHandler(handler: OutputCallback): void {
    this.onOutput = handler;
  }

  /** Called when a PTY's reader stops on its own (tmux client exited) */
  setClosedHandler(handler: ClosedCallback): void {
    this.onClosed = handler;
  }

  async acquire(sessionId: SessionId, subscriberId: string, cols: number, rows: number): Promise<PtyConnectionInfo | null> {
    const existing = this.connections.get(sessionId);
    if (existing && !existing.readerStopped) {
      this.addSubscriber(existing, subscriberId);
      return this.toInfo(existing);
    }
    if (existing) {
      console.log(`[TerminalBridge] ${sessionId}: reader stopped, re-attaching`);
      this.teardown(sessionId);
    }

    const connection = await this.creating.run(sessionId, () => this.create(sessionId, cols, rows));
    if (!connection) return null;

    this.addSubscriber(connection, subscriberId);
    return this.toInfo(connection);
  }

  private async create(sessionId: SessionId, cols: number, rows: number): Promise<PtyConnection | null> {
    if (!(await this.tmux.hasSession(sessionId))) {
      return null;
    }

    // Size the window first so the attach client does not redraw at 80x24
    await this.tmux.resizeWindow(sessionId, cols, rows);
    await delay(this.config.preAttachDelayMs);

    const { file, args } = this.tmux.attachCommand(sessionId);
    let ptyProcess: PtyProcess;
    try {
      ptyProcess = this.spawnPty(file, args, {
        name: 'xterm-256color',
        cols,
        rows,
        cwd: process.env.HOME || '/',
        env: { ...process.env, TERM: 'xterm-256color' },
      });
    } catch (err) {
      throw new AppError('StreamFault', `Failed to attach to ${sessionId}: ${errorMessage(err)}`);
    }

    const now = new Date();
    const connection: PtyConnection = {
      sessionId,
      ptyProcess,
      dimensions: { cols, rows },
      subscriberIds: new Set(),
      readerStopped: false,
      reader: new AbortController(),
      filter: this.config.filterQuerySequences ? new EscapeSequenceFilter() : null,
      version: 0,
      graceTimeout: null,
      createdAt: now,
      lastActivityAt: now,
    };
    this.connections.set(sessionId, connection);
    this.startReader(connection);

    await delay(this.config.attachSettleMs);
    if (this.connections.get(sessionId) !== connection) {
      // Torn down (session destroyed) while attaching
      return null;
    }
    await this.tmux.resizeWindow(sessionId, cols, rows);

    console.log(`[TerminalBridge] ${sessionId}: attached (pid ${ptyProcess.pid}, ${cols}x${rows})`);
    return connection;
  }

  private startReader(connection: PtyConnection): void {
    const { signal } = connection.reader;

    const dataSubscription = connection.ptyProcess.onData((data) => {
      if (signal.aborted) return;
      connection.lastActivityAt = new Date();
      const output = connection.filter ? connection.filter.filter(data) : data;
      if (output) {
        this.onOutput?.(connection.sessionId, output);
      }
    });

    const exitSubscription = connection.ptyProcess.onExit(({ exitCode }) => {
      if (signal.aborted) return;
      connection.readerStopped = true;
      const held = connection.filter?.flush();
      if (held) {
        this.onOutput?.(connection.sessionId, held);
      }
      console.log(`[TerminalBridge] ${connection.sessionId}: reader stopped (exit ${exitCode})`);
      this.onClosed?.(connection.sessionId, [...connection.subscriberIds]);
    });

    signal.addEventListener(
      'abort',
      () => {
        dataSubscription.dispose();
        exitSubscription.dispose();
      },
      { once: true }
    );
  }

  private addSubscriber(connection: PtyConnection, subscriberId: string): void {
    connection.version++;
    if (connection.graceTimeout) {
      clearTimeout(connection.graceTimeout);
      connection.graceTimeout = null;
    }
    connection.subscriberIds.add(subscriberId);
  }

  release(sessionId: SessionId, subscriberId: string): void {
    const connection = this.connections.get(sessionId);
    if (!connection) return;

    connection.subscriberIds.delete(subscriberId);
    if (connection.subscriberIds.size > 0) return;

    if (connection.graceTimeout) {
      clearTimeout(connection.graceTimeout);
    }
    const version = connection.version;
    connection.graceTimeout = setTimeout(() => {
      connection.graceTimeout = null;
      if (
        connection.version === version &&
        connection.subscriberIds.size === 0 &&
        this.connections.get(sessionId) === connection
      ) {
        console.log(`[TerminalBridge] ${sessionId}: no subscribers for ${this.config.graceMs}ms, detaching`);
        this.teardown(sessionId);
      }
    }, this.config.graceMs);
  }

  /** Drops a client from every session it watches; returns those sessions */
  releaseSubscriber(subscriberId: string): SessionId[] {
    const released: SessionId[] = [];
    for (const connection of [...this.connections.values()]) {
      if (connection.subscriberIds.has(subscriberId)) {
        this.release(connection.sessionId, subscriberId);
        released.push(connection.sessionId);
      }
    }
    return released;
  }

  subscribersOf(sessionId: SessionId): string[] {
    return [...(this.connections.get(sessionId)?.subscriberIds ?? [])];
  }

  /**
   * Sends keystrokes to a session. Goes through the PTY when one is live,
   * otherwise straight to tmux so input works without a viewer.
   */
  write(sessionId: SessionId, data: string): Promise<boolean> {
    return this.writeLock.run(sessionId, async () => {
      const connection = this.connections.get(sessionId);
      if (connection && !connection.readerStopped) {
        try {
          connection.ptyProcess.write(data);
          connection.lastActivityAt = new Date();
          return true;
        } catch (err) {
          console.error(`[TerminalBridge] ${sessionId}: PTY write failed, using send-keys:`, errorMessage(err));
        }
      }
      return this.tmux.sendLiteral(sessionId, data);
    });
  }

  async resize(sessionId: SessionId, cols: number, rows: number): Promise<void> {
    const connection = this.connections.get(sessionId);
    if (connection) {
      connection.dimensions = { cols, rows };
      if (!connection.readerStopped) {
        try {
          connection.ptyProcess.resize(cols, rows);
        } catch (err) {
          console.error(`[TerminalBridge] ${sessionId}: PTY resize failed:`, errorMessage(err));
        }
      }
    }
    await this.tmux.resizeWindow(sessionId, cols, rows);
  }

  /** Detaches immediately, without a grace period. The tmux session survives. */
  teardown(sessionId: SessionId): boolean {
    const connection = this.connections.get(sessionId);
    if (!connection) return false;

    if (connection.graceTimeout) {
      clearTimeout(connection.graceTimeout);
      connection.graceTimeout = null;
    }
    connection.reader.abort();
    this.connections.delete(sessionId);

    if (!connection.readerStopped) {
      try {
        connection.ptyProcess.kill();
      } catch (err) {
        console.error(`[TerminalBridge] ${sessionId}: failed to kill PTY:`, errorMessage(err));
      }
    }
    console.log(`[TerminalBridge] ${sessionId}: detached`);
    return true;
  }

  destroyAll(): void {
    for (const sessionId of [...this.connections.keys()]) {
      this.teardown(sessionId);
    }
  }

  info(sessionId: SessionId): PtyConnectionInfo | null {
    const connection = this.connections.get(sessionId);
    return connection ? this.toInfo(connection) : null;
  }

  infoAll(): PtyConnectionInfo[] {
    return [...this.connections.values()].map((c) => this.toInfo(c));
  }

  private toInfo(connection: PtyConnection): PtyConnectionInfo {
    return {
      sessionId: connection.sessionId,
      pid: connection.ptyProcess.pid,
      dimensions: { ...connection.dimensions },
      subscriberCount: connection.subscriberIds.size,
      readerStopped: connection.readerStopped,
      createdAt: connection.createdAt,
      lastActivityAt: connection.lastActivityAt,
    };
  }
}
