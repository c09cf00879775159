import type { ClientMessage, ServerMessage } from '../types/Protocol.js';
import type { SessionId } from '../types/Session.js';
import type { TmuxConfig } from '../config/index.js';
import type { TerminalBridgeManager } from '../services/TerminalBridge.js';
import type { SessionManager } from '../services/SessionManager.js';
import { toSupportedSignal, type SignalRouter } from '../services/SignalRouter.js';
import { SCROLL_COMMANDS, type ScrollCommand } from '../types/Terminal.js';
import { AppError, invalidRequest, notFound, toAppError } from '../utils/errors.js';
import { toSessionId } from '../utils/identity.js';

/** Where the handler sends events for one client; the WebSocket in production */
export interface ClientChannel {
  send(message: ServerMessage): void;
}

type HandlerConfig = Pick<TmuxConfig, 'sessionPrefix' | 'defaultCols' | 'defaultRows'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(message: Record<string, unknown>, key: string): string {
  const value = message[key];
  if (typeof value !== 'string') {
    throw invalidRequest(`"${key}" must be a string`);
  }
  return value;
}

function optionalString(message: Record<string, unknown>, key: string): string | undefined {
  const value = message[key];
  return value === undefined || value === null ? undefined : requireString(message, key);
}

function optionalInt(message: Record<string, unknown>, key: string): number | undefined {
  const value = message[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw invalidRequest(`"${key}" must be an integer`);
  }
  return value;
}

function requireDimension(message: Record<string, unknown>, key: string): number {
  const value = optionalInt(message, key);
  if (value === undefined || value < 1) {
    throw invalidRequest(`"${key}" must be a positive integer`);
  }
  return value;
}

function isScrollCommand(value: unknown): value is ScrollCommand {
  return SCROLL_COMMANDS.some((command) => command === value);
}

/** Validates a decoded client frame */
export function parseClientMessage(raw: unknown): ClientMessage {
  if (!isRecord(raw)) {
    throw invalidRequest('Message must be a JSON object');
  }

  switch (raw.type) {
    case 'subscribe':
      return {
        type: 'subscribe',
        session: requireString(raw, 'session'),
        cols: optionalInt(raw, 'cols') === undefined ? undefined : requireDimension(raw, 'cols'),
        rows: optionalInt(raw, 'rows') === undefined ? undefined : requireDimension(raw, 'rows'),
      };
    case 'unsubscribe':
      return { type: 'unsubscribe', session: requireString(raw, 'session') };
    case 'input':
      return { type: 'input', session: requireString(raw, 'session'), keys: requireString(raw, 'keys') };
    case 'resize':
      return {
        type: 'resize',
        session: requireString(raw, 'session'),
        cols: requireDimension(raw, 'cols'),
        rows: requireDimension(raw, 'rows'),
      };
    case 'signal':
      return { type: 'signal', session: requireString(raw, 'session'), signal: optionalString(raw, 'signal') };
    case 'scrollback':
      return {
        type: 'scrollback',
        session: requireString(raw, 'session'),
        start: optionalInt(raw, 'start'),
        end: optionalInt(raw, 'end'),
      };
    case 'scroll': {
      const command = raw.command;
      if (!isScrollCommand(command)) {
        throw invalidRequest(`"command" must be one of ${SCROLL_COMMANDS.join(', ')}`);
      }
      return {
        type: 'scroll',
        session: requireString(raw, 'session'),
        command,
        lines: optionalInt(raw, 'lines') === undefined ? undefined : requireDimension(raw, 'lines'),
      };
    }
    default:
      throw invalidRequest('Unknown message type');
  }
}

export class MessageHandler {
  private clients: Map<string, ClientChannel> = new Map();

  constructor(
    private readonly bridge: TerminalBridgeManager,
    private readonly sessions: Pick<SessionManager, 'scrollback' | 'scroll'>,
    private readonly signals: Pick<SignalRouter, 'deliver'>,
    private readonly config: HandlerConfig
  ) {
    // Set up terminal bridge output handler
    this.bridge.setOutputHandler((sessionId, data) => {
      this.broadcastToSubscribers(sessionId, { type: 'output', session: sessionId, data });
    });

    this.bridge.setClosedHandler((sessionId, subscriberIds) => {
      for (const clientId of subscriberIds) {
        this.sendTo(clientId, {
          type: 'error',
          message: `Terminal for ${sessionId} closed`,
          code: 'STREAM_FAULT',
        });
      }
    });
  }

  handleConnection(clientId: string, channel: ClientChannel): void {
    this.clients.set(clientId, channel);
    this.sendTo(clientId, { type: 'connected', clientId });
  }

  handleDisconnection(clientId: string): void {
    this.bridge.releaseSubscriber(clientId);
    this.clients.delete(clientId);
  }

  async handleMessage(clientId: string, raw: unknown): Promise<void> {
    try {
      const message = parseClientMessage(raw);
      const sessionId = toSessionId(message.session, this.config.sessionPrefix);

      switch (message.type) {
        case 'subscribe':
          await this.handleSubscribe(clientId, sessionId, message.cols, message.rows);
          break;

        case 'unsubscribe':
          this.bridge.release(sessionId, clientId);
          this.sendTo(clientId, { type: 'unsubscribed', session: sessionId });
          break;

        case 'input':
          if (!(await this.bridge.write(sessionId, message.keys))) {
            throw new AppError('StreamFault', `Failed to send input to ${sessionId}`);
          }
          break;

        case 'resize':
          await this.bridge.resize(sessionId, message.cols, message.rows);
          break;

        case 'signal': {
          const signal = toSupportedSignal(message.signal);
          if (!(await this.signals.deliver(sessionId, signal))) {
            throw new AppError('StreamFault', `Failed to send ${signal} to ${sessionId}`);
          }
          break;
        }

        case 'scrollback': {
          const scrollback = await this.sessions.scrollback(sessionId, message.start, message.end);
          this.sendTo(clientId, { type: 'scrollback', ...scrollback });
          break;
        }

        case 'scroll':
          await this.sessions.scroll(sessionId, message.command, message.lines);
          break;
      }
    } catch (err) {
      const appError = toAppError(err);
      this.sendTo(clientId, { type: 'error', message: appError.message, code: appError.code });
    }
  }

  private async handleSubscribe(
    clientId: string,
    sessionId: SessionId,
    cols: number = this.config.defaultCols,
    rows: number = this.config.defaultRows
  ): Promise<void> {
    const connection = await this.bridge.acquire(sessionId, clientId, cols, rows);
    if (!connection) {
      throw notFound(`Session ${sessionId} not found`);
    }
    if (!this.clients.has(clientId)) {
      // Disconnected while the PTY was attaching
      this.bridge.release(sessionId, clientId);
      return;
    }
    this.sendTo(clientId, { type: 'subscribed', session: sessionId });
  }

  private sendTo(clientId: string, message: ServerMessage): void {
    const channel = this.clients.get(clientId);
    if (!channel) return;
    try {
      channel.send(message);
    } catch (err) {
      console.error(`[MessageHandler] Failed to send to ${clientId}:`, toAppError(err).message);
    }
  }

  private broadcastToSubscribers(sessionId: SessionId, message: ServerMessage): void {
    for (const clientId of this.bridge.subscribersOf(sessionId)) {
      this.sendTo(clientId, message);
    }
  }

  clientCount(): number {
    return this.clients.size;
  }
}
