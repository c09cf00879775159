import { WebSocket, WebSocketServer as WSServer } from 'ws';
import type { IncomingMessage, Server } from 'http';
import { randomUUID } from 'crypto';
import type { MessageHandler } from './MessageHandler.js';
import type { WebSocketConfig } from '../config/index.js';
import type { ServerMessage } from '../types/Protocol.js';
import { errorMessage } from '../utils/errors.js';

interface ClientState {
  clientId: string;
  isAlive: boolean;
}

export interface WebSocketServerOptions extends WebSocketConfig {
  /** Decides whether an upgrade request may connect; all are accepted when omitted */
  authorize?: (request: IncomingMessage) => boolean;
}

export class WebSocketServerManager {
  private wss: WSServer | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private clients = new WeakMap<WebSocket, ClientState>();

  constructor(private readonly messageHandler: MessageHandler) {}

  initialize(server: Server, options: WebSocketServerOptions): void {
    const { authorize } = options;
    this.wss = new WSServer({
      server,
      path: options.path,
      verifyClient: authorize ? (info: { req: IncomingMessage }) => authorize(info.req) : undefined,
    });

    this.wss.on('connection', (ws: WebSocket) => {
      const state: ClientState = { clientId: randomUUID(), isAlive: true };
      this.clients.set(ws, state);

      console.log(`[WebSocket] Client connected: ${state.clientId}`);

      this.messageHandler.handleConnection(state.clientId, {
        send: (message: ServerMessage) => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.send(JSON.stringify(message));
          }
        },
      });

      ws.on('pong', () => {
        state.isAlive = true;
      });

      ws.on('message', (data) => {
        let message: unknown;
        try {
          message = JSON.parse(data.toString());
        } catch (err) {
          console.error('[WebSocket] Failed to parse message:', errorMessage(err));
          ws.send(JSON.stringify({ type: 'error', message: 'Invalid message format', code: 'INVALID_REQUEST' }));
          return;
        }
        this.messageHandler.handleMessage(state.clientId, message).catch((err: unknown) => {
          console.error(`[WebSocket] Unhandled error for ${state.clientId}:`, errorMessage(err));
        });
      });

      ws.on('close', () => {
        console.log(`[WebSocket] Client disconnected: ${state.clientId}`);
        this.messageHandler.handleDisconnection(state.clientId);
      });

      ws.on('error', (err) => {
        console.error(`[WebSocket] Error for ${state.clientId}:`, err.message);
      });
    });

    // Heartbeat to detect dead connections
    this.pingInterval = setInterval(() => {
      this.wss?.clients.forEach((ws) => {
        const state = this.clients.get(ws);
        if (!state) return;
        if (!state.isAlive) {
          ws.terminate();
          return;
        }
        state.isAlive = false;
        ws.ping();
      });
    }, options.heartbeatInterval);

    this.wss.on('close', () => {
      if (this.pingInterval) {
        clearInterval(this.pingInterval);
        this.pingInterval = null;
      }
    });
  }

  getConnectionCount(): number {
    return this.wss?.clients.size ?? 0;
  }

  close(): Promise<void> {
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    this.wss = null;

    for (const ws of wss.clients) {
      ws.terminate();
    }
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
