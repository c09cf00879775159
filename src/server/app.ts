import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createServer } from 'http';
import { WebSocketServerManager } from './WebSocketServer.js';
import type { AppServices } from './services.js';
import { sessionRoutes } from '../api/sessions.js';
import { displayRoutes } from '../api/displays.js';
import { commandRoutes } from '../api/commands.js';
import { authRoutes } from '../api/auth.js';
import { configRoutes } from '../api/config.js';
import { authorizeUpgrade, createAuthMiddleware } from '../middleware/auth.js';
import { AppError, errorMessage } from '../utils/errors.js';

export interface CreateAppOptions {
  logger?: boolean;
}

export async function createApp(services: AppServices, options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const { config } = services;

  // CORS configuration
  await app.register(cors, {
    origin: config.server.corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });

  // Auth middleware (skips if auth disabled)
  app.decorateRequest('user', null);
  app.addHook('preHandler', createAuthMiddleware(services.auth));

  // Root endpoint
  app.get('/', async () => ({
    name: 'termpanel',
    version: '1.0.0',
    endpoints: {
      health: '/health',
      sessions: '/api/sessions',
      displays: '/api/displays',
      commands: '/api/commands',
      websocket: config.websocket.path,
    },
  }));

  // Health check endpoint
  app.get('/health', async () => ({ status: 'ok' }));

  // Register routes
  await authRoutes(app, services);
  await configRoutes(app, services);
  await sessionRoutes(app, services);
  await displayRoutes(app, services);
  await commandRoutes(app, services);

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error(error);
      }
      reply.status(error.statusCode).send(error.toJSON());
      return;
    }

    if (error.validation) {
      const invalid = new AppError('InvalidRequest', error.message);
      reply.status(invalid.statusCode).send(invalid.toJSON());
      return;
    }

    app.log.error(error);
    reply.status(error.statusCode || 500).send({
      error: error.message || 'Internal Server Error',
      code: error.code || 'INTERNAL_ERROR',
      kind: 'Internal',
    });
  });

  return app;
}

export interface RunningServer {
  close(): Promise<void>;
}

export async function startServer(services: AppServices): Promise<RunningServer> {
  const { config } = services;
  const app = await createApp(services);

  await app.ready();
  const httpServer = createServer((req, res) => {
    app.routing(req, res);
  });

  // Initialize WebSocket server
  const webSocketServer = new WebSocketServerManager(services.messages);
  webSocketServer.initialize(httpServer, {
    ...config.websocket,
    authorize: (request) => authorizeUpgrade(services.auth, request),
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.server.port, config.server.host, () => {
      httpServer.off('error', reject);
      console.log(`Server running on http://${config.server.host}:${config.server.port}`);
      console.log(`WebSocket server running on ws://${config.server.host}:${config.server.port}${config.websocket.path}`);
      resolve();
    });
  });

  let closing: Promise<void> | null = null;
  const shutdown = async (): Promise<void> => {
    services.bridge.destroyAll();
    await services.displays.releaseAll();
    await webSocketServer.close();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await app.close();
  };

  return {
    close: () => {
      if (!closing) {
        closing = shutdown().catch((err: unknown) => {
          console.error('[Server] Shutdown failed:', errorMessage(err));
        });
      }
      return closing;
    },
  };
}
