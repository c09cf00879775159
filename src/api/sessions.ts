import type { FastifyInstance } from 'fastify';
import type { CreateSessionRequest, SessionId } from '../types/Session.js';
import type { AppServices } from '../server/services.js';
import { toSessionId } from '../utils/identity.js';

interface SessionParams {
  name: string;
}

const sessionParams = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
  },
} as const;

export async function sessionRoutes(app: FastifyInstance, services: Pick<AppServices, 'sessions' | 'config'>) {
  const { sessions } = services;
  const toId = (name: string): SessionId => toSessionId(name, services.config.tmux.sessionPrefix);

  // List sessions on our tmux socket
  app.get('/api/sessions', async () => {
    const list = await sessions.list();
    return { sessions: list, count: list.length };
  });

  // Create new session
  app.post<{ Body: CreateSessionRequest }>('/api/sessions', {
    schema: {
      body: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9_.-]+$' },
          cwd: { type: 'string', minLength: 1 },
          command: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const session = await sessions.create(request.body);
    reply.status(201);
    return { session };
  });

  // Get single session
  app.get<{ Params: SessionParams }>('/api/sessions/:name', { schema: { params: sessionParams } }, async (request) => {
    const session = await sessions.get(toId(request.params.name));
    return { session };
  });

  // Kill session
  app.delete<{ Params: SessionParams }>('/api/sessions/:name', { schema: { params: sessionParams } }, async (request) => {
    await sessions.destroy(toId(request.params.name));
    return { status: 'ok' };
  });

  // Type a command into the session, followed by Enter
  app.post<{ Params: SessionParams; Body: { command: string } }>('/api/sessions/:name/command', {
    schema: {
      params: sessionParams,
      body: {
        type: 'object',
        required: ['command'],
        properties: {
          command: { type: 'string', minLength: 1 },
        },
      },
    },
  }, async (request) => {
    await sessions.runCommand(toId(request.params.name), request.body.command);
    return { status: 'ok' };
  });

  // Route the session's GUI programs to a display
  app.post<{ Params: SessionParams; Body: { displayNumber: number } }>('/api/sessions/:name/display', {
    schema: {
      params: sessionParams,
      body: {
        type: 'object',
        required: ['displayNumber'],
        properties: {
          displayNumber: { type: 'integer', minimum: 0 },
        },
      },
    },
  }, async (request) => {
    const exportCommand = await sessions.bindDisplay(toId(request.params.name), request.body.displayNumber);
    return { status: 'ok', exportCommand };
  });

  app.delete<{ Params: SessionParams }>('/api/sessions/:name/display', { schema: { params: sessionParams } }, async (request) => {
    const command = await sessions.unbindDisplay(toId(request.params.name));
    return { status: 'ok', command };
  });
}
