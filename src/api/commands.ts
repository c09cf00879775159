import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../server/services.js';
import { toSessionId } from '../utils/identity.js';

interface CommandParams {
  session: string;
}

const commandParams = {
  type: 'object',
  required: ['session'],
  properties: {
    session: { type: 'string', minLength: 1 },
  },
} as const;

export async function commandRoutes(app: FastifyInstance, services: Pick<AppServices, 'commands' | 'config'>) {
  const { commands } = services;
  const toId = (name: string) => toSessionId(name, services.config.tmux.sessionPrefix);

  app.get('/api/commands', async () => {
    return { commands: await commands.all() };
  });

  app.get<{ Params: CommandParams }>('/api/commands/:session', { schema: { params: commandParams } }, async (request) => {
    const session = toId(request.params.session);
    return { session, commands: await commands.get(session) };
  });

  app.post<{ Params: CommandParams; Body: { label: string; command: string } }>('/api/commands/:session', {
    schema: {
      params: commandParams,
      body: {
        type: 'object',
        required: ['label', 'command'],
        properties: {
          label: { type: 'string', minLength: 1 },
          command: { type: 'string', minLength: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const session = toId(request.params.session);
    const list = await commands.add(session, request.body.label, request.body.command);
    reply.status(201);
    return { session, commands: list };
  });

  app.delete<{ Params: CommandParams & { index: number } }>('/api/commands/:session/:index', {
    schema: {
      params: {
        type: 'object',
        required: ['session', 'index'],
        properties: {
          ...commandParams.properties,
          index: { type: 'integer', minimum: 0 },
        },
      },
    },
  }, async (request) => {
    const session = toId(request.params.session);
    const list = await commands.remove(session, request.params.index);
    return { session, commands: list };
  });

  app.delete<{ Params: CommandParams }>('/api/commands/:session', { schema: { params: commandParams } }, async (request) => {
    const session = toId(request.params.session);
    const cleared = await commands.clear(session);
    return { session, cleared };
  });
}
