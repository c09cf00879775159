import type { FastifyInstance } from 'fastify';
import type { AllocateRequest } from '../types/Display.js';
import type { AppServices } from '../server/services.js';
import { exportCommand } from '../services/DisplayManager.js';
import { notFound } from '../utils/errors.js';

interface DisplayParams {
  number: number;
}

const displayParams = {
  type: 'object',
  required: ['number'],
  properties: {
    number: { type: 'integer', minimum: 0 },
  },
} as const;

const geometry = {
  width: { type: 'integer', minimum: 1 },
  height: { type: 'integer', minimum: 1 },
} as const;

export async function displayRoutes(app: FastifyInstance, services: Pick<AppServices, 'displays'>) {
  const { displays } = services;

  // Running displays; dead ones are released on the way
  app.get('/api/displays', async () => {
    const list = await displays.list();
    return { displays: list, count: list.length };
  });

  // The fixed panel -> display table
  app.get('/api/displays/panels', async () => {
    return { panels: displays.panels() };
  });

  app.post<{ Body: AllocateRequest }>('/api/displays', {
    schema: {
      body: {
        type: 'object',
        properties: {
          displayNumber: { type: 'integer', minimum: 0 },
          panelIndex: { type: 'integer', minimum: 0 },
          ...geometry,
        },
      },
    },
  }, async (request, reply) => {
    const { slot, created } = await displays.allocate(request.body);
    reply.status(created ? 201 : 200);
    return { display: slot, created };
  });

  app.get<{ Params: DisplayParams }>('/api/displays/:number', { schema: { params: displayParams } }, async (request) => {
    const display = await displays.probe(request.params.number);
    if (!display) {
      throw notFound(`Display :${request.params.number} not found`);
    }
    return { display };
  });

  app.put<{ Params: DisplayParams; Body: { width: number; height: number } }>('/api/displays/:number/size', {
    schema: {
      params: displayParams,
      body: {
        type: 'object',
        required: ['width', 'height'],
        properties: geometry,
      },
    },
  }, async (request) => {
    const display = await displays.resize(request.params.number, request.body.width, request.body.height);
    return { display };
  });

  app.delete<{ Params: DisplayParams }>('/api/displays/:number', { schema: { params: displayParams } }, async (request) => {
    await displays.release(request.params.number);
    return { status: 'ok' };
  });

  // What a shell must export to draw on this display
  app.get<{ Params: DisplayParams }>('/api/displays/:number/env', { schema: { params: displayParams } }, async (request) => {
    const binding = displays.bindingEnvironment(request.params.number);
    if (!binding) {
      throw notFound(`Display :${request.params.number} is not running`);
    }
    return { environment: binding, exportCommand: exportCommand(binding) };
  });

  // Start (or join) the display behind a panel
  app.post<{ Params: { index: number }; Body: { width?: number; height?: number } }>('/api/panels/:index/display', {
    schema: {
      params: {
        type: 'object',
        required: ['index'],
        properties: {
          index: { type: 'integer', minimum: 0 },
        },
      },
      body: {
        type: 'object',
        properties: geometry,
      },
    },
  }, async (request, reply) => {
    const { slot, created } = await displays.allocate({ panelIndex: request.params.index, ...request.body });
    reply.status(created ? 201 : 200);
    return { display: slot, created };
  });
}
