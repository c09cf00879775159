import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../server/services.js';

/** Settings the browser needs; never secrets */
export async function configRoutes(app: FastifyInstance, services: Pick<AppServices, 'config' | 'auth'>) {
  const { config, auth } = services;

  app.get('/api/config', async () => ({
    sessionPrefix: config.tmux.sessionPrefix,
    websocketPath: config.websocket.path,
    terminal: {
      cols: config.tmux.defaultCols,
      rows: config.tmux.defaultRows,
    },
    displays: {
      base: config.displays.base,
      count: config.displays.count,
      vncPortBase: config.displays.vncPortBase,
      wsPortBase: config.displays.wsPortBase,
      defaultWidth: config.displays.defaultWidth,
      defaultHeight: config.displays.defaultHeight,
    },
    auth: {
      enabled: auth.isEnabled(),
    },
  }));
}
