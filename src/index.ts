import { startServer } from './server/app.js';
import { createServices } from './server/services.js';
import { loadConfig } from './config/index.js';

const config = loadConfig();
console.log('Starting with config:', {
  port: config.server.port,
  auth: config.auth.enabled ? 'enabled' : 'disabled',
  tmuxSocket: config.tmux.socket,
  displays: `:${config.displays.base}-:${config.displays.base + config.displays.count - 1}`,
});

const services = createServices(config);

startServer(services)
  .then((server) => {
    const stop = (signal: NodeJS.Signals) => {
      console.log(`Received ${signal}, shutting down`);
      server.close().then(() => process.exit(0), () => process.exit(1));
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  })
  .catch((err) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
