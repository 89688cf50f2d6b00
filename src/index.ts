// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadConfig } from './config/config.js';
import { createServer } from './server.js';
import { errorForLog } from './utils/logger.js';
import { SERVICE_NAME, SERVICE_VERSION } from './version.js';

const config = loadConfig();
const { app } = createServer(config);

async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');
  await app.close();
  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info(
      { host: config.host, port: config.port, service: SERVICE_NAME, version: SERVICE_VERSION },
      'server_started'
    );
  })
  .catch((error: unknown) => {
    app.log.error({ error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });
