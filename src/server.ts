// Main entry point: loads configuration, opens the database and starts the HTTP server

import 'dotenv/config';
import http from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createContext } from './context.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('server');

function main(): void {
  // Throws ConfigError on a missing or weak secret: the server must not start without one
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info(`Starting ${config.appName}...`, { env: config.nodeEnv });

  const ctx = createContext(config);
  const app = createApp(ctx);
  const server = http.createServer(app);

  server.listen(config.port, () => {
    log.info(`Server running at http://localhost:${config.port}`);
    log.info(`Token lifetime: ${config.accessTokenTtlMinutes} minutes (${config.algorithm})`);
  });

  // Graceful shutdown
  const shutdown = (): void => {
    log.info('Shutting down...');
    server.close(() => {
      ctx.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  log.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
