// server.ts
import type { Server } from 'node:http';
import { createApp } from './app';
import type { Config } from './config';
import type { ActivityStore } from './services/activity-store';
import { logger } from './utils/logger';

export interface RunningServer {
  server: Server;
  shutdown: (signal: NodeJS.Signals) => void;
}

/**
 * Builds the app and starts listening. Listen failures (such as EADDRINUSE) and
 * shutdown both end the process through `exit`; repeated signals are ignored.
 */
export function startServer(
  config: Config,
  store: ActivityStore,
  exit: (code: number) => void = code => process.exit(code)
): RunningServer {
  const app = createApp({ store, config });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Server is running on http://${config.host}:${config.port}`);
    logger.info(`Serving ${store.getAll().size} activities.`);
    logger.info(`Allowed CORS origins: ${config.allowedOrigins === '*' ? 'All (*)' : config.allowedOrigins}`);
  });

  server.on('error', err => {
    logger.error('Critical error during server startup. Server not started.', err);
    exit(1);
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      logger.warn(`Received ${signal} while already shutting down; ignoring.`);
      return;
    }
    shuttingDown = true;
    logger.info(`Server shutting down (${signal})...`);
    server.close(err => {
      if (err) {
        logger.error('Error while closing the HTTP server:', err);
        exit(1);
        return;
      }
      exit(0);
    });
  };

  return { server, shutdown };
}
