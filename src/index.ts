import dotenv from 'dotenv';
import path from 'path';

// Load .env from the project root before anything reads process.env
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import type { Server as HttpServer } from 'http';
import { createApp } from './app/app';
import { createContainer } from './app/container';
import { env } from './config/env';
import { logger } from './utils/logger';

const SWEEP_INTERVAL_MS = 60_000;
const SHUTDOWN_GRACE_MS = 10_000;

const container = createContainer();
const app = createApp(container);

const server: HttpServer = app.listen(env.port, () => {
  logger.info(
    { port: env.port, textProvider: container.textProvider.name, imageProvider: container.imageProvider.name },
    'Story service running'
  );
});

container.orchestrator.startSweeping(SWEEP_INTERVAL_MS);

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down');
  container.orchestrator.stopSweeping();
  container.sessions.invalidateAll();
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'HTTP server did not close cleanly');
      process.exit(1);
    }
    process.exit(0);
  });
  setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS).unref();
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
