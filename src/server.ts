import type { Server } from 'http';
import mongoose from 'mongoose';
import createApp from './app';
import { config } from './config';
import { scoringConfig } from './config/scoring';
import { logger } from './lib/logger';

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err?: Error) => (err ? reject(err) : resolve()));
  });
}

export async function startServer(port = config.port): Promise<Server> {
  logger.info({ weights: scoringConfig.weights }, 'scoring configuration loaded');

  await mongoose.connect(config.mongoUri);
  const app = createApp();
  return new Promise<Server>((resolve) => {
    const server = app.listen(port, () => {
      logger.info({ port, dbName: mongoose.connection.name, githubAuth: Boolean(config.githubToken) }, 'api listening');
      resolve(server);
    });
  });
}

async function main() {
  const server = await startServer();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'shutting down');
    try {
      await closeServer(server);
      await mongoose.disconnect();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'unhandledRejection');
  });
}

if (require.main === module) {
  main().catch((err) => {
    logger.error({ err }, 'failed to start');
    process.exit(1);
  });
}
