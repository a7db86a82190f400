import { createApp } from './app';
import config from './config';
import { createPool, createPoolDatabase } from './db/client';
import { createLogger } from './utils/logger';

const logger = createLogger(config.logLevel);
const pool = createPool();

pool.on('error', (err) => {
  logger.error('Unexpected error on idle database client', { error: err.message });
});

const db = createPoolDatabase(pool);
const app = createApp({ db, logger, trustProxy: config.trustProxy });

const server = app.listen(config.port, () => {
  logger.info(`Server is running on port ${config.port}`);
  logger.info(`Environment: ${config.nodeEnv}`);
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    db.close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to close database pool', { error: String(error) });
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
