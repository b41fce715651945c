import { createApp } from './app';
import { config } from './config/env';
import logger from './config/logger';
import { createContainer, disposeContainer } from './container';

const container = createContainer(config);
const app = createApp(container);

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', reason);
  // Don't exit - let the server continue running
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

container.dispatchQueue.start();

const server = app.listen(config.port, () => {
  logger.info(`${config.barName} order bot starting...`);
  logger.info(`Server running on port ${config.port}`);
});

server.on('error', (error: Error) => {
  logger.error('Server error:', error);
});

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, shutting down`);

  server.close(() => {
    disposeContainer(container)
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
