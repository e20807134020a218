import { App, loadApp } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { logger } from './middleware/logging.js';
import { createErrorLogContext } from './utils/errorHandling.js';

function run(app: App): void {
  function shutdown(signal: string): void {
    logger.info(`Received ${signal} signal, shutting down gracefully`);
    app
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to shut down cleanly', createErrorLogContext(error));
        process.exit(1);
      });
  }

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected', createErrorLogContext(reason));

    app
      .stop()
      .then(() => {
        logger.error('Bot stopped after unhandled rejection');
        process.exit(1);
      })
      .catch((shutdownError: unknown) => {
        logger.error('Failed to gracefully shutdown after unhandled rejection', createErrorLogContext(shutdownError));
        process.exit(1);
      });
  });

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected', createErrorLogContext(error));

    app
      .stop()
      .then(() => {
        logger.error('Bot stopped after uncaught exception');
        process.exit(1);
      })
      .catch((shutdownError: unknown) => {
        logger.error('Failed to gracefully shutdown after uncaught exception', createErrorLogContext(shutdownError));
        process.exit(1);
      });
  });

  app.start().catch((error: unknown) => {
    logger.error('Failed to start application', createErrorLogContext(error));
    process.exit(1);
  });
}

const app = loadApp(() => ConfigManager.load().getConfig());
if (app) {
  run(app);
} else {
  process.exit(1);
}
