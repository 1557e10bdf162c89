import { createApp } from './app';
import { env, loadMatchingConfig } from './config';
import { registryStore } from './registry';
import { reconciliationService } from './services';
import { logger, Logging } from './utils';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    // Matching options (defaults when no file is configured)
    const matchingConfig = await loadMatchingConfig(env.MATCHING_CONFIG_PATH);
    reconciliationService.useConfig(matchingConfig);

    // Registry snapshot; without one the service starts but is not ready
    if (env.REGISTRY_PATH) {
      const registry = await registryStore.load(env.REGISTRY_PATH);
      Logging.info(`Client registry loaded: ${registry.size} clients from ${env.REGISTRY_PATH}`);
    } else {
      Logging.warn('REGISTRY_PATH is not set; readiness stays false until a registry is loaded');
    }

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 CLIENT RECONCILIATION', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        logger.info('Server closed successfully');
        process.exit(0);
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
