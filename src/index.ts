/**
 * Homework Status Bot
 *
 * Entry point for the application.
 * Handles process signals for graceful shutdown.
 */

import { App } from './app.js';
import { launch } from './startup.js';
import { logger } from './logger.js';

let app: App | null = null;

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    await app?.stop(`Received ${signal}`);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Register signal handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  shutdown('uncaughtException').catch(() => process.exit(1));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

// Start the application
async function main(): Promise<void> {
  try {
    logger.info('='.repeat(50));
    logger.info('Homework Status Bot');
    logger.info('='.repeat(50));

    app = await launch(process.env, (config) => new App(config));
    if (!app) {
      logger.error('Bot stopped. Fix the environment variables and restart.');
      process.exit(1);
    }
  } catch (error) {
    logger.error('Failed to start application', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Run
void main();
