/**
 * Strike Window Trader
 *
 * Process entry point: starts the App, reports status and shuts down
 * cleanly on signals and fatal errors.
 */

import { App } from './app.js';
import { logger, normalizeError } from './logger.js';

const STATUS_INTERVAL_MS = 60_000;

const app = new App();
let statusTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

async function shutdown(reason: string, exitCode: number = 0): Promise<void> {
  if (shuttingDown) {
    logger.warn('Shutdown already in progress', { reason });
    return;
  }
  shuttingDown = true;
  logger.info(`${reason}, initiating graceful shutdown...`);

  if (statusTimer) {
    clearInterval(statusTimer);
    statusTimer = null;
  }

  try {
    await app.stop(reason);
    logger.info('Graceful shutdown complete', app.getStatus());
    process.exit(exitCode);
  } catch (error) {
    logger.error('Error during shutdown', { error: normalizeError(error).message });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('Received SIGTERM'));
process.on('SIGINT', () => void shutdown('Received SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  shutdown('Uncaught exception', 1).catch(() => process.exit(1));
});

// An open position is never abandoned on a stray rejection; log and keep running
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: normalizeError(reason).message });
});

async function main(): Promise<void> {
  logger.info('='.repeat(50));
  logger.info('Strike Window Trader');
  logger.info('='.repeat(50));

  try {
    await app.start();
  } catch (error) {
    logger.error('Failed to start application', { error: normalizeError(error).message });
    process.exit(1);
  }

  statusTimer = setInterval(() => {
    logger.debug('Application status', app.getStatus());
  }, STATUS_INTERVAL_MS);
}

void main();
