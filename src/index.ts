/**
 * Prism - Verifiable Analytics Agent
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { PrismServer } from './api/server.js';
import { loadConfig } from './config/loader.js';
import logger, { configureLogger, logLifecycle } from './utils/logger.js';
import { toErrorMessage } from './utils/helpers.js';

// =============================================================================
// Global State
// =============================================================================

let prismServer: PrismServer | null = null;
let isShuttingDown = false;

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'Prism starting up...');

  try {
    const config = loadConfig();
    configureLogger(config.logging);

    logLifecycle('startup', 'Configuration loaded', {
      port: config.server.port,
      host: config.server.host,
      environment: config.server.nodeEnv,
      driver: config.dataSource.driver,
      catalog: config.catalog.path,
    });

    prismServer = new PrismServer(config);
    await prismServer.initialize();
    await prismServer.start();
  } catch (error) {
    logLifecycle('error', 'Failed to start Prism', {
      error: toErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    if (prismServer !== null) {
      await prismServer.shutdown(signal);
    }

    clearTimeout(shutdownTimeout);
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', { error: toErrorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: toErrorMessage(reason),
  });
});

// =============================================================================
// Start Application
// =============================================================================

bootstrap().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal error during bootstrap:', error);
  process.exit(1);
});
