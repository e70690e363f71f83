#!/usr/bin/env node
/**
 * Toolgate - WebSocket tool gateway
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  // Loads config, builds the logger, collaborator and frozen action registry
  container = await createContainerAsync();

  const { logger, server, config } = container;

  logger.info('Toolgate starting...');

  const address = await server.start();
  logger.info(
    {
      host: config.server.host,
      port: address.port,
      path: config.server.path,
      workspace: config.workspace.root,
    },
    'Gateway ready'
  );
}

// Handle shutdown gracefully
async function shutdown(exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  try {
    if (container) {
      await container.shutdown();
    }
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('Shutdown failed:', error);
    exitCode = 1;
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

// Handle uncaught errors
process.on('uncaughtException', (error: unknown) => {
  if (container) {
    container.logger.error(
      { error: error instanceof Error ? (error.stack ?? error.message) : String(error) },
      'Uncaught exception'
    );
  } else {
    // eslint-disable-next-line no-console
    console.error('Uncaught exception:', error);
  }
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  if (container) {
    container.logger.error(
      { error: reason instanceof Error ? (reason.stack ?? reason.message) : String(reason) },
      'Unhandled rejection'
    );
  } else {
    // eslint-disable-next-line no-console
    console.error('Unhandled rejection:', reason);
  }
  void shutdown(1);
});

// Start the application
main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
