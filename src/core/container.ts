import { join } from 'node:path';
import type { Logger } from '../types/logger.js';
import { createLogger } from './logger.js';
import { type GatewayConfig, loadConfig } from '../config/index.js';
import { createActionDefinitions } from '../actions/index.js';
import { type ActionRegistry, createActionRegistry } from '../gateway/action-registry.js';
import { GatewayServer } from '../gateway/server.js';
import { AiSdkCollaborator, type Collaborator } from '../llm/collaborator.js';

export const SERVER_NAME = 'toolgate';
export const SERVER_VERSION = '1.0.0';

/**
 * Pieces a caller may supply instead of having them built from config.
 */
export interface ContainerOverrides {
  logger?: Logger | undefined;
  collaborator?: Collaborator | undefined;
}

/**
 * Container holding all application dependencies.
 */
export interface Container {
  /** Application logger */
  logger: Logger;
  /** Merged configuration */
  config: GatewayConfig;
  /** AI backend for the code-assist actions */
  collaborator: Collaborator;
  /** Frozen action registry */
  registry: ActionRegistry;
  /** WebSocket + HTTP server (not yet listening) */
  server: GatewayServer;
  /** Stop the server and close every session */
  shutdown: () => Promise<void>;
}

/**
 * Wire the gateway from an already-loaded configuration.
 */
export function createContainer(
  config: GatewayConfig,
  overrides: ContainerOverrides = {}
): Container {
  const logger: Logger =
    overrides.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });

  const collaborator =
    overrides.collaborator ?? new AiSdkCollaborator({ ...config.collaborator }, logger);

  const registry = createActionRegistry(
    logger,
    createActionDefinitions({ config, collaborator })
  );

  const server = new GatewayServer({
    ...config.server,
    registry,
    logger,
    name: SERVER_NAME,
    version: SERVER_VERSION,
    collaboratorConfigured: collaborator.isConfigured(),
  });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await server.stop();
    logger.info('Shutdown complete');
  };

  return { logger, config, collaborator, registry, server, shutdown };
}

/**
 * Create the application container with async initialization.
 *
 * Loads configuration from `<dataPath>/config/gateway.json` and the
 * environment, then wires everything.
 */
export async function createContainerAsync(
  overrides: ContainerOverrides & { configPath?: string | undefined } = {}
): Promise<Container> {
  const dataPath = process.env['DATA_PATH'] ?? 'data';
  const config = await loadConfig(overrides.configPath ?? join(dataPath, 'config'));
  const container = createContainer(config, overrides);

  container.logger.info(
    {
      workspace: config.workspace.root,
      collaborator: container.collaborator.isConfigured() ? config.collaborator.provider : 'none',
      actions: container.registry.names().length,
    },
    'Container ready'
  );

  return container;
}
