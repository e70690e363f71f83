import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { GatewayConfig, GatewayConfigFile } from './config-schema.js';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  configFileSchema,
  logLevelSchema,
} from './config-schema.js';

export const CONFIG_FILE_NAME = 'gateway.json';

/**
 * Raised for an unreadable or invalid configuration. Startup aborts on it.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (secrets and deployment overrides)
 * 2. Config file (<configDir>/gateway.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: Env;
  private loadedConfig: GatewayConfigFile | null = null;

  constructor(configPath = 'data/config', env: Env = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   *
   * @throws ConfigError on an invalid file or environment value
   */
  async load(): Promise<GatewayConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);
    this.validate(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): GatewayConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<GatewayConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to load config file: ${message}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Config file ${filePath} is not valid JSON: ${message}`);
    }

    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
    }

    if (result.data.version !== undefined && result.data.version > CONFIG_FILE_VERSION) {
      throw new ConfigError(
        `Config file version (${String(result.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return result.data;
  }

  private mergeConfigFile(config: GatewayConfig, file: GatewayConfigFile): void {
    // Server
    if (file.server) {
      const server = file.server;
      config.server = {
        host: server.host ?? config.server.host,
        port: server.port ?? config.server.port,
        path: server.path ?? config.server.path,
        maxPayloadBytes: server.maxPayloadBytes ?? config.server.maxPayloadBytes,
        heartbeatIntervalMs: server.heartbeatIntervalMs ?? config.server.heartbeatIntervalMs,
        maxInFlightPerConnection:
          server.maxInFlightPerConnection ?? config.server.maxInFlightPerConnection,
      };
    }

    // Workspace
    if (file.workspace?.root) {
      config.workspace.root = file.workspace.root;
    }

    // Commands
    if (file.commands) {
      const commands = file.commands;
      config.commands = {
        defaultTimeoutSec: commands.defaultTimeoutSec ?? config.commands.defaultTimeoutSec,
        maxTimeoutSec: commands.maxTimeoutSec ?? config.commands.maxTimeoutSec,
        killGraceMs: commands.killGraceMs ?? config.commands.killGraceMs,
        maxOutputBytes: commands.maxOutputBytes ?? config.commands.maxOutputBytes,
      };
    }

    // Search
    if (file.search?.maxResults !== undefined) {
      config.search.maxResults = file.search.maxResults;
    }

    // Collaborator (the API key only ever comes from the environment)
    if (file.collaborator) {
      const collaborator = file.collaborator;
      config.collaborator = {
        ...config.collaborator,
        provider: collaborator.provider ?? config.collaborator.provider,
        model: collaborator.model ?? config.collaborator.model,
        baseUrl: collaborator.baseUrl ?? config.collaborator.baseUrl,
        temperature: collaborator.temperature ?? config.collaborator.temperature,
        timeoutMs: collaborator.timeoutMs ?? config.collaborator.timeoutMs,
      };
    }

    // Logging
    if (file.logging) {
      const logging = file.logging;
      config.logging = {
        level: logging.level ?? config.logging.level,
        pretty: logging.pretty ?? config.logging.pretty,
        logDir: logging.logDir !== undefined ? logging.logDir : config.logging.logDir,
        maxFiles: logging.maxFiles ?? config.logging.maxFiles,
      };
    }
  }

  private mergeEnvironment(config: GatewayConfig): void {
    const env = this.env;

    const host = readString(env, 'GATEWAY_HOST');
    if (host) config.server.host = host;

    const port = readNumber(env, 'GATEWAY_PORT');
    if (port !== undefined) config.server.port = port;

    const path = readString(env, 'GATEWAY_PATH');
    if (path) config.server.path = path;

    const workspaceRoot = readString(env, 'WORKSPACE_ROOT');
    if (workspaceRoot) config.workspace.root = workspaceRoot;

    const timeout = readNumber(env, 'COMMAND_TIMEOUT_SEC');
    if (timeout !== undefined) config.commands.defaultTimeoutSec = timeout;

    // OpenAI wins when both keys are present
    const openAiKey = readString(env, 'OPENAI_API_KEY');
    const openRouterKey = readString(env, 'OPENROUTER_API_KEY');
    if (openAiKey) {
      config.collaborator.provider = 'openai';
      config.collaborator.apiKey = openAiKey;
    } else if (openRouterKey) {
      config.collaborator.provider = 'openrouter';
      config.collaborator.apiKey = openRouterKey;
    }

    const model = readString(env, 'COLLABORATOR_MODEL');
    if (model) config.collaborator.model = model;

    const baseUrl = readString(env, 'COLLABORATOR_BASE_URL');
    if (baseUrl) config.collaborator.baseUrl = baseUrl;

    const logLevel = readString(env, 'LOG_LEVEL');
    if (logLevel) {
      const level = logLevelSchema.safeParse(logLevel.toLowerCase());
      if (!level.success) {
        throw new ConfigError(
          `LOG_LEVEL must be one of ${logLevelSchema.options.join(', ')}, got "${logLevel}"`
        );
      }
      config.logging.level = level.data;
    }

    const dataPath = readString(env, 'DATA_PATH');
    if (dataPath) {
      config.dataPath = dataPath;
      config.logging.logDir = join(dataPath, 'logs');
    }

    config.workspace.root = resolve(config.workspace.root);
  }

  private validate(config: GatewayConfig): void {
    const { port } = config.server;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(
        `server port must be an integer between 0 and 65535, got ${String(port)}`
      );
    }
    if (!config.server.path.startsWith('/')) {
      throw new ConfigError(`server path must start with "/", got "${config.server.path}"`);
    }
    if (config.commands.defaultTimeoutSec <= 0) {
      throw new ConfigError('default command timeout must be positive');
    }
    if (config.commands.defaultTimeoutSec > config.commands.maxTimeoutSec) {
      throw new ConfigError(
        `default command timeout (${String(config.commands.defaultTimeoutSec)}s) exceeds the maximum (${String(config.commands.maxTimeoutSec)}s)`
      );
    }
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: Env): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Convenience function for quick setup.
 */
export async function loadConfig(configPath?: string, env?: Env): Promise<GatewayConfig> {
  const loader = createConfigLoader(configPath, env);
  return loader.load();
}
