import { z } from 'zod';

/**
 * Gateway configuration file schema.
 *
 * This is what gets loaded from <configDir>/gateway.json.
 * All fields are optional - defaults are used for missing values.
 * Unknown keys are rejected so typos fail at startup.
 */

export const CONFIG_FILE_VERSION = 1;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const logLevelSchema = z.enum(LOG_LEVELS);

/** Timers past 2^31-1 ms overflow and fire immediately */
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_COMMAND_TIMEOUT_SEC = Math.floor(MAX_TIMER_MS / 1000);

const timeoutSecSchema = z
  .number()
  .positive()
  .max(MAX_COMMAND_TIMEOUT_SEC, `must not exceed ${String(MAX_COMMAND_TIMEOUT_SEC)} seconds`);

export const configFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive().optional(),

    server: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        /** WebSocket endpoint path */
        path: z.string().startsWith('/').optional(),
        maxPayloadBytes: z.number().int().positive().optional(),
        heartbeatIntervalMs: z.number().int().positive().optional(),
        maxInFlightPerConnection: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    workspace: z
      .object({
        /** Relative paths in requests resolve against this directory */
        root: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    commands: z
      .object({
        defaultTimeoutSec: timeoutSecSchema.optional(),
        maxTimeoutSec: timeoutSecSchema.optional(),
        killGraceMs: z
          .number()
          .int()
          .nonnegative()
          .max(MAX_TIMER_MS, `must not exceed ${String(MAX_TIMER_MS)} ms`)
          .optional(),
        maxOutputBytes: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    search: z
      .object({
        maxResults: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    collaborator: z
      .object({
        provider: z.enum(['openai', 'openrouter']).optional(),
        model: z.string().min(1).optional(),
        baseUrl: z.string().url().optional(),
        temperature: z.number().min(0).max(2).optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    logging: z
      .object({
        level: logLevelSchema.optional(),
        pretty: z.boolean().optional(),
        /** Directory for log files; null disables file logging */
        logDir: z.string().nullable().optional(),
        maxFiles: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type GatewayConfigFile = z.infer<typeof configFileSchema>;

/**
 * Merged configuration (file + env + defaults).
 */
export interface GatewayConfig {
  server: {
    host: string;
    port: number;
    path: string;
    maxPayloadBytes: number;
    heartbeatIntervalMs: number;
    maxInFlightPerConnection: number;
  };
  workspace: {
    root: string;
  };
  commands: {
    defaultTimeoutSec: number;
    maxTimeoutSec: number;
    killGraceMs: number;
    maxOutputBytes: number;
  };
  search: {
    maxResults: number;
  };
  collaborator: {
    provider: 'openai' | 'openrouter';
    /** From env only (secret) */
    apiKey: string | null;
    baseUrl: string | null;
    model: string;
    temperature: number;
    timeoutMs: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string | null;
    maxFiles: number;
  };
  /** Root for config and logs */
  dataPath: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: GatewayConfig = {
  server: {
    host: '0.0.0.0',
    port: 8000,
    path: '/ws',
    maxPayloadBytes: 16 * 1024 * 1024,
    heartbeatIntervalMs: 30_000,
    maxInFlightPerConnection: 64,
  },
  workspace: {
    root: process.cwd(),
  },
  commands: {
    defaultTimeoutSec: 30,
    maxTimeoutSec: 600,
    killGraceMs: 2000,
    maxOutputBytes: 1024 * 1024,
  },
  search: {
    maxResults: 1000,
  },
  collaborator: {
    provider: 'openai',
    apiKey: null,
    baseUrl: null,
    model: 'gpt-4o-mini',
    temperature: 0.1,
    timeoutMs: 120_000,
  },
  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: 'data/logs',
    maxFiles: 10,
  },
  dataPath: 'data',
};
