/**
 * Test factories for creating test doubles and fixtures.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Logger } from '../../src/types/logger.js';
import type { SessionTransport } from '../../src/gateway/session.js';
import type { Collaborator } from '../../src/llm/collaborator.js';
import type { CollaboratorRequest } from '../../src/llm/prompts.js';
import type { GatewayConfig } from '../../src/config/index.js';
import type { ResponseEnvelope } from '../../src/gateway/protocol.js';

/**
 * Create a mock logger that captures all log calls.
 */
export function createMockLogger(): Logger & {
  calls: Record<string, unknown[][]>;
  reset: () => void;
} {
  const calls: Record<string, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
  };

  const logger = {
    trace: vi.fn((...args: unknown[]) => calls['trace']?.push(args)),
    debug: vi.fn((...args: unknown[]) => calls['debug']?.push(args)),
    info: vi.fn((...args: unknown[]) => calls['info']?.push(args)),
    warn: vi.fn((...args: unknown[]) => calls['warn']?.push(args)),
    error: vi.fn((...args: unknown[]) => calls['error']?.push(args)),
    child: () => logger,
    calls,
    reset: () => {
      calls['trace'] = [];
      calls['debug'] = [];
      calls['info'] = [];
      calls['warn'] = [];
      calls['error'] = [];
      vi.clearAllMocks();
    },
  };

  return logger as Logger & { calls: Record<string, unknown[][]>; reset: () => void };
}

/**
 * In-memory transport recording every frame a session writes.
 */
export interface FakeTransport extends SessionTransport {
  sent: string[];
  closed: { code: number; reason: string } | null;
  /** Sent frames decoded as response envelopes */
  responses(): ResponseEnvelope[];
}

export function createFakeTransport(): FakeTransport {
  const transport: FakeTransport = {
    sent: [],
    closed: null,
    send(text: string) {
      transport.sent.push(text);
    },
    close(code: number, reason: string) {
      transport.closed = { code, reason };
    },
    responses() {
      return transport.sent.map((text) => JSON.parse(text) as ResponseEnvelope);
    },
  };
  return transport;
}

/**
 * Collaborator double that answers from a function and records requests.
 */
export function createFakeCollaborator(
  respond: (request: CollaboratorRequest) => Promise<string> = async (request) =>
    `result for ${request.capability}`,
  configured = true
): Collaborator & { requests: CollaboratorRequest[] } {
  const requests: CollaboratorRequest[] = [];
  return {
    requests,
    isConfigured: () => configured,
    invoke: async (request) => {
      requests.push(request);
      return respond(request);
    },
  };
}

/**
 * Temporary directory under the OS tmpdir, removed by `cleanup`.
 */
export async function createTempWorkspace(
  prefix = 'toolgate-test-'
): Promise<{ root: string; cleanup: () => Promise<void> }> {
  const root = await mkdtemp(join(tmpdir(), prefix));
  return {
    root,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

/**
 * Full config for a test gateway on an ephemeral local port.
 */
export function createTestConfig(workspaceRoot: string, overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    server: {
      host: '127.0.0.1',
      port: 0,
      path: '/ws',
      maxPayloadBytes: 1024 * 1024,
      heartbeatIntervalMs: 60_000,
      maxInFlightPerConnection: 64,
    },
    workspace: { root: workspaceRoot },
    commands: {
      defaultTimeoutSec: 10,
      maxTimeoutSec: 30,
      killGraceMs: 500,
      maxOutputBytes: 64 * 1024,
    },
    search: { maxResults: 1000 },
    collaborator: {
      provider: 'openai',
      apiKey: null,
      baseUrl: null,
      model: 'test-model',
      temperature: 0.1,
      timeoutMs: 5000,
    },
    logging: { level: 'error', pretty: false, logDir: null, maxFiles: 1 },
    dataPath: workspaceRoot,
    ...overrides,
  };
}
