/**
 * Gateway Server
 *
 * HTTP server with the WebSocket endpoint mounted on it. Each upgraded socket
 * becomes a ConnectionSession registered with the ConnectionManager. A
 * heartbeat pings every socket and terminates the ones that stop answering.
 *
 * Plain HTTP serves two informational routes:
 *   GET /        → {name, version, status}
 *   GET /health  → {status, connections, uptime_seconds, collaborator}
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import WebSocket, { WebSocketServer, type RawData } from 'ws';
import type { Logger } from '../types/logger.js';
import type { ActionRegistry } from './action-registry.js';
import { ConnectionManager } from './connection-manager.js';
import { ConnectionSession, type SessionTransport } from './session.js';

export interface GatewayServerOptions {
  host: string;
  port: number;
  path: string;
  maxPayloadBytes: number;
  heartbeatIntervalMs: number;
  maxInFlightPerConnection: number;
  registry: ActionRegistry;
  logger: Logger;
  /** Reported on `GET /` */
  name: string;
  version: string;
  /** Reported on `GET /health` */
  collaboratorConfigured: boolean;
}

/** How long shutdown waits for peers to acknowledge the close frame */
const CLOSE_GRACE_MS = 1000;

/**
 * Decode a ws message payload as UTF-8 text.
 */
export function rawDataToString(raw: RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  return Buffer.from(raw).toString('utf8');
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'content-type': 'application/json; charset=utf-8',
    'content-length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

export class GatewayServer {
  private readonly options: GatewayServerOptions;
  private readonly logger: Logger;
  private readonly connections: ConnectionManager;
  private readonly alive = new WeakMap<WebSocket, boolean>();

  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private startedAt = Date.now();

  constructor(options: GatewayServerOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'gateway-server' });
    this.connections = new ConnectionManager(options.logger);
  }

  getConnectionManager(): ConnectionManager {
    return this.connections;
  }

  isRunning(): boolean {
    return this.httpServer !== null;
  }

  /**
   * Bound address once listening (port 0 resolves to the real port).
   */
  address(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Start listening. The registry must already be frozen.
   */
  async start(): Promise<AddressInfo> {
    if (this.httpServer) {
      throw new Error('Gateway server is already running');
    }
    if (!this.options.registry.isFrozen()) {
      throw new Error('Action registry must be frozen before the server starts');
    }

    const httpServer = createServer((req, res) => {
      this.handleHttp(req, res);
    });
    const wss = new WebSocketServer({
      server: httpServer,
      path: this.options.path,
      perMessageDeflate: false,
      maxPayload: this.options.maxPayloadBytes,
    });

    wss.on('connection', (ws, req) => {
      this.handleConnection(ws, req);
    });
    wss.on('error', (error) => {
      this.logger.error({ error: error.message }, 'WebSocket server error');
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      httpServer.once('error', onError);
      httpServer.listen(this.options.port, this.options.host, () => {
        httpServer.off('error', onError);
        resolve();
      });
    });

    this.httpServer = httpServer;
    this.wss = wss;
    this.startedAt = Date.now();
    this.heartbeatTimer = setInterval(() => {
      this.heartbeat();
    }, this.options.heartbeatIntervalMs);
    this.heartbeatTimer.unref();

    const address = this.address();
    if (!address) {
      throw new Error('Gateway server has no bound address');
    }

    this.logger.info(
      {
        url: `ws://${this.options.host}:${String(address.port)}${this.options.path}`,
        actions: this.options.registry.names().length,
      },
      'Gateway server listening'
    );
    return address;
  }

  /**
   * Stop accepting, close every session with 1001 and shut the HTTP server.
   */
  async stop(): Promise<void> {
    const httpServer = this.httpServer;
    const wss = this.wss;
    if (!httpServer || !wss) return;

    this.httpServer = null;
    this.wss = null;
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    const closed = this.connections.closeAll(1001, 'server shutting down');

    const deadline = Date.now() + CLOSE_GRACE_MS;
    while (wss.clients.size > 0 && Date.now() < deadline) {
      await delay(20);
    }
    for (const client of wss.clients) {
      client.terminate();
    }

    await new Promise<void>((resolve, reject) => {
      wss.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    httpServer.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });

    this.logger.info({ closedSessions: closed }, 'Gateway server stopped');
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const transport: SessionTransport = {
      send: (text) => {
        ws.send(text, (error) => {
          if (error) {
            this.logger.debug({ error: error.message }, 'Send failed');
          }
        });
      },
      close: (code, reason) => {
        ws.close(code, reason);
      },
    };

    const session = new ConnectionSession({
      transport,
      dispatcher: this.options.registry,
      logger: this.options.logger,
      maxInFlight: this.options.maxInFlightPerConnection,
      remoteAddress: req.socket.remoteAddress,
    });

    this.connections.add(session);
    this.alive.set(ws, true);
    session.open();

    ws.on('pong', () => {
      this.alive.set(ws, true);
    });

    ws.on('message', (raw, isBinary) => {
      session.handleFrame(rawDataToString(raw), isBinary).catch((error: unknown) => {
        this.logger.error(
          { connectionId: session.id, error: error instanceof Error ? error.message : String(error) },
          'Frame handling failed'
        );
      });
    });

    ws.on('close', () => {
      session.markClosed();
      this.connections.remove(session.id);
    });

    ws.on('error', (error) => {
      this.logger.warn({ connectionId: session.id, error: error.message }, 'Socket error');
      session.markClosed();
      this.connections.remove(session.id);
    });
  }

  private heartbeat(): void {
    const wss = this.wss;
    if (!wss) return;

    for (const ws of wss.clients) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      if (!this.alive.get(ws)) {
        this.logger.info('Terminating unresponsive socket');
        ws.terminate();
        continue;
      }
      this.alive.set(ws, false);
      ws.ping();
    }
  }

  private handleHttp(req: IncomingMessage, res: ServerResponse): void {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (pathname !== '/' && pathname !== '/health') {
      sendJson(res, 404, { error: 'not found' });
      return;
    }
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendJson(res, 405, { error: 'method not allowed' });
      return;
    }

    if (pathname === '/') {
      sendJson(res, 200, {
        name: this.options.name,
        version: this.options.version,
        status: 'running',
      });
      return;
    }

    sendJson(res, 200, {
      status: 'healthy',
      connections: this.connections.size(),
      uptime_seconds: Math.floor((Date.now() - this.startedAt) / 1000),
      collaborator: this.options.collaboratorConfigured ? 'configured' : 'unconfigured',
    });
  }
}
