/**
 * Gateway Client
 *
 * Reference client for the gateway protocol. Every request gets a fresh
 * request_id and a pending entry; responses are matched by that id, so
 * requests may complete in any order.
 */

import WebSocket from 'ws';
import type { Logger } from '../types/logger.js';
import { TimeoutError } from './errors.js';
import {
  parseResponseEnvelope,
  requestKey,
  type ActionData,
  type DecodedResponse,
  type RequestId,
} from './protocol.js';
import { rawDataToString } from './server.js';

export interface GatewayClientOptions {
  /** e.g. ws://127.0.0.1:8000/ws */
  url: string;
  /** Per-request timeout; 0 disables it */
  requestTimeoutMs?: number | undefined;
  logger?: Logger | undefined;
}

interface PendingRequest {
  resolve: (response: DecodedResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

export class GatewayClient {
  private readonly url: string;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger | undefined;
  private readonly pending = new Map<string, PendingRequest>();
  private socket: WebSocket | null = null;
  private nextId = 1;

  constructor(options: GatewayClientOptions) {
    this.url = options.url;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 0;
    this.logger = options.logger?.child({ component: 'gateway-client' });
  }

  pendingCount(): number {
    return this.pending.size;
  }

  async connect(): Promise<void> {
    if (this.socket) return;

    const socket = new WebSocket(this.url);
    await new Promise<void>((resolve, reject) => {
      socket.once('open', () => {
        socket.off('error', reject);
        resolve();
      });
      socket.once('error', reject);
    });

    socket.on('message', (raw) => {
      this.handleMessage(rawDataToString(raw));
    });
    socket.on('close', () => {
      this.socket = null;
      this.rejectAll(new Error('connection closed'));
    });
    socket.on('error', (error) => {
      this.logger?.warn({ error: error.message }, 'Client socket error');
    });

    this.socket = socket;
  }

  /**
   * Send one request and wait for the response carrying the same request_id.
   */
  async request(action: string, data: ActionData = {}, requestId?: RequestId): Promise<DecodedResponse> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      throw new Error('client is not connected');
    }

    const id = requestId ?? `req-${String(this.nextId++)}`;
    const key = requestKey(id);
    if (this.pending.has(key)) {
      throw new Error(`request_id already pending: ${String(id)}`);
    }

    const response = new Promise<DecodedResponse>((resolve, reject) => {
      const timer =
        this.requestTimeoutMs > 0
          ? setTimeout(() => {
              this.pending.delete(key);
              reject(new TimeoutError(`request ${String(id)}`, this.requestTimeoutMs));
            }, this.requestTimeoutMs)
          : null;
      this.pending.set(key, { resolve, reject, timer });
    });

    socket.send(JSON.stringify({ action, data, request_id: id }), (error) => {
      if (error) this.settle(key, error);
    });

    return response;
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;

    await new Promise<void>((resolve) => {
      socket.once('close', () => {
        resolve();
      });
      socket.close(1000, 'client closing');
    });
  }

  private handleMessage(text: string): void {
    let response: DecodedResponse;
    try {
      response = parseResponseEnvelope(JSON.parse(text));
    } catch (error) {
      this.logger?.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Discarding unreadable frame'
      );
      return;
    }

    if (response.request_id === null) {
      this.logger?.warn({ error: response.error }, 'Uncorrelated error response');
      return;
    }
    this.settle(requestKey(response.request_id), response);
  }

  private settle(key: string, outcome: DecodedResponse | Error): void {
    const entry = this.pending.get(key);
    if (!entry) {
      this.logger?.debug({ key }, 'Response for unknown request');
      return;
    }
    this.pending.delete(key);
    if (entry.timer) clearTimeout(entry.timer);

    if (outcome instanceof Error) entry.reject(outcome);
    else entry.resolve(outcome);
  }

  private rejectAll(error: Error): void {
    for (const key of Array.from(this.pending.keys())) {
      this.settle(key, error);
    }
  }
}
