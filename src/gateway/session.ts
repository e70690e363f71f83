/**
 * Connection Session
 *
 * One per WebSocket connection. Parses inbound frames, tracks which request ids
 * are in flight, dispatches each request as its own promise and writes the
 * response back tagged with the request's id.
 *
 * State machine:
 *   connecting → open → closing → closed
 *
 * Responses that complete after the session left `open` are dropped.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import { withRequestContext } from '../core/request-context.js';
import type { ActionRegistry } from './action-registry.js';
import {
  DuplicateRequestError,
  GatewayError,
  TooManyRequestsError,
  ValidationError,
} from './errors.js';
import {
  addressOutcome,
  parseRequestEnvelope,
  peekRequestId,
  rejectionEnvelope,
  requestKey,
  type RequestEnvelope,
  type RequestId,
  type ResponseEnvelope,
} from './protocol.js';

export type SessionState = 'connecting' | 'open' | 'closing' | 'closed';

/**
 * The slice of a socket the session writes to. Implemented over `ws` by the
 * server and by an in-memory fake in tests.
 */
export interface SessionTransport {
  send(text: string): void;
  close(code: number, reason: string): void;
}

export type ActionDispatcher = Pick<ActionRegistry, 'dispatch'>;

export interface ConnectionSessionOptions {
  transport: SessionTransport;
  dispatcher: ActionDispatcher;
  logger: Logger;
  /** Maximum concurrently dispatched requests before frames are refused */
  maxInFlight: number;
  id?: string | undefined;
  remoteAddress?: string | undefined;
}

interface InFlightRequest {
  requestId: RequestId;
  action: string;
  startedAt: number;
}

export class ConnectionSession {
  readonly id: string;
  readonly createdAt = new Date();
  readonly remoteAddress: string | undefined;

  private state: SessionState = 'connecting';
  private readonly inFlight = new Map<string, InFlightRequest>();
  private readonly transport: SessionTransport;
  private readonly dispatcher: ActionDispatcher;
  private readonly maxInFlight: number;
  private readonly logger: Logger;

  constructor(options: ConnectionSessionOptions) {
    this.id = options.id ?? randomUUID();
    this.remoteAddress = options.remoteAddress;
    this.transport = options.transport;
    this.dispatcher = options.dispatcher;
    this.maxInFlight = options.maxInFlight;
    this.logger = options.logger.child({ component: 'session', connectionId: this.id });
  }

  getState(): SessionState {
    return this.state;
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Handshake complete; frames are accepted from now on.
   */
  open(): void {
    if (this.state !== 'connecting') return;
    this.state = 'open';
    this.logger.info({ remoteAddress: this.remoteAddress }, 'Connection opened');
  }

  /**
   * Handle one inbound frame. Resolves once its response has been written or
   * dropped; never rejects.
   */
  async handleFrame(raw: string, isBinary = false): Promise<void> {
    if (this.state !== 'open') {
      this.logger.debug({ state: this.state }, 'Frame ignored: session not open');
      return;
    }

    if (isBinary) {
      this.reject('Invalid request', new ValidationError('binary frames are not supported'), null);
      return;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.reject('Invalid JSON', new ValidationError(`invalid JSON: ${reason}`), null);
      return;
    }

    let envelope: RequestEnvelope;
    try {
      envelope = parseRequestEnvelope(decoded);
    } catch (error) {
      const gatewayError =
        error instanceof GatewayError ? error : new ValidationError('invalid request envelope');
      this.reject('Invalid request', gatewayError, peekRequestId(decoded));
      return;
    }

    const { action, data, request_id: requestId } = envelope;
    const key = requestKey(requestId);

    if (this.inFlight.has(key)) {
      this.reject('Duplicate request', new DuplicateRequestError(requestId), requestId);
      return;
    }
    if (this.inFlight.size >= this.maxInFlight) {
      this.reject('Too many requests', new TooManyRequestsError(this.maxInFlight), requestId);
      return;
    }

    this.inFlight.set(key, { requestId, action, startedAt: Date.now() });

    const outcome = await withRequestContext(
      { connectionId: this.id, requestId: String(requestId), action },
      () => {
        this.logger.debug({ action }, 'Dispatching request');
        return this.dispatcher.dispatch(action, data, {
          connectionId: this.id,
          requestId,
          logger: this.logger,
        });
      }
    );

    const started = this.inFlight.get(key);
    this.inFlight.delete(key);

    this.respond(addressOutcome(outcome, requestId), {
      action,
      durationMs: started ? Date.now() - started.startedAt : undefined,
    });

    if (this.state === 'closing' && this.inFlight.size === 0) {
      this.state = 'closed';
      this.logger.debug('Session drained and closed');
    }
  }

  /**
   * Start an orderly close. Outstanding handlers keep running but their
   * responses are dropped.
   */
  close(code = 1000, reason = 'closing'): void {
    if (this.state === 'closing' || this.state === 'closed') return;

    this.state = this.inFlight.size === 0 ? 'closed' : 'closing';
    this.logger.info({ code, reason, inFlight: this.inFlight.size }, 'Closing connection');

    try {
      this.transport.close(code, reason);
    } catch (error) {
      this.logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        'Transport close failed'
      );
    }
  }

  /**
   * Write a server-initiated frame. Returns false when nothing was sent.
   */
  push(payload: object): boolean {
    if (this.state !== 'open') return false;
    try {
      this.transport.send(JSON.stringify(payload));
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to push frame'
      );
      this.markClosed();
      return false;
    }
    return true;
  }

  /**
   * Transport is gone (peer closed or I/O error). Abandon in-flight work.
   */
  markClosed(): void {
    if (this.state === 'closed') return;
    const abandoned = this.inFlight.size;
    this.state = 'closed';
    this.logger.info({ abandoned }, 'Connection closed');
  }

  private reject(message: string, error: GatewayError, requestId: RequestId | null): void {
    this.logger.warn({ code: error.code, error: error.message, requestId }, 'Rejected frame');
    this.respond(rejectionEnvelope(message, error, requestId), {
      action: undefined,
      durationMs: undefined,
    });
  }

  private respond(
    envelope: ResponseEnvelope,
    meta: { action: string | undefined; durationMs: number | undefined }
  ): void {
    if (this.state !== 'open') {
      this.logger.debug(
        { requestId: envelope.request_id, action: meta.action, state: this.state },
        'Response dropped: session no longer open'
      );
      return;
    }

    try {
      this.transport.send(JSON.stringify(envelope));
    } catch (error) {
      this.logger.warn(
        { requestId: envelope.request_id, error: error instanceof Error ? error.message : String(error) },
        'Failed to send response'
      );
      this.markClosed();
      return;
    }

    this.logger.debug(
      {
        requestId: envelope.request_id,
        action: meta.action,
        success: envelope.success,
        durationMs: meta.durationMs,
      },
      'Response sent'
    );
  }
}
