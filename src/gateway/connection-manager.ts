/**
 * Connection Manager
 *
 * Owns the set of live sessions. Each connection id maps to exactly one
 * session; sessions are inserted on connect and removed on disconnect.
 */

import type { Logger } from '../types/logger.js';
import type { ConnectionSession } from './session.js';

export class ConnectionManager {
  private readonly sessions = new Map<string, ConnectionSession>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'connection-manager' });
  }

  add(session: ConnectionSession): void {
    if (this.sessions.has(session.id)) {
      throw new Error(`Connection ${session.id} is already registered`);
    }
    this.sessions.set(session.id, session);
    this.logger.debug({ connectionId: session.id, connections: this.sessions.size }, 'Session added');
  }

  /**
   * Drop a session. Removing an unknown id is a no-op.
   */
  remove(connectionId: string): boolean {
    const removed = this.sessions.delete(connectionId);
    if (removed) {
      this.logger.debug({ connectionId, connections: this.sessions.size }, 'Session removed');
    }
    return removed;
  }

  get(connectionId: string): ConnectionSession | undefined {
    return this.sessions.get(connectionId);
  }

  size(): number {
    return this.sessions.size;
  }

  ids(): string[] {
    return Array.from(this.sessions.keys());
  }

  /**
   * Send `payload` to every open session. Returns how many received it.
   */
  broadcast(payload: object): number {
    let delivered = 0;
    for (const session of this.sessions.values()) {
      if (session.push(payload)) delivered++;
    }
    this.logger.debug({ delivered, connections: this.sessions.size }, 'Broadcast sent');
    return delivered;
  }

  /**
   * Close every session and forget them. Used at shutdown.
   */
  closeAll(code = 1001, reason = 'server shutting down'): number {
    const count = this.sessions.size;
    for (const session of this.sessions.values()) {
      session.close(code, reason);
    }
    this.sessions.clear();
    if (count > 0) {
      this.logger.info({ count, code }, 'Closed all sessions');
    }
    return count;
  }
}
