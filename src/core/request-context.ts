/**
 * Request Context
 *
 * AsyncLocalStorage-scoped identity of the request being served. The session
 * opens a context around each dispatch so that every log line emitted by the
 * handler (and anything it awaits) carries the connection and request ids.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContext {
  /** Connection the frame arrived on */
  connectionId: string;
  /** Client-supplied correlation id, stringified for logging */
  requestId: string;
  /** Action being dispatched */
  action?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Run `fn` with `context` visible to all of its async descendants.
 */
export function withRequestContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * Current request context, or undefined outside of any dispatch.
 */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

const CONTEXT_KEYS = ['connectionId', 'requestId', 'action'] as const;

/**
 * Fields of the active context for a pino mixin. Empty outside a request.
 */
export function requestContextFields(): Record<string, string> {
  const ctx = storage.getStore();
  if (!ctx) return {};

  const fields: Record<string, string> = {};
  for (const key of CONTEXT_KEYS) {
    const value = ctx[key];
    if (value) {
      fields[key] = value;
    }
  }
  return fields;
}
