import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionSession, type ActionDispatcher } from '../../../src/gateway/session.js';
import type { ActionContext } from '../../../src/gateway/action-registry.js';
import {
  successOutcome,
  type ActionData,
  type ActionOutcome,
  type RequestId,
} from '../../../src/gateway/protocol.js';
import { getRequestContext, type RequestContext } from '../../../src/core/request-context.js';
import { createFakeTransport, createMockLogger, type FakeTransport } from '../../helpers/factories.js';

/**
 * Dispatcher whose calls stay pending until the test settles them.
 */
function createDeferredDispatcher(): ActionDispatcher & {
  settle: (requestId: RequestId, outcome?: ActionOutcome) => void;
  calls: { action: string; data: ActionData; context: ActionContext }[];
} {
  const waiting = new Map<RequestId, (outcome: ActionOutcome) => void>();
  const calls: { action: string; data: ActionData; context: ActionContext }[] = [];
  return {
    calls,
    dispatch: (action, data, context) => {
      calls.push({ action, data, context });
      return new Promise<ActionOutcome>((resolve) => {
        waiting.set(context.requestId, resolve);
      });
    },
    settle: (requestId, outcome = successOutcome('done', { id: requestId })) => {
      const resolve = waiting.get(requestId);
      if (!resolve) throw new Error(`no pending dispatch for ${String(requestId)}`);
      waiting.delete(requestId);
      resolve(outcome);
    },
  };
}

function frame(action: string, requestId: RequestId, data: ActionData = {}): string {
  return JSON.stringify({ action, data, request_id: requestId });
}

describe('ConnectionSession', () => {
  let transport: FakeTransport;
  let dispatcher: ReturnType<typeof createDeferredDispatcher>;
  let session: ConnectionSession;

  beforeEach(() => {
    transport = createFakeTransport();
    dispatcher = createDeferredDispatcher();
    session = new ConnectionSession({
      transport,
      dispatcher,
      logger: createMockLogger(),
      maxInFlight: 2,
      id: 'conn-1',
    });
  });

  it('ignores frames until opened', async () => {
    expect(session.getState()).toBe('connecting');
    await session.handleFrame(frame('read_file', 'r1'));
    expect(transport.sent).toEqual([]);
    expect(dispatcher.calls).toHaveLength(0);
  });

  describe('when open', () => {
    beforeEach(() => {
      session.open();
    });

    it('correlates responses by request_id, not completion order', async () => {
      const first = session.handleFrame(frame('read_file', 'r1'));
      const second = session.handleFrame(frame('read_file', 'r2'));
      expect(session.inFlightCount()).toBe(2);

      dispatcher.settle('r2');
      await second;
      dispatcher.settle('r1');
      await first;

      const responses = transport.responses();
      expect(responses.map((r) => r.request_id)).toEqual(['r2', 'r1']);
      expect(responses[0]).toEqual({
        success: true,
        message: 'done',
        data: { id: 'r2' },
        error: null,
        error_code: null,
        request_id: 'r2',
      });
      expect(session.inFlightCount()).toBe(0);
    });

    it('passes action, data and ids to the dispatcher', async () => {
      const pending = session.handleFrame(frame('write_file', 9, { file_path: 'a' }));
      dispatcher.settle(9);
      await pending;

      expect(dispatcher.calls[0]?.action).toBe('write_file');
      expect(dispatcher.calls[0]?.data).toEqual({ file_path: 'a' });
      expect(dispatcher.calls[0]?.context.requestId).toBe(9);
      expect(dispatcher.calls[0]?.context.connectionId).toBe('conn-1');
      expect(transport.responses()[0]?.request_id).toBe(9);
    });

    it('runs the dispatch inside a request context', async () => {
      let seen: RequestContext | undefined;
      const inspecting: ActionDispatcher = {
        dispatch: async () => {
          seen = getRequestContext();
          return successOutcome('ok', {});
        },
      };
      const other = new ConnectionSession({
        transport,
        dispatcher: inspecting,
        logger: createMockLogger(),
        maxInFlight: 4,
        id: 'conn-ctx',
      });
      other.open();

      await other.handleFrame(frame('read_file', 7));

      expect(seen).toEqual({ connectionId: 'conn-ctx', requestId: '7', action: 'read_file' });
    });

    it('rejects a request_id that is still in flight', async () => {
      const first = session.handleFrame(frame('read_file', 'r1'));
      await session.handleFrame(frame('read_file', 'r1'));

      expect(dispatcher.calls).toHaveLength(1);
      expect(transport.responses()[0]).toEqual({
        success: false,
        message: 'Duplicate request',
        data: null,
        error: 'request_id already in flight: r1',
        error_code: 'DUPLICATE_REQUEST',
        request_id: 'r1',
      });

      dispatcher.settle('r1');
      await first;
    });

    it('treats "1" and 1 as different request ids', async () => {
      const asString = session.handleFrame(frame('read_file', '1'));
      const asNumber = session.handleFrame(frame('read_file', 1));
      expect(dispatcher.calls).toHaveLength(2);

      dispatcher.settle('1');
      dispatcher.settle(1);
      await Promise.all([asString, asNumber]);
      expect(transport.responses().every((r) => r.success)).toBe(true);
    });

    it('allows a request_id to be reused once answered', async () => {
      const first = session.handleFrame(frame('read_file', 'r1'));
      dispatcher.settle('r1');
      await first;

      const again = session.handleFrame(frame('read_file', 'r1'));
      dispatcher.settle('r1');
      await again;

      expect(transport.responses().map((r) => r.success)).toEqual([true, true]);
    });

    it('refuses frames beyond the in-flight limit', async () => {
      const a = session.handleFrame(frame('read_file', 'a'));
      const b = session.handleFrame(frame('read_file', 'b'));
      await session.handleFrame(frame('read_file', 'c'));

      expect(transport.responses()[0]).toMatchObject({
        success: false,
        message: 'Too many requests',
        error: 'too many in-flight requests (limit 2)',
        error_code: 'TOO_MANY_REQUESTS',
        request_id: 'c',
      });

      dispatcher.settle('a');
      dispatcher.settle('b');
      await Promise.all([a, b]);
    });

    it('answers invalid JSON with a null request_id', async () => {
      await session.handleFrame('{not json');

      const response = transport.responses()[0];
      expect(response?.success).toBe(false);
      expect(response?.message).toBe('Invalid JSON');
      expect(response?.error).toMatch(/^invalid JSON: /);
      expect(response?.error_code).toBe('VALIDATION_ERROR');
      expect(response?.request_id).toBeNull();
    });

    it('rejects binary frames', async () => {
      await session.handleFrame(frame('read_file', 'r1'), true);

      expect(transport.responses()[0]).toMatchObject({
        message: 'Invalid request',
        error: 'binary frames are not supported',
        request_id: null,
      });
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('rejects frames without a request_id', async () => {
      await session.handleFrame(JSON.stringify({ action: 'read_file', data: {} }));

      expect(transport.responses()[0]).toMatchObject({
        success: false,
        message: 'Invalid request',
        error: 'missing required field: request_id',
        error_code: 'VALIDATION_ERROR',
        request_id: null,
      });
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('rejects numeric request ids beyond the safe integer range', async () => {
      const raw = '{"action":"read_file","data":{},"request_id":9007199254740993}';
      await session.handleFrame(raw);
      await session.handleFrame(raw.replace('9007199254740993', '9007199254740992'));

      const expected = {
        success: false,
        message: 'Invalid request',
        data: null,
        error: 'numeric request_id must be a safe integer',
        error_code: 'VALIDATION_ERROR',
        request_id: null,
      };
      expect(transport.responses()).toEqual([expected, expected]);
      expect(dispatcher.calls).toHaveLength(0);
      expect(session.inFlightCount()).toBe(0);
    });

    it('echoes the request_id of an otherwise invalid envelope', async () => {
      await session.handleFrame(JSON.stringify({ request_id: 'r9' }));

      expect(transport.responses()[0]).toMatchObject({
        error: 'missing required field: action',
        request_id: 'r9',
      });
    });

    it('drops responses that complete after close', async () => {
      const pending = session.handleFrame(frame('read_file', 'r1'));

      session.close();
      expect(session.getState()).toBe('closing');
      expect(transport.closed).toEqual({ code: 1000, reason: 'closing' });

      dispatcher.settle('r1');
      await pending;

      expect(transport.sent).toEqual([]);
      expect(session.getState()).toBe('closed');
    });

    it('closes immediately when nothing is in flight', () => {
      session.close(1001, 'server shutting down');
      expect(session.getState()).toBe('closed');
      expect(transport.closed).toEqual({ code: 1001, reason: 'server shutting down' });
    });

    it('drops responses after the transport is lost', async () => {
      const pending = session.handleFrame(frame('read_file', 'r1'));
      session.markClosed();

      dispatcher.settle('r1');
      await pending;

      expect(transport.sent).toEqual([]);
      expect(session.getState()).toBe('closed');
    });

    it('marks the session closed when a send fails', async () => {
      const failing = createFakeTransport();
      failing.send = vi.fn(() => {
        throw new Error('socket gone');
      });
      const fragile = new ConnectionSession({
        transport: failing,
        dispatcher,
        logger: createMockLogger(),
        maxInFlight: 2,
      });
      fragile.open();

      const pending = fragile.handleFrame(frame('read_file', 'x'));
      dispatcher.settle('x');
      await pending;

      expect(fragile.getState()).toBe('closed');
    });

    it('pushes server-initiated frames only while open', () => {
      expect(session.push({ event: 'notice' })).toBe(true);
      expect(transport.sent).toEqual(['{"event":"notice"}']);

      session.close();
      expect(session.push({ event: 'late' })).toBe(false);
      expect(transport.sent).toHaveLength(1);
    });
  });
});
