/**
 * Gateway wire protocol.
 *
 * Transport: WebSocket text frames, one JSON envelope per frame.
 * Requests carry a client-chosen `request_id` that the response echoes
 * verbatim; clients must correlate by it, never by arrival order.
 */

import { z } from 'zod';
import { GatewayError, ValidationError, type GatewayErrorCode } from './errors.js';

/**
 * The closed set of actions. Adding one here forces a handler definition
 * in the registry at compile time.
 */
export const ACTION_NAMES = [
  'read_file',
  'write_file',
  'list_directory',
  'search_text',
  'replace_text',
  'execute_command',
  'analyze_code',
  'generate_code',
  'generate_tests',
  'refactor_code',
  'plan_task',
  'create_mock',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

const ACTION_SET = new Set<string>(ACTION_NAMES);

export function isActionName(name: string): name is ActionName {
  return ACTION_SET.has(name);
}

export type RequestId = string | number;

export type ActionData = Record<string, unknown>;

/**
 * Map key for a request id that keeps `"1"` and `1` apart.
 */
export function requestKey(requestId: RequestId): string {
  return `${typeof requestId}:${String(requestId)}`;
}

export interface RequestEnvelope {
  action: string;
  data: ActionData;
  request_id: RequestId;
}

export interface SuccessEnvelope {
  success: true;
  message: string;
  data: ActionData;
  error: null;
  error_code: null;
  request_id: RequestId | null;
}

export interface FailureEnvelope {
  success: false;
  message: string;
  data: null;
  error: string;
  error_code: GatewayErrorCode;
  request_id: RequestId | null;
}

export type ResponseEnvelope = SuccessEnvelope | FailureEnvelope;

/**
 * Outcome of a dispatch before it is addressed to a request.
 */
export type ActionOutcome = Omit<SuccessEnvelope, 'request_id'> | Omit<FailureEnvelope, 'request_id'>;

const requestEnvelopeSchema = z.object({
  action: z.string({ required_error: 'missing required field: action' }).min(1, 'action must not be empty'),
  data: z
    .record(z.unknown(), { invalid_type_error: 'data must be an object' })
    .optional()
    .default({}),
  request_id: z.union([z.string().min(1, 'request_id must not be empty'), z.number()], {
    errorMap: (issue, ctx) =>
      issue.code === 'invalid_union' && ctx.data === undefined
        ? { message: 'missing required field: request_id' }
        : { message: 'request_id must be a string or number' },
  }),
});

/**
 * Pull a usable request_id out of a frame that failed validation, so the error
 * response can still be correlated when possible.
 */
export function peekRequestId(value: unknown): RequestId | null {
  if (typeof value !== 'object' || value === null) return null;
  const id = (value as Record<string, unknown>)['request_id'];
  if (typeof id === 'string') return id;
  return typeof id === 'number' && Number.isSafeInteger(id) ? id : null;
}

/**
 * Validate a decoded frame as a request envelope.
 *
 * @throws ValidationError naming the first problem found
 */
export function parseRequestEnvelope(value: unknown): RequestEnvelope {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError('request must be a JSON object');
  }
  const result = requestEnvelopeSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'invalid request envelope');
  }
  // Ids beyond 2^53 lose digits in JSON.parse and could not be echoed verbatim
  const { request_id: requestId } = result.data;
  if (typeof requestId === 'number' && !Number.isSafeInteger(requestId)) {
    throw new ValidationError('numeric request_id must be a safe integer');
  }
  return result.data;
}

export function successOutcome(message: string, data: ActionData): ActionOutcome {
  return { success: true, message, data, error: null, error_code: null };
}

export function failureOutcome(message: string, error: GatewayError): ActionOutcome {
  return { success: false, message, data: null, error: error.message, error_code: error.code };
}

export function addressOutcome(outcome: ActionOutcome, requestId: RequestId | null): ResponseEnvelope {
  return outcome.success
    ? { ...outcome, request_id: requestId }
    : { ...outcome, request_id: requestId };
}

/**
 * Failure envelope for frames rejected before dispatch.
 */
export function rejectionEnvelope(
  message: string,
  error: GatewayError,
  requestId: RequestId | null
): FailureEnvelope {
  return {
    success: false,
    message,
    data: null,
    error: error.message,
    error_code: error.code,
    request_id: requestId,
  };
}

const responseEnvelopeSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  data: z.record(z.unknown()).nullable(),
  error: z.string().nullable(),
  error_code: z.string().nullable(),
  request_id: z.union([z.string(), z.number()]).nullable(),
});

export type DecodedResponse = z.infer<typeof responseEnvelopeSchema>;

/**
 * Validate a frame received by a client.
 *
 * @throws ValidationError when the frame is not a response envelope
 */
export function parseResponseEnvelope(value: unknown): DecodedResponse {
  const result = responseEnvelopeSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `malformed response: ${result.error.issues[0]?.message ?? 'unknown shape'}`
    );
  }
  return result.data;
}

export function isFailure(envelope: ResponseEnvelope): envelope is FailureEnvelope {
  return !envelope.success;
}
