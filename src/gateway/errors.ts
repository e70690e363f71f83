/**
 * Gateway Error Types
 *
 * Every failure a handler can report maps onto one of these classes. The
 * registry turns them into response envelopes; the `message` of each is safe
 * to show to a client, so internal details go to the log instead.
 */

/**
 * Stable machine-readable error classes, carried as `error_code` on the wire.
 */
export type GatewayErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_ACTION'
  | 'DUPLICATE_REQUEST'
  | 'TOO_MANY_REQUESTS'
  | 'IS_A_DIRECTORY'
  | 'NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'PERMISSION_DENIED'
  | 'DECODE_ERROR'
  | 'DISK_ERROR'
  | 'EXECUTION_ERROR'
  | 'TIMEOUT'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base gateway error class.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: GatewayErrorCode
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * Malformed envelope or handler input. Raised before any handler side effect.
 */
export class ValidationError extends GatewayError {
  constructor(message: string, code: GatewayErrorCode = 'VALIDATION_ERROR') {
    super(message, code);
    this.name = 'ValidationError';
  }
}

export class UnknownActionError extends ValidationError {
  constructor(public readonly action: string) {
    super(`unknown action: ${action}`, 'UNKNOWN_ACTION');
    this.name = 'UnknownActionError';
  }
}

/**
 * A frame reused a request_id that is still being served on the same connection.
 */
export class DuplicateRequestError extends ValidationError {
  constructor(public readonly requestId: string | number) {
    super(`request_id already in flight: ${String(requestId)}`, 'DUPLICATE_REQUEST');
    this.name = 'DuplicateRequestError';
  }
}

export class TooManyRequestsError extends ValidationError {
  constructor(public readonly limit: number) {
    super(`too many in-flight requests (limit ${String(limit)})`, 'TOO_MANY_REQUESTS');
    this.name = 'TooManyRequestsError';
  }
}

export class IsADirectoryError extends ValidationError {
  constructor(public readonly path: string) {
    super(`path is a directory: ${path}`, 'IS_A_DIRECTORY');
    this.name = 'IsADirectoryError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(
    public readonly path: string,
    what = 'file'
  ) {
    super(`${what} not found: ${path}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class NotADirectoryError extends GatewayError {
  constructor(public readonly path: string) {
    super(`not a directory: ${path}`, 'NOT_A_DIRECTORY');
    this.name = 'NotADirectoryError';
  }
}

export class PermissionDeniedError extends GatewayError {
  constructor(public readonly path: string) {
    super(`permission denied: ${path}`, 'PERMISSION_DENIED');
    this.name = 'PermissionDeniedError';
  }
}

/**
 * File bytes are not valid under the requested encoding.
 */
export class DecodeError extends GatewayError {
  constructor(
    public readonly path: string,
    public readonly encoding: string
  ) {
    super(`cannot decode ${path} as ${encoding}`, 'DECODE_ERROR');
    this.name = 'DecodeError';
  }
}

export class DiskError extends GatewayError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`disk error writing ${path}: ${reason}`, 'DISK_ERROR');
    this.name = 'DiskError';
  }
}

/**
 * The process could not be started at all. A non-zero exit is not an error.
 */
export class ExecutionError extends GatewayError {
  constructor(message: string) {
    super(message, 'EXECUTION_ERROR');
    this.name = 'ExecutionError';
  }
}

export class TimeoutError extends GatewayError {
  constructor(
    what: string,
    public readonly timeoutMs: number
  ) {
    super(`${what} timed out after ${String(timeoutMs)}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * The AI collaborator failed: missing credentials, upstream error or bad output.
 */
export class ExternalServiceError extends GatewayError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message, 'EXTERNAL_SERVICE_ERROR');
    this.name = 'ExternalServiceError';
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const code = (error as NodeJS.ErrnoException).code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Translate a Node filesystem error into the gateway taxonomy.
 *
 * Errors that are already GatewayErrors pass through unchanged. Unrecognized
 * errno codes during a write become DiskError; during a read they are rethrown
 * as-is and end up as INTERNAL_ERROR at the registry boundary.
 */
export function fromFsError(
  error: unknown,
  path: string,
  operation: 'read' | 'write' | 'list' = 'read'
): Error {
  if (error instanceof GatewayError) return error;

  const code = errnoCode(error);
  switch (code) {
    case 'ENOENT':
      return new NotFoundError(path, operation === 'list' ? 'directory' : 'file');
    case 'ENOTDIR':
      return new NotADirectoryError(path);
    case 'EISDIR':
      return new IsADirectoryError(path);
    case 'EACCES':
    case 'EPERM':
      return new PermissionDeniedError(path);
    case 'ENOSPC':
    case 'EDQUOT':
    case 'EROFS':
    case 'EIO':
    case 'EMFILE':
    case 'ENFILE':
      return new DiskError(path, code);
    default:
      if (operation === 'write') {
        return new DiskError(path, code ?? (error instanceof Error ? error.message : String(error)));
      }
      return error instanceof Error ? error : new Error(String(error));
  }
}
