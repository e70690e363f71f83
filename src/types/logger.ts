/**
 * Logger interface used across the gateway.
 *
 * Shaped after pino's call signatures so the real pino instance can be passed
 * anywhere a Logger is expected, and tests can pass a plain mock.
 */
export interface Logger {
  trace(obj: object, msg?: string): void;
  trace(msg: string): void;
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Derive a logger that stamps `bindings` on every entry */
  child(bindings: Record<string, unknown>): Logger;
}
