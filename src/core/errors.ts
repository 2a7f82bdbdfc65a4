/**
 * Mind Error Types
 *
 * Typed error classes for decoding, persistence and networking.
 * None of these is fatal to the process; callers log and carry on.
 */

/**
 * Error codes for classification.
 */
export type MindErrorCode =
  | 'DECODE_FAILED'
  | 'PERSISTENCE_WRITE_FAILED'
  | 'PERSISTENCE_READ_FAILED'
  | 'NETWORK_BIND_FAILED'
  | 'TIMEOUT'
  | 'RETRY_EXHAUSTED'
  | 'SERVICE_STOPPED';

/**
 * Base error class.
 */
export class MindError extends Error {
  constructor(
    message: string,
    public readonly code: MindErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MindError';
  }
}

/**
 * Malformed envelope or payload.
 * The message is dropped; the connection stays open.
 */
export class DecodeError extends MindError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DECODE_FAILED', options);
    this.name = 'DecodeError';
  }
}

/**
 * Snapshot could not be written.
 * The previous snapshot on disk stays authoritative.
 */
export class PersistenceWriteError extends MindError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERSISTENCE_WRITE_FAILED', options);
    this.name = 'PersistenceWriteError';
  }
}

/**
 * Snapshot could not be read or failed validation.
 * Treated as a fresh start.
 */
export class PersistenceReadError extends MindError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERSISTENCE_READ_FAILED', options);
    this.name = 'PersistenceReadError';
  }
}

/**
 * Listener could not bind its port.
 * Networking is disabled for this instance; cognition continues.
 */
export class NetworkBindError extends MindError {
  constructor(
    public readonly port: number,
    options?: { cause?: unknown }
  ) {
    super(`Could not listen on port ${String(port)}`, 'NETWORK_BIND_FAILED', options);
    this.name = 'NetworkBindError';
  }
}

/**
 * Timeout error thrown when operation exceeds timeout.
 */
export class TimeoutError extends MindError {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${String(timeoutMs)}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * Every attempt of a retried operation failed.
 */
export class RetryExhaustedError extends MindError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `Gave up after ${String(attempts)} attempts: ${errorMessage(lastError)}`,
      'RETRY_EXHAUSTED',
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Work was refused because the owning service is shutting down.
 */
export class ServiceStoppedError extends MindError {
  constructor(service: string) {
    super(`${service} is stopped`, 'SERVICE_STOPPED');
    this.name = 'ServiceStoppedError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
