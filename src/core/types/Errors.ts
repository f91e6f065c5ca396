/**
 * Base error class for all Warren errors
 */
export class WarrenError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Connection-related errors
 */
export class ConnectionError extends WarrenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', details);
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends WarrenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', details);
  }
}

/**
 * Channel-related errors
 */
export class ChannelError extends WarrenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CHANNEL_ERROR', details);
  }
}

/**
 * Validation errors
 */
export class ValidationError extends WarrenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/**
 * Failure reported by a responder in an error response.
 *
 * `remoteCode` holds the code the responder put in the envelope.
 */
export class RemoteError extends WarrenError {
  constructor(
    message: string,
    public readonly remoteCode: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'REMOTE_ERROR', details);
  }
}

/**
 * Read a code off an arbitrary thrown value, falling back to its name
 */
export function errorCodeOf(error: unknown): string {
  if (error instanceof WarrenError) return error.code;
  if (error instanceof Error && error.name) return error.name;
  return 'HANDLER_ERROR';
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
