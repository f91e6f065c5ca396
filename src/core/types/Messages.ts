/**
 * Request envelope sent to a responder
 */
export interface RequestEnvelope<T = unknown> {
  id: string;
  timestamp: number;
  data: T;
  metadata?: Record<string, unknown>;
}

/**
 * Response envelope sent back on the reply-to queue
 */
export interface ResponseEnvelope<T = unknown> {
  id: string;
  timestamp: number;
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Serializer interface for message serialization
 */
export interface Serializer {
  encode(data: unknown): Buffer;
  decode(buffer: Buffer): unknown;
}

/**
 * JSON serializer implementation
 */
export class JsonSerializer implements Serializer {
  encode(data: unknown): Buffer {
    return Buffer.from(JSON.stringify(data));
  }

  decode(buffer: Buffer): unknown {
    return JSON.parse(buffer.toString());
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Type guard for decoded request envelopes
 */
export const isRequestEnvelope = (value: unknown): value is RequestEnvelope => {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.timestamp === 'number' &&
    'data' in value &&
    (value.metadata === undefined || isRecord(value.metadata))
  );
};

/**
 * Type guard for decoded response envelopes
 */
export const isResponseEnvelope = (value: unknown): value is ResponseEnvelope => {
  if (!isRecord(value) || typeof value.id !== 'string' || typeof value.success !== 'boolean') {
    return false;
  }
  const error = value.error;
  if (error === undefined) return true;
  return isRecord(error) && typeof error.code === 'string' && typeof error.message === 'string';
};
