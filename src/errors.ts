/**
 * Error taxonomy. Every error carries a string `code` so HTTP handlers and
 * the run loop can branch on it without string-matching messages.
 */

export type DeviceErrorCode = 'STREAM_CLOSED' | 'DEVICE_IO' | 'DEVICE_OPEN';

export class DeviceError extends Error {
  readonly code: DeviceErrorCode;

  constructor(code: DeviceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceError';
    this.code = code;
  }
}

export class RecognitionError extends Error {
  readonly code = 'RECOGNITION_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecognitionError';
  }
}

export class SinkError extends Error {
  readonly code = 'SINK_FAILED';
  /** Last.fm API error number, when the service returned one. */
  readonly apiCode: number | null;

  constructor(message: string, apiCode: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkError';
    this.apiCode = apiCode;
  }
}

export class TimeoutError extends Error {
  readonly code = 'TIMEOUT';

  constructor(what: string, timeoutMs: number) {
    super(`${what} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class FatalSessionError extends Error {
  readonly code = 'SESSION_FATAL';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalSessionError';
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
