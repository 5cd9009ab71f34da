export type ErrorCode =
  | 'REMOTE_ERROR'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'PARSE_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CONFIG_ERROR'
  | 'LIFECYCLE_ERROR'
  | 'USAGE_ERROR';

export class ColdpipeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Non-success answer from the storage API. `statusCode` is absent when the
 * request never got a response.
 */
export class RemoteError extends ColdpipeError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super('REMOTE_ERROR', message, options);
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends ColdpipeError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class TimeoutError extends ColdpipeError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('TIMEOUT', message);
    this.timeoutMs = timeoutMs;
  }
}

export class ParseError extends ColdpipeError {
  constructor(message: string) {
    super('PARSE_ERROR', message);
  }
}

export class TransportError extends ColdpipeError {
  constructor(message: string, options?: ErrorOptions) {
    super('TRANSPORT_ERROR', message, options);
  }
}

export class ConfigError extends ColdpipeError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_ERROR', message, options);
  }
}

export class LifecycleError extends ColdpipeError {
  constructor(message: string) {
    super('LIFECYCLE_ERROR', message);
  }
}

export class UsageError extends ColdpipeError {
  constructor(message: string) {
    super('USAGE_ERROR', message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
