/**
 * Engine Error Classes
 *
 * Call-level errors are raised at the extraction service boundary and turned
 * into ExtractionResult statuses by the call adapter; they never cross the
 * orchestrator. ConfigurationError is the only one thrown to callers.
 */

export type EngineErrorCategory =
  | 'CONFIGURATION'
  | 'CALL_TIMEOUT'
  | 'CALL_SERVICE_ERROR'
  | 'CALL_MALFORMED_RESPONSE';

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly category: EngineErrorCategory
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export class ConfigurationError extends EngineError {
  constructor(
    message: string,
    public readonly setting?: string
  ) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class CallTimeoutError extends EngineError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, 'CALL_TIMEOUT');
    this.name = 'CallTimeoutError';
  }
}

export class CallServiceError extends EngineError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly statusCode?: number
  ) {
    super(message, 'CALL_SERVICE_ERROR');
    this.name = 'CallServiceError';
  }
}

export class MalformedResponseError extends EngineError {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message, 'CALL_MALFORMED_RESPONSE');
    this.name = 'MalformedResponseError';
  }
}

/**
 * Whether an error from an unknown service implementation looks transient:
 * HTTP 429/5xx, rate limiting, network resets, overloaded upstreams.
 */
export function isTransientServiceError(error: unknown): boolean {
  if (error instanceof CallServiceError) {
    return error.retryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const cause: unknown = error.cause;
  const causeMsg = cause instanceof Error ? cause.message : '';
  const causeCode =
    typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
      ? cause.code
      : '';
  const combined = `${error.message} ${causeMsg} ${causeCode}`;

  if (/\b(429|500|502|503|504)\b/.test(combined)) {
    return true;
  }
  if (/rate.?limit/i.test(combined)) {
    return true;
  }
  if (/ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed/i.test(combined)) {
    return true;
  }
  return /server.?(error|overloaded|unavailable)|service.?unavailable|internal.?server/i.test(combined);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
