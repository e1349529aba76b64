/**
 * Required configuration is missing or empty. Not retryable: the process cannot start.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The backend did not answer within the configured timeout. */
export class TransportTimeoutError extends Error {
  constructor(public readonly url: string, public readonly timeoutSeconds: number, options?: { cause?: unknown }) {
    super(`Request to ${url} timed out after ${timeoutSeconds} seconds`, options);
    this.name = 'TransportTimeoutError';
  }
}

/** The backend could not be reached at all (refused, DNS, reset). */
export class TransportUnreachableError extends Error {
  constructor(public readonly url: string, detail: string, options?: { cause?: unknown }) {
    super(`Cannot connect to ${url}: ${detail}`, options);
    this.name = 'TransportUnreachableError';
  }
}

/** The backend answered with a non-2xx status. Carries the raw body for diagnostics. */
export class TransportHttpError extends Error {
  constructor(public readonly url: string, public readonly status: number, public readonly body: string) {
    super(`Request to ${url} failed with status ${status}`);
    this.name = 'TransportHttpError';
  }
}

/**
 * Failure conditions the orchestrator knows how to explain.
 */
export type FailureCondition =
  | { kind: 'timeout' }
  | { kind: 'unreachable' }
  | { kind: 'http'; status: number; body: string }
  | { kind: 'unexpected'; typeName: string; message: string };

/**
 * Maps anything thrown during a review onto the failure taxonomy.
 * @param error The thrown value.
 * @returns The matching failure condition.
 */
export function describeFailure(error: unknown): FailureCondition {
  if (error instanceof TransportTimeoutError) return { kind: 'timeout' };
  if (error instanceof TransportUnreachableError) return { kind: 'unreachable' };
  if (error instanceof TransportHttpError) return { kind: 'http', status: error.status, body: error.body };
  if (error instanceof Error) {
    return { kind: 'unexpected', typeName: error.name || error.constructor.name, message: error.message };
  }
  return { kind: 'unexpected', typeName: typeof error, message: String(error) };
}
