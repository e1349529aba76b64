import http from 'node:http';
import https from 'node:https';
import nodeFetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { TransportHttpError, TransportTimeoutError, TransportUnreachableError } from '../errors/errors';
import { tryParseJson } from '../guards';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/** Parsed reply of a successful request. */
export interface TransportResponse {
  status: number;
  body: unknown;
}

/**
 * JSON-over-HTTP contract the providers depend on.
 *
 * Failures surface as TransportTimeoutError, TransportUnreachableError or
 * TransportHttpError so the orchestrator can tell them apart.
 */
export interface Transport {
  get(url: string, timeoutSeconds: number): Promise<TransportResponse>;
  post(
    url: string,
    body: unknown,
    timeoutSeconds: number,
    headers?: Readonly<Record<string, string>>
  ): Promise<TransportResponse>;
  /** Releases the pooled connection. */
  close(): void;
}

/**
 * Creates a keep-alive agent for the scheme of the given base URL.
 * @param baseUrl Backend base URL.
 */
export function createKeepAliveAgent(baseUrl: string): http.Agent {
  return baseUrl.startsWith('https:')
    ? new https.Agent({ keepAlive: true })
    : new http.Agent({ keepAlive: true });
}

/**
 * Minimal JSON client over node-fetch.
 *
 * Responsibilities:
 * - Reuse one keep-alive connection pool per instance (sequential use; not meant
 *   for overlapping calls from the same owner)
 * - Apply the per-call timeout
 * - Translate low-level failures into the transport error classes
 */
export class HttpTransport implements Transport {
  private readonly agent: http.Agent;

  /**
   * @param baseUrl Backend base URL; picks the http or https agent.
   * @param fetchFn Fetch implementation (swapped for a stub in tests).
   */
  constructor(baseUrl: string, private readonly fetchFn: FetchFn = nodeFetch) {
    this.agent = createKeepAliveAgent(baseUrl);
  }

  /** Performs a JSON GET and parses the response body. */
  async get(url: string, timeoutSeconds: number): Promise<TransportResponse> {
    return this.request(url, { method: 'GET' }, timeoutSeconds);
  }

  /** Performs a JSON POST and parses the response body. */
  async post(
    url: string,
    body: unknown,
    timeoutSeconds: number,
    headers: Readonly<Record<string, string>> = {}
  ): Promise<TransportResponse> {
    return this.request(
      url,
      {
        method: 'POST',
        body: JSON.stringify(body),
        headers: { ...headers, 'Content-Type': 'application/json' },
      },
      timeoutSeconds
    );
  }

  /** Destroys pooled sockets. The instance must not be used afterwards. */
  close(): void {
    this.agent.destroy();
  }

  /**
   * Low-level request method used by all verbs.
   *
   * Notes:
   * - node-fetch's `timeout` covers both the response headers and the body.
   * - A non-JSON success body is returned as its raw text.
   */
  private async request(url: string, init: RequestInit, timeoutSeconds: number): Promise<TransportResponse> {
    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        ...init,
        agent: this.agent,
        timeout: Math.round(timeoutSeconds * 1000),
      });
      text = await response.text();
    } catch (error) {
      throw this.translateFetchError(url, timeoutSeconds, error);
    }

    // Non-2xx keeps the raw body for diagnostics.
    if (!response.ok) {
      throw new TransportHttpError(url, response.status, text);
    }

    const parsed = tryParseJson(text);
    return { status: response.status, body: parsed === undefined ? text : parsed };
  }

  /** Maps node-fetch failures onto the transport taxonomy; anything else passes through. */
  private translateFetchError(url: string, timeoutSeconds: number, error: unknown): unknown {
    if (!(error instanceof FetchError)) return error;
    if (error.type === 'request-timeout' || error.type === 'body-timeout') {
      return new TransportTimeoutError(url, timeoutSeconds, { cause: error });
    }
    if (error.type === 'system') {
      return new TransportUnreachableError(url, error.code ?? error.message, { cause: error });
    }
    return error;
  }
}
