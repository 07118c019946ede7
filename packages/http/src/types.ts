import type { InstrumentationCollector } from './instrumentation.js';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  hooks?: HttpClientHooks | undefined;
  providerName: string;
  /** Label recorded on instrumentation metrics, e.g. `banking`. */
  service?: string | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  headers?: Record<string, string> | undefined;
  timeout?: number | undefined;
}

/**
 * A response that arrived and whose body parsed.
 * Non-2xx statuses are returned here too; deciding what they mean is the caller's job.
 */
export interface HttpResponse {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  /** Parsed JSON body, or `undefined` for 204 and empty bodies. */
  body: unknown;
}

export interface HttpClientHooks {
  /** Called once before the request is sent. Paired with exactly one terminal event. */
  onRequestStart?: (event: { endpoint: string; method: string; timestamp: number }) => void;

  /** Called when a response was received and parsed, whatever its status. */
  onRequestSuccess?: (event: { durationMs: number; endpoint: string; method: string; status: number }) => void;

  /** Called when no usable response was obtained (timeout, connection error, unparseable body). */
  onRequestFailure?: (event: {
    durationMs: number;
    endpoint: string;
    error: string;
    method: string;
    status?: number | undefined;
  }) => void;
}

/**
 * Base class for failures below the HTTP status line: nothing usable came back.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly url: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class HttpTimeoutError extends TransportError {
  constructor(
    url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms`, url);
    this.name = 'HttpTimeoutError';
  }
}

export class HttpNetworkError extends TransportError {
  constructor(
    message: string,
    url: string,
    public readonly originalError?: unknown
  ) {
    super(message, url);
    this.name = 'HttpNetworkError';
  }
}

export class ResponseParseError extends TransportError {
  constructor(
    message: string,
    url: string,
    public readonly status: number,
    public readonly truncatedBody: string
  ) {
    super(message, url);
    this.name = 'ResponseParseError';
  }
}
