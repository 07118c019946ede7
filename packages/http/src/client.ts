import { getLogger, type Logger } from '@kuda-client/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import { sanitizeEndpoint } from './instrumentation.js';
import type { HttpClientConfig, HttpRequestOptions, HttpResponse } from './types.js';
import { HttpNetworkError, HttpTimeoutError, ResponseParseError, TransportError } from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * JSON-over-HTTP transport. One attempt per call, no retries: a caller that wants
 * to retry decides so from the returned status or error.
 */
export class HttpClient {
  private readonly config: HttpClientConfig & { timeout: number };
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        ...config.defaultHeaders,
      },
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => this.logger.log(level, message, metadata),
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(`HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.config.timeout}ms`);
  }

  /**
   * POST one JSON body and parse the JSON reply. Objects are serialized and sent with
   * `Content-Type: application/json`.
   *
   * Resolves `ok` for every response that arrived with a parseable (or empty) body,
   * including 4xx and 5xx. Resolves `err` only when nothing usable came back.
   */
  async post(
    endpoint: string,
    body: string | object,
    options: HttpRequestOptions = {}
  ): Promise<Result<HttpResponse, TransportError>> {
    const method = 'POST';
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const safeUrl = HttpUtils.sanitizeUrl(url);
    const timeout = options.timeout ?? this.config.timeout;
    const hooks = this.config.hooks;
    const sanitizedEndpoint = sanitizeEndpoint(endpoint || '/');

    const startTime = this.effects.now();
    hooks?.onRequestStart?.({ endpoint: sanitizedEndpoint, method, timestamp: startTime });

    const headers: Record<string, string> = {
      ...this.config.defaultHeaders,
      ...options.headers,
    };

    let payload: string;
    if (typeof body === 'string') {
      payload = body;
    } else {
      payload = JSON.stringify(body);
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    let status: number | undefined;

    try {
      this.effects.log('debug', `Making HTTP request - URL: ${safeUrl}, Method: ${method}`);

      const response = await this.effects.fetch(url, {
        body: payload,
        headers,
        method,
        signal: controller.signal,
      });
      status = response.status;

      const text = await response.text();
      const responseHeaders = HttpUtils.headersToRecord(response.headers);

      let parsed: unknown;
      if (!HttpUtils.isEmptyBody(response.status, response.headers.get('content-length'), text)) {
        try {
          parsed = JSON.parse(text);
        } catch (parseError) {
          const truncated = HttpUtils.truncateBody(text);
          const reason = parseError instanceof Error ? parseError.message : String(parseError);
          throw new ResponseParseError(
            `Response body is not valid JSON (HTTP ${response.status}): ${reason}`,
            safeUrl,
            response.status,
            truncated
          );
        }
      }

      this.effects.log('debug', `HTTP response received - URL: ${safeUrl}, Status: ${response.status}`);
      hooks?.onRequestSuccess?.({
        endpoint: sanitizedEndpoint,
        method,
        status: response.status,
        durationMs: this.effects.now() - startTime,
      });
      this.recordMetric(sanitizedEndpoint, method, response.status, startTime);

      return ok({ status: response.status, ok: response.ok, headers: responseHeaders, body: parsed });
    } catch (error) {
      const transportError = this.toTransportError(error, safeUrl, timeout);

      this.effects.log('warn', `Request failed - URL: ${safeUrl}, Error: ${transportError.message}`, {
        method,
        providerName: this.config.providerName,
      });
      hooks?.onRequestFailure?.({
        endpoint: sanitizedEndpoint,
        method,
        status,
        error: transportError.message,
        durationMs: this.effects.now() - startTime,
      });
      this.recordMetric(sanitizedEndpoint, method, status ?? 0, startTime, transportError.name);

      return err(transportError);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Cleanup resources.
   * Closes the undici agent so keep-alive sockets do not hold the process open.
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private toTransportError(error: unknown, url: string, timeout: number): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return new HttpTimeoutError(url, timeout);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new HttpNetworkError(`Network error: ${message}`, url, error);
  }

  private recordMetric(endpoint: string, method: string, status: number, startTime: number, error?: string): void {
    if (!this.config.instrumentation) {
      return;
    }

    this.config.instrumentation.record({
      durationMs: this.effects.now() - startTime,
      endpoint,
      error,
      method,
      provider: this.config.providerName,
      service: this.config.service ?? 'http',
      status,
      timestamp: this.effects.now(),
    });
  }
}
