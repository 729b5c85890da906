/**
 * Fetch-based HTTP Transport
 *
 * Performs one request against the upstream progress service and classifies
 * the result for the retry layer. It never retries on its own and never
 * throws for HTTP or network failures; the only exception that escapes is a
 * cancellation by the caller's signal.
 *
 * Classification:
 * - 2xx                      → success (JSON body, or null when empty)
 * - 408, 429, 5xx            → retryable
 * - network error, timeout   → retryable
 * - other statuses           → non_retryable
 */

import { RetryAbortedError } from '../core/retry';
import type { HttpTransport, TransportOutcome, TransportRequest } from './types';

export interface FetchTransportOptions {
  /** Base URL without trailing slash, e.g. 'https://progress.internal' */
  baseUrl: string;
  /** Sent as X-API-Key when present */
  apiKey?: string;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Replaces the global fetch (tests) */
  fetchFn?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 30000;

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429]);

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_STATUSES.has(status);
}

export class FetchHttpTransport implements HttpTransport {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async send(request: TransportRequest): Promise<TransportOutcome> {
    if (request.signal?.aborted) {
      throw new RetryAbortedError('Upstream request cancelled');
    }

    // One controller carries both the timeout and the caller's cancellation.
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.apiKey) {
      headers['X-API-Key'] = this.apiKey;
    }
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await this.fetchFn(`${this.baseUrl}${request.path}`, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (response.ok) {
        const text = await response.text();
        return { kind: 'success', status: response.status, body: text.length > 0 ? parseJson(text) : null };
      }

      const reason = `${request.method} ${request.path} failed: ${response.statusText || 'HTTP error'}`;
      return isRetryableStatus(response.status)
        ? { kind: 'retryable', status: response.status, reason }
        : { kind: 'non_retryable', status: response.status, reason };
    } catch (error) {
      if (request.signal?.aborted) {
        throw new RetryAbortedError('Upstream request cancelled');
      }
      if (timedOut) {
        return {
          kind: 'retryable',
          status: null,
          reason: `${request.method} ${request.path} timed out after ${this.timeoutMs}ms`,
        };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { kind: 'retryable', status: null, reason: `${request.method} ${request.path} network error: ${message}` };
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

/**
 * Parses a 2xx body. Non-JSON text is returned as is and left to the
 * caller's schema validation.
 */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
