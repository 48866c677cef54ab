/**
 * HTTP transport for the WorkOS API
 *
 * Signs every request with the API key, retries on 429, converts non-2xx
 * responses into ApiRequestError and decodes JSON bodies. Knows nothing about
 * specific resources.
 */

import type { HttpMethod, QueryParams, RequestOptions, RetryConfig, WorkOSClientConfig } from './types.js';
import { parseApiError } from './errors.js';
import { DEFAULT_RETRY_CONFIG, RATE_LIMIT_STATUS, calculateDelay, sleep } from './retry.js';
import { logger as defaultLogger } from './logger.js';
import { VERSION } from '../version.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_BASE_URL = 'https://api.workos.com';
export const DEFAULT_TIMEOUT_MS = 30000;
export const USER_AGENT = `workos-sync/${VERSION}`;

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a single transport call
 */
export interface SendOptions extends RequestOptions {
  params?: QueryParams;
}

/**
 * Shared transport handle, read-only after construction
 */
export interface Transport {
  readonly baseUrl: string;
  readonly clientId?: string;

  /** Issue a request and return the raw response after the 429 retry loop */
  send(method: HttpMethod, path: string, body?: unknown, options?: SendOptions): Promise<Response>;

  get<T>(path: string, options?: SendOptions): Promise<T>;
  post<T>(path: string, body?: unknown, options?: SendOptions): Promise<T>;
  put<T>(path: string, body?: unknown, options?: SendOptions): Promise<T>;
  patch<T>(path: string, body?: unknown, options?: SendOptions): Promise<T>;
  delete(path: string, options?: SendOptions): Promise<void>;
}

// =============================================================================
// Implementation
// =============================================================================

function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== '') {
        url.searchParams.set(key, String(value));
      }
    }
  }
  return url.toString();
}

/**
 * Create the transport shared by every entity client
 */
export function createTransport(config: WorkOSClientConfig): Transport {
  const baseUrl = config.baseUrl || DEFAULT_BASE_URL;
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  const retry: Required<RetryConfig> = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
  const fetchImpl = config.fetch ?? fetch;
  const log = config.logger ?? defaultLogger;

  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.apiKey}`,
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
  };

  /**
   * One HTTP round trip bounded by the request timeout and the caller signal
   */
  async function attempt(
    method: HttpMethod,
    url: string,
    body: unknown,
    signal: AbortSignal | undefined,
    attemptNumber: number
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(new Error(`Request timed out after ${timeout}ms`)), timeout);
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      log.request(method, url, { headers, attempt: attemptNumber });
      const startTime = Date.now();
      const response = await fetchImpl(url, {
        method,
        headers,
        // Serialized afresh on every attempt
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      log.response(response.status, url, { durationMs: Date.now() - startTime });
      return response;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async function send(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options: SendOptions = {}
  ): Promise<Response> {
    const url = buildUrl(baseUrl, path, options.params);

    for (let attemptNumber = 0; ; attemptNumber++) {
      if (options.signal?.aborted) {
        throw options.signal.reason instanceof Error ? options.signal.reason : new Error('The operation was aborted');
      }

      const response = await attempt(method, url, body, options.signal, attemptNumber);
      if (response.status !== RATE_LIMIT_STATUS || attemptNumber >= retry.maxRetries) {
        return response;
      }

      const delayMs = calculateDelay(attemptNumber, response.headers.get('Retry-After'), retry);
      log.info(`Rate limited, retry ${attemptNumber + 1}/${retry.maxRetries} in ${delayMs}ms`, {
        method,
        path,
        delayMs,
      });
      // Drain the unused body so the connection can be reused
      await response.body?.cancel();
      await sleep(delayMs, options.signal);
    }
  }

  async function request<T>(method: HttpMethod, path: string, body: unknown, options?: SendOptions): Promise<T | undefined> {
    const response = await send(method, path, body, options);
    const text = await response.text();

    if (!response.ok) {
      throw parseApiError(response.status, text);
    }

    if (text.trim() === '') {
      return undefined;
    }
    return JSON.parse(text) as T;
  }

  async function decoded<T>(method: HttpMethod, path: string, body: unknown, options?: SendOptions): Promise<T> {
    const result = await request<T>(method, path, body, options);
    if (result === undefined) {
      throw new Error(`Empty response body for ${method} ${path}`);
    }
    return result;
  }

  return {
    baseUrl,
    clientId: config.clientId,
    send,
    get: <T>(path: string, options?: SendOptions) => decoded<T>('GET', path, undefined, options),
    post: <T>(path: string, body?: unknown, options?: SendOptions) => decoded<T>('POST', path, body, options),
    put: <T>(path: string, body?: unknown, options?: SendOptions) => decoded<T>('PUT', path, body, options),
    patch: <T>(path: string, body?: unknown, options?: SendOptions) => decoded<T>('PATCH', path, body, options),
    // A successful delete has nothing to decode, whatever its body
    async delete(path: string, options?: SendOptions): Promise<void> {
      const response = await send('DELETE', path, undefined, options);
      if (!response.ok) {
        throw parseApiError(response.status, await response.text());
      }
      await response.body?.cancel();
    },
  };
}
