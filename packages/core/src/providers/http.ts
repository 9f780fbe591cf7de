/**
 * Shared HTTP fetch utility for registry metadata clients.
 * Provides consistent timeout, auth, cancellation and error handling.
 */

import { TIMEOUT } from '../constants.js';
import { HttpError } from '../errors.js';

export interface FetchOptions {
  /** Bearer token — sets Authorization: Bearer <token> */
  bearerToken?: string;
  /** Arbitrary additional headers */
  headers?: Record<string, string>;
  /** Timeout in milliseconds (default: 10_000) */
  timeoutMs?: number;
  /** Caller cancellation — combined with the timeout */
  signal?: AbortSignal;
  /** Injected fetch, for tests */
  fetch?: typeof globalThis.fetch;
}

/**
 * Fetch JSON from a URL with consistent timeout, auth, and status-code error handling.
 * Throws HttpError for non-2xx responses and timeouts (status 408).
 * The body is returned unvalidated; callers parse it with their own schema.
 */
export async function providerFetch(
  url: string,
  options: FetchOptions = {},
): Promise<unknown> {
  const {
    bearerToken,
    headers = {},
    timeoutMs = TIMEOUT.HTTP_MS,
    signal,
    fetch = globalThis.fetch,
  } = options;

  const timeout = AbortSignal.timeout(timeoutMs);
  const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

  const reqHeaders: Record<string, string> = {
    'Accept': 'application/json',
    'User-Agent': 'imagegate/0.1',
    ...headers,
  };

  if (bearerToken) {
    reqHeaders['Authorization'] = `Bearer ${bearerToken}`;
  }

  let res: Response;
  try {
    res = await fetch(url, { headers: reqHeaders, signal: combined });
  } catch (err: unknown) {
    if (timeout.aborted && !signal?.aborted) {
      throw new HttpError(408, `Request timeout after ${timeoutMs}ms: ${url}`);
    }
    throw err;
  }

  if (!res.ok) {
    const detail = await res.text().catch(() => '');
    throw new HttpError(res.status, `HTTP ${res.status} from ${url}${detail ? ': ' + detail.slice(0, 200) : ''}`);
  }

  return res.json();
}
