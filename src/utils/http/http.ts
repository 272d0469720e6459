/**
 * HTTP helper shared by the InfluxDB client and the notifiers
 */

/**
 * Fetch implementation - the global fetch, or a stand-in in tests
 */
export type FetchFn = typeof fetch;

/**
 * Error raised when a request does not complete in time
 */
export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super('Request timeout after ' + timeoutMs + 'ms');
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Perform a request that is aborted after a timeout
 *
 * @param fetchFn - Fetch implementation
 * @param url - Request URL
 * @param init - Request options (signal is overwritten)
 * @param timeoutMs - Abort after this many milliseconds
 * @returns The response, whatever its status
 * @throws {RequestTimeoutError} If the timeout elapses first
 */
export async function fetchWithTimeout(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new RequestTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Read a response body as text without throwing
 * @param response - HTTP response
 * @returns Body text, or an empty string if it cannot be read
 */
export async function readBodySafely(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (_err) {
    return '';
  }
}
