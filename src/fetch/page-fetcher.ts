/**
 * Single-shot page fetch: one GET with a fixed timeout, no retries.
 * Redirects are followed by hand so every hop passes the private-host check.
 */
import { isHttpUrl } from '../extract/url-normalizer.js';
import { validateSsrfWithTimeout, SsrfError } from './ssrf.js';
import type { PageFetchOptions, PageFetchResult, PageFetchError } from './types.js';
import { logger } from '../logger.js';

export const DEFAULT_TIMEOUT_MS = 20000;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0';
export const MAX_HTML_SIZE_BYTES = 10 * 1024 * 1024;
export const MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function fail(
  url: string,
  error: PageFetchError,
  message: string,
  statusCode?: number
): PageFetchResult {
  return statusCode === undefined
    ? { ok: false, url, error, message }
    : { ok: false, url, error, message, statusCode };
}

/**
 * Read the body as UTF-8, cancelling the stream once it passes `maxBytes`.
 * Returns null when the limit was exceeded.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  if (!response.body) return '';
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export async function fetchPage(url: string, options: PageFetchOptions = {}): Promise<PageFetchResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxBytes = options.maxBytes ?? MAX_HTML_SIZE_BYTES;

  if (!isHttpUrl(url)) {
    return fail(url, 'invalid_url', 'URL must start with http:// or https://');
  }
  try {
    new URL(url);
  } catch {
    return fail(url, 'invalid_url', `Invalid URL: ${url}`);
  }

  const signal = AbortSignal.timeout(timeoutMs);
  let current = url;
  let response: Response | undefined;

  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    if (!options.allowPrivateHosts) {
      try {
        await validateSsrfWithTimeout(current);
      } catch (error) {
        if (error instanceof SsrfError) {
          return fail(url, 'blocked_host', error.message);
        }
        return fail(url, 'network_error', String(error));
      }
    }

    let hopResponse: Response;
    try {
      hopResponse = await fetch(current, {
        headers: {
          'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        },
        redirect: 'manual',
        signal,
      });
    } catch (error) {
      if (isTimeout(error)) {
        return fail(url, 'timeout', `Request timeout after ${timeoutMs}ms for ${url}`);
      }
      logger.debug({ url: current, error: String(error) }, 'Page request failed');
      return fail(url, 'network_error', error instanceof Error ? error.message : String(error));
    }

    const location = hopResponse.headers.get('location');
    if (!REDIRECT_STATUSES.has(hopResponse.status) || !location) {
      response = hopResponse;
      break;
    }

    await hopResponse.body?.cancel();
    let next: string;
    try {
      next = new URL(location, current).href;
    } catch {
      return fail(url, 'network_error', `Invalid redirect location: ${location}`, hopResponse.status);
    }
    if (!isHttpUrl(next)) {
      return fail(url, 'network_error', `Redirect to unsupported URL: ${next}`, hopResponse.status);
    }
    logger.debug({ from: current, to: next, status: hopResponse.status }, 'Following redirect');
    current = next;
  }

  if (!response) {
    return fail(url, 'too_many_redirects', `More than ${MAX_REDIRECTS} redirects for ${url}`);
  }

  if (!response.ok) {
    return fail(url, 'http_status_error', `HTTP ${response.status}`, response.status);
  }

  const declaredLength = Number(response.headers.get('content-length'));
  if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
    return fail(url, 'response_too_large', `Response exceeds ${maxBytes} bytes`, response.status);
  }

  let html: string | null;
  try {
    html = await readBodyWithLimit(response, maxBytes);
  } catch (error) {
    if (isTimeout(error)) {
      return fail(url, 'timeout', `Request timeout after ${timeoutMs}ms for ${url}`);
    }
    return fail(url, 'network_error', error instanceof Error ? error.message : String(error));
  }

  if (html === null) {
    return fail(url, 'response_too_large', `Response exceeds ${maxBytes} bytes`, response.status);
  }

  return {
    ok: true,
    url,
    finalUrl: current,
    statusCode: response.status,
    html,
  };
}
