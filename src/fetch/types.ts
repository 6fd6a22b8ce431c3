/**
 * Shared types for the fetch module
 */

export type PageFetchError =
  | 'invalid_url'
  | 'blocked_host'
  | 'timeout'
  | 'http_status_error'
  | 'network_error'
  | 'too_many_redirects'
  | 'response_too_large';

export interface PageFetchOptions {
  /** Request timeout in milliseconds. Default: 20000 */
  timeoutMs?: number;
  userAgent?: string;
  /** Maximum accepted body size in bytes. Default: 10MB */
  maxBytes?: number;
  /** Skip the private-network check (local development only) */
  allowPrivateHosts?: boolean;
}

export type PageFetchResult =
  | {
      ok: true;
      url: string;
      /** URL after redirects */
      finalUrl: string;
      statusCode: number;
      html: string;
    }
  | {
      ok: false;
      url: string;
      error: PageFetchError;
      message: string;
      statusCode?: number;
    };

/** Anything that can turn a URL into page HTML. */
export type PageFetcher = (url: string, options?: PageFetchOptions) => Promise<PageFetchResult>;
