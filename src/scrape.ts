/**
 * Fetch a blog page and run the extraction pipeline, reporting failures as
 * typed outcomes instead of exceptions.
 */
import { randomUUID } from 'node:crypto';
import { fetchPage } from './fetch/page-fetcher.js';
import type { PageFetcher, PageFetchError, PageFetchOptions } from './fetch/types.js';
import { extractBlogContent } from './extract/blog-extractor.js';
import type { BlogExtraction } from './extract/types.js';
import { isHttpUrl } from './extract/url-normalizer.js';
import {
  DEFAULT_EXTRACTION_CONFIG,
  getExtractionConfig,
  type ExtractionConfigFile,
} from './config/extraction-config.js';
import { logger } from './logger.js';

export type ScrapeErrorKind = 'input_error' | 'transport_error' | 'extraction_failed' | 'internal_error';

export type ScrapeOutcome =
  | {
      success: true;
      url: string;
      latencyMs: number;
      extraction: BlogExtraction;
    }
  | {
      success: false;
      url: string;
      latencyMs: number;
      error: ScrapeErrorKind;
      message: string;
      fetchError?: PageFetchError;
      statusCode?: number;
    };

export interface ScrapeOptions extends PageFetchOptions {
  /** Page fetcher; defaults to a single GET with timeout */
  fetcher?: PageFetcher;
  extractionConfig?: ExtractionConfigFile;
}

const HTTP_STATUS: Record<ScrapeErrorKind, number> = {
  input_error: 400,
  extraction_failed: 422,
  transport_error: 502,
  internal_error: 500,
};

/** HTTP status the request boundary reports for a failure kind. */
export function httpStatusFor(kind: ScrapeErrorKind): number {
  return HTTP_STATUS[kind];
}

/** Fetch errors caused by the request itself rather than the remote side. */
const INPUT_FETCH_ERRORS = new Set<PageFetchError>(['invalid_url', 'blocked_host']);

const DEFAULT_CONFIG_FILE: ExtractionConfigFile = {
  defaults: DEFAULT_EXTRACTION_CONFIG,
  sites: {},
};

export async function scrapeBlog(url: string, options: ScrapeOptions = {}): Promise<ScrapeOutcome> {
  const startTime = Date.now();
  const requestId = randomUUID().slice(0, 8);
  const log = logger.child({ requestId, url });

  const failure = (
    error: ScrapeErrorKind,
    message: string,
    extra: { fetchError?: PageFetchError; statusCode?: number } = {}
  ): ScrapeOutcome => ({
    success: false,
    url,
    latencyMs: Date.now() - startTime,
    error,
    message,
    ...extra,
  });

  const target = url.trim();
  if (!isHttpUrl(target)) {
    return failure('input_error', "Invalid 'url' field: must be an absolute http(s) URL");
  }

  const { fetcher = fetchPage, extractionConfig = DEFAULT_CONFIG_FILE, ...fetchOptions } = options;

  try {
    log.info('Fetching page');
    const page = await fetcher(target, fetchOptions);
    if (!page.ok) {
      log.warn({ fetchError: page.error, statusCode: page.statusCode }, 'Page fetch failed');
      const kind = INPUT_FETCH_ERRORS.has(page.error) ? 'input_error' : 'transport_error';
      return failure(kind, page.message, { fetchError: page.error, statusCode: page.statusCode });
    }

    const extraction = extractBlogContent(page.html, {
      url: page.finalUrl,
      config: getExtractionConfig(extractionConfig, page.finalUrl),
    });
    if (!extraction) {
      return failure('extraction_failed', 'Could not extract blog content');
    }

    const latencyMs = Date.now() - startTime;
    log.info({ images: extraction.images.length, latencyMs }, 'Extracted blog content');
    return { success: true, url, latencyMs, extraction };
  } catch (error) {
    log.error({ err: error }, 'Unexpected error while scraping blog');
    return failure('internal_error', 'Internal error while extracting content');
  }
}
