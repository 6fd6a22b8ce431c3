/**
 * blog-scraper - extract a sanitized article, its banner and placeholder-mapped
 * images from a blog page.
 *
 * @module blog-scraper
 */
export { scrapeBlog, httpStatusFor } from './scrape.js';
export { extractBlogContent, locateArticleRoot, resolveTitle } from './extract/blog-extractor.js';
export { normalizeUrl, decodeParentheses, isHttpUrl } from './extract/url-normalizer.js';
export {
  locateImages,
  imageSourceOf,
  resolveImageUrl,
  firstSrcsetUrl,
  extractCssUrls,
  promotePictureSources,
} from './extract/image-locator.js';
export { detectBanner, resolveBanner } from './extract/banner-resolver.js';
export { stripAuthorImages, looksLikeAuthorImage } from './extract/noise-filter.js';
export { sanitizeMarkup } from './extract/markup-sanitizer.js';
export { assignPlaceholders, placeholderExtension } from './extract/asset-placeholders.js';
export { toScrapeResponse } from './extract/types.js';
export { fetchPage } from './fetch/page-fetcher.js';
export {
  DEFAULT_EXTRACTION_CONFIG,
  loadExtractionConfig,
  getExtractionConfig,
  parseExtractionConfigJson,
} from './config/extraction-config.js';
export { loadServerConfig } from './config/server-config.js';
export { createApp, startServer } from './server.js';
export type { ScrapeOutcome, ScrapeErrorKind, ScrapeOptions } from './scrape.js';
export type {
  BlogExtraction,
  ScrapeResponse,
  PlaceholderAssignment,
  RootSource,
} from './extract/types.js';
export type { CandidateImage, CandidateOrigin } from './extract/image-locator.js';
export type { BannerCandidate, BannerSource } from './extract/banner-resolver.js';
export type { PageFetchResult, PageFetchOptions, PageFetchError, PageFetcher } from './fetch/types.js';
export type { ExtractionConfig, ExtractionConfigFile } from './config/extraction-config.js';
export type { ServerConfig } from './config/server-config.js';
