/**
 * Banner (hero image) resolution for a page.
 *
 * Signals are tried in order and the first hit wins:
 *   1. a banner wrapper element: its background-image style, else its first <img>
 *   2. the first element in the document with a background-image style
 *   3. the og:image meta value
 */
import { normalizeUrl } from './url-normalizer.js';
import { extractCssUrls, resolveImageUrl } from './image-locator.js';
import type { ExtractionConfig } from '../config/extraction-config.js';
import { logger } from '../logger.js';

export type BannerSource = 'wrapper-style' | 'wrapper-img' | 'background-style' | 'og-image';

export interface BannerCandidate {
  url: string;
  source: BannerSource;
}

type BannerConfig = Pick<ExtractionConfig, 'bannerSelectors'>;

function backgroundImageUrl(el: Element): string | null {
  for (const raw of extractCssUrls(el.getAttribute('style'), { backgroundOnly: true })) {
    const url = normalizeUrl(raw);
    if (url) return url;
  }
  return null;
}

function findBannerWrapper(document: Document, selectors: string[]): Element | null {
  for (const selector of selectors) {
    try {
      const wrapper = document.querySelector(selector);
      if (wrapper) return wrapper;
    } catch (e) {
      logger.debug({ selector, error: String(e) }, 'Invalid banner selector');
    }
  }
  return null;
}

function fromWrapper(document: Document, config: BannerConfig): BannerCandidate | null {
  const wrapper = findBannerWrapper(document, config.bannerSelectors);
  if (!wrapper) return null;

  const styled = backgroundImageUrl(wrapper);
  if (styled) return { url: styled, source: 'wrapper-style' };

  for (const img of wrapper.querySelectorAll('img')) {
    const url = resolveImageUrl(img);
    if (url) return { url, source: 'wrapper-img' };
  }
  return null;
}

function fromBackgroundStyle(document: Document): BannerCandidate | null {
  for (const el of document.querySelectorAll('[style]')) {
    const url = backgroundImageUrl(el);
    if (url) return { url, source: 'background-style' };
  }
  return null;
}

function fromOpenGraph(document: Document): BannerCandidate | null {
  const meta =
    document.querySelector('meta[property="og:image"]') ??
    document.querySelector('meta[name="og:image"]');
  const url = normalizeUrl(meta?.getAttribute('content'));
  return url ? { url, source: 'og-image' } : null;
}

/** Find the banner and report which signal produced it. */
export function detectBanner(document: Document, config: BannerConfig): BannerCandidate | null {
  return fromWrapper(document, config) ?? fromBackgroundStyle(document) ?? fromOpenGraph(document);
}

export function resolveBanner(document: Document, config: BannerConfig): string | null {
  return detectBanner(document, config)?.url ?? null;
}
