/**
 * Locate candidate image URLs inside a DOM subtree.
 * Covers <img> (including lazy-load attributes), <source srcset> and inline
 * style url(...) declarations, deduplicated by normalized URL in first-seen order.
 */
import { normalizeUrl, type NormalizeOptions } from './url-normalizer.js';

/** Attributes checked on <img>, in priority order, before falling back to srcset. */
export const IMAGE_SOURCE_ATTRIBUTES = [
  'src',
  'data-src',
  'data-lazy-src',
  'data-original',
  'data-background',
] as const;

export type CandidateOrigin = 'img' | 'source' | 'style';

export interface CandidateImage {
  url: string;
  /** Element the URL was read from. Not owned; used for removal or rewrite. */
  element: Element;
  origin: CandidateOrigin;
}

const CSS_URL = /url\(\s*(['"]?)(.*?)\1\s*\)/gi;
const BACKGROUND_IMAGE_URL = /background-image\s*:\s*url\(\s*(['"]?)(.*?)\1\s*\)/gi;

/** First URL of a srcset list, descriptors dropped. */
export function firstSrcsetUrl(srcset: string | null | undefined): string | null {
  if (!srcset) return null;
  const first = srcset.split(',')[0]?.trim().split(/\s+/)[0];
  return first || null;
}

/** Raw source of an <img>: first non-blank priority attribute, else first srcset entry. */
export function imageSourceOf(img: Element): string | null {
  for (const name of IMAGE_SOURCE_ATTRIBUTES) {
    const value = img.getAttribute(name)?.trim();
    if (value) return value;
  }
  return firstSrcsetUrl(img.getAttribute('srcset'));
}

/** Normalized URL of an <img>, or null when it has no usable absolute source. */
export function resolveImageUrl(img: Element, options: NormalizeOptions = {}): string | null {
  return normalizeUrl(imageSourceOf(img), options);
}

/**
 * Raw url(...) values in an inline style, in order.
 * With `backgroundOnly`, only values inside a background-image declaration count.
 */
export function extractCssUrls(
  style: string | null | undefined,
  { backgroundOnly = false }: { backgroundOnly?: boolean } = {}
): string[] {
  if (!style) return [];
  const pattern = backgroundOnly ? BACKGROUND_IMAGE_URL : CSS_URL;
  return Array.from(style.matchAll(pattern), (m) => m[2]).filter(Boolean);
}

/** Scan a subtree for candidate images. Order of first appearance is preserved. */
export function locateImages(root: Element, options: NormalizeOptions = {}): CandidateImage[] {
  const candidates: CandidateImage[] = [];
  const seen = new Set<string>();

  const add = (raw: string | null, element: Element, origin: CandidateOrigin): void => {
    const url = normalizeUrl(raw, options);
    if (!url || seen.has(url)) return;
    seen.add(url);
    candidates.push({ url, element, origin });
  };

  for (const img of root.querySelectorAll('img')) {
    add(imageSourceOf(img), img, 'img');
  }

  for (const source of root.querySelectorAll('source')) {
    add(firstSrcsetUrl(source.getAttribute('srcset')), source, 'source');
  }

  const styled = [...(root.hasAttribute('style') ? [root] : []), ...root.querySelectorAll('[style]')];
  for (const el of styled) {
    for (const raw of extractCssUrls(el.getAttribute('style'))) {
      add(raw, el, 'style');
    }
  }

  return candidates;
}

/**
 * Give source-less <img> elements inside <picture> the first usable <source srcset> URL.
 * Returns the number of images updated.
 */
export function promotePictureSources(root: Element): number {
  const updates: Array<{ img: Element; url: string }> = [];

  for (const picture of root.querySelectorAll('picture')) {
    const img = picture.querySelector('img');
    if (!img || resolveImageUrl(img)) continue;

    for (const source of picture.querySelectorAll('source')) {
      const url = normalizeUrl(firstSrcsetUrl(source.getAttribute('srcset')));
      if (url) {
        updates.push({ img, url });
        break;
      }
    }
  }

  for (const { img, url } of updates) {
    img.setAttribute('src', url);
  }
  return updates.length;
}
