/**
 * Blog extraction pipeline.
 *
 * parse -> locate root -> title/h1 -> banner -> prepend h1 -> drop author
 * images -> collect non-<img> images -> sanitize -> assign placeholders -> serialize
 *
 * Every call parses its own document; nothing is shared between calls.
 */
import { parseHTML } from 'linkedom';
import { detectBanner } from './banner-resolver.js';
import { locateImages, promotePictureSources, type CandidateImage } from './image-locator.js';
import { isNoiseImageUrl, stripAuthorImages } from './noise-filter.js';
import { sanitizeMarkup } from './markup-sanitizer.js';
import { assignPlaceholders } from './asset-placeholders.js';
import type { BlogExtraction, RootSource } from './types.js';
import { DEFAULT_EXTRACTION_CONFIG, type ExtractionConfig } from '../config/extraction-config.js';
import { logger } from '../logger.js';

export interface ExtractOptions {
  /** Page URL, used to resolve relative links and for log context */
  url?: string;
  config?: ExtractionConfig;
}

interface LocatedRoot {
  root: Element;
  source: RootSource;
}

function parseDocument(html: string): Document {
  const source = /<html[\s>]/i.test(html) ? html : `<!DOCTYPE html><html><body>${html}</body></html>`;
  return parseHTML(source).document;
}

function hasClass(el: Element, className: string): boolean {
  return (el.getAttribute('class') ?? '').split(/\s+/).includes(className);
}

/** <article>, else the first element with a configured class (by class priority), else body, else the document element. */
export function locateArticleRoot(document: Document, rootClassNames: string[]): LocatedRoot | null {
  const article = document.querySelector('article');
  if (article) return { root: article, source: 'article' };

  const elements = [...document.querySelectorAll('[class]')];
  for (const className of rootClassNames) {
    const match = elements.find((el) => hasClass(el, className));
    if (match) return { root: match, source: 'class' };
  }

  if (document.body) return { root: document.body, source: 'body' };
  if (document.documentElement) return { root: document.documentElement, source: 'document' };
  return null;
}

/** Page <title> text, else the first <h1>'s text, else ''. Also returns that <h1>. */
export function resolveTitle(document: Document): { title: string; heading: Element | null } {
  const heading = document.querySelector('h1');
  const pageTitle = document.querySelector('title')?.textContent?.trim();
  if (pageTitle) return { title: pageTitle, heading };

  const headingText = heading?.textContent?.replace(/\s+/g, ' ').trim() ?? '';
  return { title: headingText, heading };
}

/** A <source> inside a <picture> that already has an <img>: an alternate encoding, not another image. */
function isPictureAlternate(candidate: CandidateImage): boolean {
  if (candidate.origin !== 'source') return false;
  return Boolean(candidate.element.closest('picture')?.querySelector('img'));
}

function prependHeading(root: Element, heading: Element | null): void {
  if (!heading || heading === root || heading.contains(root)) return;
  if (root.firstChild === heading) return;
  root.insertBefore(heading, root.firstChild);
}

/**
 * Extract title, sanitized body and placeholder-mapped images from page HTML.
 * Returns null when no article root can be located.
 */
export function extractBlogContent(html: string, options: ExtractOptions = {}): BlogExtraction | null {
  const config = options.config ?? DEFAULT_EXTRACTION_CONFIG;
  const log = logger.child({ url: options.url });

  if (!html.trim()) {
    log.debug('Empty document');
    return null;
  }

  const document = parseDocument(html);
  const located = locateArticleRoot(document, config.rootClassNames);
  if (!located) {
    log.debug('No article root found');
    return null;
  }
  const { root } = located;

  const { title, heading } = resolveTitle(document);
  const banner = detectBanner(document, config);
  log.debug({ rootSource: located.source, banner }, 'Located article root and banner');

  prependHeading(root, heading);
  promotePictureSources(root);

  const removedImageCount = stripAuthorImages(root, config);

  // Sanitizing drops <source> and style attributes, so collect those images first
  const extraImages = locateImages(root)
    .filter((candidate) => candidate.origin !== 'img' && !isPictureAlternate(candidate))
    .map((candidate) => candidate.url)
    .filter((url) => !isNoiseImageUrl(url, config));

  sanitizeMarkup(root, { baseUrl: options.url });
  const assignment = assignPlaceholders(root, banner?.url ?? null, {
    canonical: config.canonicalAssetUrls,
    extraImages,
  });

  log.debug(
    { extraImages: extraImages.length, removedImageCount, assigned: assignment.images.length },
    'Assigned image placeholders'
  );

  return {
    title,
    contentHtml: root.innerHTML.trim(),
    images: assignment.images,
    imageNames: assignment.imageNames,
    imageUrlMap: assignment.imageUrlMap,
    banner,
    rootSource: located.source,
    removedImageCount,
  };
}
