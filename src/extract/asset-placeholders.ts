/**
 * Assign stable placeholder filenames (images/imageN.ext) to article images.
 *
 * The banner, when present, always takes ordinal 1. Body images follow in
 * document order; a URL seen before reuses its filename and gets no slot of its own.
 * Images that only exist outside <img> markup (inline styles, <source srcset>)
 * are appended last and get a filename but no slot.
 */
import { normalizeUrl } from './url-normalizer.js';
import { IMAGE_SOURCE_ATTRIBUTES, resolveImageUrl } from './image-locator.js';
import { DEFAULT_IMAGE_ALT } from './markup-sanitizer.js';
import type { PlaceholderAssignment } from './types.js';

export const PLACEHOLDER_DIR = 'images';
export const SLOT_ATTRIBUTE = 'data-img-slot';
export const BANNER_ALT = 'Banner';
export const DEFAULT_EXTENSION = 'png';

const KNOWN_EXTENSIONS = new Set(['png', 'jpg', 'jpeg', 'webp', 'gif', 'svg']);

export interface AssignOptions {
  /**
   * Identify images by their query-less URL. Emitted URLs keep the query of
   * the first occurrence.
   */
  canonical?: boolean;
  /** Normalized URLs found outside <img> markup, in document order */
  extraImages?: string[];
}

/** File extension for a placeholder: the URL path suffix if it is a known image type, else png. */
export function placeholderExtension(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return DEFAULT_EXTENSION;
  }
  const ext = pathname.match(/\.([A-Za-z0-9]+)$/)?.[1]?.toLowerCase();
  return ext && KNOWN_EXTENSIONS.has(ext) ? ext : DEFAULT_EXTENSION;
}

interface Placeholder {
  ordinal: number;
  filename: string;
  path: string;
}

/**
 * Request-scoped URL -> placeholder table. Lookups go through `key`, which is
 * the canonical form in canonical mode; `images` holds the URLs as first seen.
 */
class PlaceholderRegistry {
  private readonly byKey = new Map<string, Placeholder>();
  readonly images: string[] = [];
  readonly imageNames: string[] = [];
  private canonical: boolean;

  constructor(canonical: boolean) {
    this.canonical = canonical;
  }

  private key(url: string): string {
    return this.canonical ? (normalizeUrl(url, { canonical: true }) ?? url) : url;
  }

  get(url: string): Placeholder | undefined {
    return this.byKey.get(this.key(url));
  }

  assign(url: string): Placeholder {
    const ordinal = this.images.length + 1;
    const filename = `image${ordinal}.${placeholderExtension(url)}`;
    const placeholder = { ordinal, filename, path: `${PLACEHOLDER_DIR}/${filename}` };
    this.byKey.set(this.key(url), placeholder);
    this.images.push(url);
    this.imageNames.push(filename);
    return placeholder;
  }

  urlMap(): Record<string, string> {
    const map: Record<string, string> = {};
    this.imageNames.forEach((name, i) => {
      map[name] = this.images[i];
    });
    return map;
  }
}

function closestFigure(img: Element, body: Element): Element | null {
  let current = img.parentElement;
  while (current && current !== body) {
    if (current.tagName.toUpperCase() === 'FIGURE') return current;
    current = current.parentElement;
  }
  return null;
}

function wrapInFigure(img: Element): Element {
  const figure = img.ownerDocument.createElement('figure');
  img.parentNode?.insertBefore(figure, img);
  figure.appendChild(img);
  return figure;
}

function pointAtPlaceholder(img: Element, path: string): void {
  for (const name of IMAGE_SOURCE_ATTRIBUTES) {
    if (name !== 'src') img.removeAttribute(name);
  }
  img.removeAttribute('srcset');
  img.setAttribute('src', path);
  img.setAttribute('alt', img.getAttribute('alt')?.trim() || DEFAULT_IMAGE_ALT);
}

function insertBannerBlock(body: Element, path: string): { figure: Element; img: Element } {
  const document = body.ownerDocument;
  const figure = document.createElement('figure');
  figure.setAttribute(SLOT_ATTRIBUTE, '1');
  const img = document.createElement('img');
  img.setAttribute('src', path);
  img.setAttribute('alt', BANNER_ALT);
  figure.appendChild(img);
  body.insertBefore(figure, body.firstChild);
  return { figure, img };
}

/**
 * Rewrite every <img> under `body` to its placeholder path and build the
 * filename <-> URL mapping. Images without a usable absolute URL are removed.
 */
export function assignPlaceholders(
  body: Element,
  banner: string | null,
  options: AssignOptions = {}
): PlaceholderAssignment {
  const registry = new PlaceholderRegistry(options.canonical ?? false);
  const slottedFigures = new Set<Element>();

  const bannerUrl = normalizeUrl(banner);
  let bannerImg: Element | null = null;
  if (bannerUrl) {
    const { path } = registry.assign(bannerUrl);
    const block = insertBannerBlock(body, path);
    slottedFigures.add(block.figure);
    bannerImg = block.img;
  }

  const images = [...body.querySelectorAll('img')].filter((img) => img !== bannerImg);
  const unresolvable: Element[] = [];

  for (const img of images) {
    const url = resolveImageUrl(img);
    if (!url) {
      unresolvable.push(img);
      continue;
    }

    const existing = registry.get(url);
    if (existing) {
      pointAtPlaceholder(img, existing.path);
      const figure = closestFigure(img, body);
      if (figure && !slottedFigures.has(figure)) {
        figure.removeAttribute(SLOT_ATTRIBUTE);
      }
      continue;
    }

    const { ordinal, path } = registry.assign(url);
    pointAtPlaceholder(img, path);
    let figure = closestFigure(img, body);
    if (!figure || slottedFigures.has(figure)) {
      figure = wrapInFigure(img);
    }
    figure.setAttribute(SLOT_ATTRIBUTE, String(ordinal));
    slottedFigures.add(figure);
  }

  for (const img of unresolvable) {
    img.remove();
  }

  for (const url of options.extraImages ?? []) {
    if (!registry.get(url)) registry.assign(url);
  }

  return {
    body,
    images: registry.images,
    imageNames: registry.imageNames,
    imageUrlMap: registry.urlMap(),
  };
}
