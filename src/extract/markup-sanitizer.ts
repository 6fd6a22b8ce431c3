/**
 * Reduce an article subtree to an allow-listed tag and attribute set.
 *
 * Runs in two passes over snapshots of the tree (collect, then mutate).
 * Sanitizing sanitized markup changes nothing.
 */
import { normalizeUrl } from './url-normalizer.js';
import { imageSourceOf } from './image-locator.js';

/** Removed together with their subtree. */
export const DROPPED_TAGS = new Set(['SCRIPT', 'STYLE', 'SVG', 'NOSCRIPT']);

/** Tags that survive; everything else is replaced by its children. */
export const ALLOWED_TAGS = new Set([
  'P',
  'H1',
  'H2',
  'H3',
  'H4',
  'H5',
  'H6',
  'UL',
  'OL',
  'LI',
  'IMG',
  'STRONG',
  'EM',
  'B',
  'I',
  'A',
  'TABLE',
  'THEAD',
  'TBODY',
  'TR',
  'TH',
  'TD',
  'FIGURE',
]);

export const DEFAULT_IMAGE_ALT = 'Image';
export const LINK_TARGET = '_blank';
export const LINK_REL = 'noopener noreferrer';

export interface SanitizeOptions {
  /** Page URL used to resolve relative links. Without it, relative hrefs become '#'. */
  baseUrl?: string;
}

const COMMENT_NODE = 8;

function tagOf(el: Element): string {
  return el.tagName.toUpperCase();
}

function resolveHref(href: string | null, baseUrl?: string): string {
  const value = href?.trim();
  if (!value || value.startsWith('#')) return '#';

  const absolute = normalizeUrl(value);
  if (absolute) return absolute;
  if (!baseUrl) return '#';

  try {
    const resolved = new URL(value, baseUrl);
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.href : '#';
  } catch {
    return '#';
  }
}

function allowedAttributes(el: Element, options: SanitizeOptions): Array<[string, string]> {
  switch (tagOf(el)) {
    case 'IMG': {
      const src = normalizeUrl(imageSourceOf(el)) ?? '';
      const alt = el.getAttribute('alt')?.trim() || DEFAULT_IMAGE_ALT;
      return [
        ['src', src],
        ['alt', alt],
      ];
    }
    case 'A':
      return [
        ['href', resolveHref(el.getAttribute('href'), options.baseUrl)],
        ['target', LINK_TARGET],
        ['rel', LINK_REL],
      ];
    default:
      return [];
  }
}

function replaceAttributes(el: Element, attributes: Array<[string, string]>): void {
  for (const attr of [...el.attributes]) {
    el.removeAttribute(attr.name);
  }
  for (const [name, value] of attributes) {
    el.setAttribute(name, value);
  }
}

/** Replace an element with its children, keeping sibling order. */
function unwrap(el: Element): void {
  const parent = el.parentNode;
  if (!parent) return;
  while (el.firstChild) {
    parent.insertBefore(el.firstChild, el);
  }
  el.remove();
}

function collectComments(root: Node, into: Node[]): void {
  for (const child of root.childNodes) {
    if (child.nodeType === COMMENT_NODE) {
      into.push(child);
    } else if (child.hasChildNodes()) {
      collectComments(child, into);
    }
  }
}

/** Sanitize the subtree under `root` in place and return `root`. The root element itself is kept. */
export function sanitizeMarkup<T extends Element>(root: T, options: SanitizeOptions = {}): T {
  // Pass 1: drop whole subtrees and comments
  const dropped = [...root.querySelectorAll('*')].filter((el) => DROPPED_TAGS.has(tagOf(el)));
  for (const el of dropped) {
    el.remove();
  }

  const comments: Node[] = [];
  collectComments(root, comments);
  for (const comment of comments) {
    comment.parentNode?.removeChild(comment);
  }

  // Pass 2: unwrap unknown tags, reduce attributes on the rest
  const elements = [...root.querySelectorAll('*')];
  const unwrapped: Element[] = [];
  for (const el of elements) {
    if (ALLOWED_TAGS.has(tagOf(el))) {
      replaceAttributes(el, allowedAttributes(el, options));
    } else {
      unwrapped.push(el);
    }
  }
  for (const el of unwrapped) {
    unwrap(el);
  }

  return root;
}
