/**
 * Remove author/byline headshots from an article body.
 * Runs before placeholder assignment so removed images never take an ordinal.
 */
import { resolveImageUrl } from './image-locator.js';
import type { ExtractionConfig } from '../config/extraction-config.js';
import { logger } from '../logger.js';

type NoiseConfig = Pick<ExtractionConfig, 'noiseKeywords' | 'noiseMarkers' | 'noisePatterns'>;

/** "Firstname Lastname" or "Firstname Middlename Lastname". */
const PERSON_NAME = /^[A-Z][a-z]+(?:\s+[A-Z][a-z]+){1,2}$/;

/** Containers that wrap a single headshot in byline markup. */
const WRAPPER_TAGS = new Set(['P', 'DIV', 'SPAN', 'FIGURE', 'PICTURE', 'A']);

export function looksLikePersonName(alt: string): boolean {
  return PERSON_NAME.test(alt.trim());
}

function containsKeyword(value: string, keywords: string[]): boolean {
  const lower = value.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}

function matchesMarker(value: string, config: NoiseConfig): boolean {
  if (!value) return false;
  return (
    config.noiseMarkers.some((marker) => value.includes(marker)) ||
    config.noisePatterns.some((pattern) => pattern.test(value))
  );
}

/** Keyword, marker and pattern checks for a bare image URL (inline styles, <source srcset>). */
export function isNoiseImageUrl(url: string, config: NoiseConfig): boolean {
  return containsKeyword(url, config.noiseKeywords) || matchesMarker(url, config);
}

/** True when any headshot heuristic fires for this <img>. */
export function looksLikeAuthorImage(img: Element, config: NoiseConfig): boolean {
  const alt = img.getAttribute('alt')?.trim() ?? '';
  const className = img.getAttribute('class') ?? '';
  const src = resolveImageUrl(img) ?? '';

  if (alt && looksLikePersonName(alt)) return true;
  if ([alt, className, src].some((v) => v && containsKeyword(v, config.noiseKeywords))) return true;
  return matchesMarker(src, config) || matchesMarker(alt, config);
}

/**
 * Parent that holds nothing but this image (whitespace aside) and carries
 * an author/avatar/byline class. Null when the image is not wrapped that way.
 */
function soleAuthorWrapper(img: Element, config: NoiseConfig): Element | null {
  const parent = img.parentElement;
  if (!parent || !WRAPPER_TAGS.has(parent.tagName.toUpperCase())) return null;
  if (!containsKeyword(parent.getAttribute('class') ?? '', config.noiseKeywords)) return null;

  for (const child of parent.childNodes) {
    if (child === img) continue;
    if (child.nodeType === 3 && !(child.textContent ?? '').trim()) continue;
    if (child.nodeType === 8) continue;
    return null;
  }
  return parent;
}

/**
 * Remove headshot images (or their sole-content byline wrapper) from the subtree.
 * Returns the number of images removed.
 */
export function stripAuthorImages(root: Element, config: NoiseConfig): number {
  const removals: Element[] = [];
  let removed = 0;

  for (const img of root.querySelectorAll('img')) {
    const wrapper = soleAuthorWrapper(img, config);
    if (!wrapper && !looksLikeAuthorImage(img, config)) continue;
    removals.push(wrapper && wrapper !== root ? wrapper : img);
    removed++;
  }

  for (const el of removals) {
    el.remove();
  }

  if (removed > 0) {
    logger.debug({ removed }, 'Removed author images');
  }
  return removed;
}
