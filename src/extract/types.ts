/**
 * Shared types for the extract module
 */
import type { BannerCandidate } from './banner-resolver.js';

/** Output of placeholder assignment. images[i] is imageUrlMap[imageNames[i]]. */
export interface PlaceholderAssignment {
  body: Element;
  /** Unique absolute image URLs in assignment order (banner first) */
  images: string[];
  /** Placeholder filenames, parallel to images */
  imageNames: string[];
  /** filename -> original URL */
  imageUrlMap: Record<string, string>;
}

/** How the article root was found */
export type RootSource = 'article' | 'class' | 'body' | 'document';

export interface BlogExtraction {
  title: string;
  /** Serialized sanitized body, banner block first when present */
  contentHtml: string;
  images: string[];
  imageNames: string[];
  imageUrlMap: Record<string, string>;

  banner: BannerCandidate | null;
  rootSource: RootSource;
  /** Author images dropped before assignment */
  removedImageCount: number;
}

/** JSON wire format returned to callers. */
export interface ScrapeResponse {
  title: string;
  content_html: string;
  images: string[];
  image_names: string[];
  image_url_map: Record<string, string>;
}

export function toScrapeResponse(extraction: BlogExtraction): ScrapeResponse {
  return {
    title: extraction.title,
    content_html: extraction.contentHtml,
    images: extraction.images,
    image_names: extraction.imageNames,
    image_url_map: extraction.imageUrlMap,
  };
}
