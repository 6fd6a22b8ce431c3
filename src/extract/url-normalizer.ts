/**
 * Canonicalize raw attribute values into absolute http(s) URLs.
 *
 * Values pass through byte-for-byte apart from trimming and the protocol-relative
 * prefix: percent-escapes such as %28/%29 are never decoded here.
 */

export interface NormalizeOptions {
  /**
   * Canonical asset mode: drop the query string and fragment so resizer variants
   * (`a.png?w=800`, `a.png?w=400`) collapse onto one URL.
   */
  canonical?: boolean;
}

const SURROUNDING_NOISE = /^[\s"']+|[\s"']+$/g;

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/**
 * Normalize a raw src/href/style value. Returns null for empty input and for
 * anything that is not an absolute http(s) URL after normalization.
 */
export function normalizeUrl(
  raw: string | null | undefined,
  options: NormalizeOptions = {}
): string | null {
  if (!raw) return null;

  let url = raw.replace(SURROUNDING_NOISE, '');
  if (!url) return null;

  if (url.startsWith('//')) {
    url = `https:${url}`;
  }

  if (options.canonical) {
    const cut = url.search(/[?#]/);
    if (cut !== -1) url = url.slice(0, cut);
  }

  return isHttpUrl(url) ? url : null;
}

/**
 * Legacy helper that turns %28/%29 back into literal parentheses.
 * Not used by the extraction pipeline; callers opt in explicitly.
 */
export function decodeParentheses(url: string): string {
  return url.replace(/%28/gi, '(').replace(/%29/gi, ')');
}
