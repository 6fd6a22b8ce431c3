import { describe, it, expect } from 'vitest';
import { detectBanner, resolveBanner } from '../extract/banner-resolver.js';
import { DEFAULT_EXTRACTION_CONFIG } from '../config/extraction-config.js';
import { parsePage } from './test-helpers.js';

const config = DEFAULT_EXTRACTION_CONFIG;

function page(head: string, body: string): Document {
  return parsePage(`<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`);
}

const OG_IMAGE = '<meta property="og:image" content="https://cdn.test/og.jpg">';

describe('detectBanner', () => {
  it('prefers the wrapper background-image over og:image', () => {
    const doc = page(
      OG_IMAGE,
      `<div class="wrapper-banner-image" style="background-image: url('https://cdn.test/x.jpg')"></div>`
    );
    expect(detectBanner(doc, config)).toEqual({ url: 'https://cdn.test/x.jpg', source: 'wrapper-style' });
  });

  it('prefers the wrapper style over an img inside the wrapper', () => {
    const doc = page(
      '',
      '<div class="wrapper-banner-image" style="background-image:url(//cdn.test/style.jpg)">' +
        '<img src="https://cdn.test/inner.jpg"></div>'
    );
    expect(resolveBanner(doc, config)).toBe('https://cdn.test/style.jpg');
  });

  it('uses the first img in the wrapper when it has no background style', () => {
    const doc = page(OG_IMAGE, '<div class="wrapper-banner-image"><img data-src="//cdn.test/w.png"></div>');
    expect(detectBanner(doc, config)).toEqual({ url: 'https://cdn.test/w.png', source: 'wrapper-img' });
  });

  it('falls back to any element with a background-image style', () => {
    const doc = page(
      OG_IMAGE,
      '<p>intro</p><section style="background-image:url(//cdn.test/bg.jpg)"></section>' +
        '<div style="background-image:url(https://cdn.test/second.jpg)"></div>'
    );
    expect(detectBanner(doc, config)).toEqual({
      url: 'https://cdn.test/bg.jpg',
      source: 'background-style',
    });
  });

  it('falls through an empty wrapper to later signals', () => {
    const doc = page(OG_IMAGE, '<div class="wrapper-banner-image"></div>');
    expect(detectBanner(doc, config)).toEqual({ url: 'https://cdn.test/og.jpg', source: 'og-image' });
  });

  it('ignores background shorthand when looking for a banner', () => {
    const doc = page(OG_IMAGE, '<div style="background: url(https://cdn.test/short.jpg)"></div>');
    expect(resolveBanner(doc, config)).toBe('https://cdn.test/og.jpg');
  });

  it('normalizes protocol-relative og:image values', () => {
    const doc = page('<meta property="og:image" content="//cdn.test/og.png">', '<p>text</p>');
    expect(resolveBanner(doc, config)).toBe('https://cdn.test/og.png');
  });

  it('returns null when no signal exists', () => {
    const doc = page('<title>No banner</title>', '<p>text</p><img src="https://cdn.test/body.png">');
    expect(detectBanner(doc, config)).toBeNull();
  });

  it('honours configured banner selectors', () => {
    const doc = page(OG_IMAGE, '<div class="hero"><img src="https://cdn.test/hero.png"></div>');
    expect(resolveBanner(doc, { bannerSelectors: ['.hero'] })).toBe('https://cdn.test/hero.png');
  });

  it('skips invalid selectors', () => {
    const doc = page(OG_IMAGE, '<p>text</p>');
    expect(resolveBanner(doc, { bannerSelectors: ['[[['] })).toBe('https://cdn.test/og.jpg');
  });
});
