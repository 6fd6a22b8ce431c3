import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_EXTRACTION_CONFIG,
  parseExtractionConfigJson,
  loadExtractionConfig,
  getExtractionConfig,
  mergeExtractionConfig,
  resolveExtractionConfigPath,
} from '../config/extraction-config.js';

describe('parseExtractionConfigJson', () => {
  it('merges defaults over the built-in config', () => {
    const file = parseExtractionConfigJson({ defaults: { noiseMarkers: ['Promo'] } });
    expect(file.defaults.noiseMarkers).toEqual(['Promo']);
    expect(file.defaults.bannerSelectors).toEqual(['.wrapper-banner-image']);
    expect(file.sites).toEqual({});
  });

  it('compiles patterns case-insensitively', () => {
    const file = parseExtractionConfigJson({ defaults: { noisePatterns: ['/headshots/'] } });
    expect(file.defaults.noisePatterns).toHaveLength(1);
    expect(file.defaults.noisePatterns[0].test('/TEAM/Headshots/1.png')).toBe(true);
  });

  it('skips invalid site entries and keeps valid ones', () => {
    const file = parseExtractionConfigJson({
      sites: {
        'Good.Test': { bannerSelectors: ['.hero'] },
        'bad.test': { noisePatterns: ['('] },
        'worse.test': { canonicalAssetUrls: 'yes' },
      },
    });
    expect(Object.keys(file.sites)).toEqual(['good.test']);
  });

  it('ignores unknown fields', () => {
    const file = parseExtractionConfigJson({ sites: { 'a.test': { notes: 'x', noiseMarkers: ['M'] } } });
    expect(file.sites['a.test']).toEqual({ noiseMarkers: ['M'] });
  });

  it('throws on invalid defaults', () => {
    expect(() => parseExtractionConfigJson({ defaults: { rootClassNames: 'content' } })).toThrow(
      /Invalid extraction config/
    );
  });
});

describe('getExtractionConfig', () => {
  const file = parseExtractionConfigJson({
    sites: { 'news.test': { bannerSelectors: ['.hero'], canonicalAssetUrls: true } },
  });

  it('returns defaults without a URL', () => {
    expect(getExtractionConfig(file).bannerSelectors).toEqual(['.wrapper-banner-image']);
  });

  it('matches the hostname without www.', () => {
    const config = getExtractionConfig(file, 'https://www.news.test/post');
    expect(config.bannerSelectors).toEqual(['.hero']);
    expect(config.canonicalAssetUrls).toBe(true);
    expect(config.rootClassNames).toEqual(DEFAULT_EXTRACTION_CONFIG.rootClassNames);
  });

  it('matches parent domains', () => {
    expect(getExtractionConfig(file, 'https://blog.news.test/x').bannerSelectors).toEqual(['.hero']);
  });

  it('falls back to defaults for unknown hosts and invalid URLs', () => {
    expect(getExtractionConfig(file, 'https://other.test/').bannerSelectors).toEqual([
      '.wrapper-banner-image',
    ]);
    expect(getExtractionConfig(file, 'not a url').canonicalAssetUrls).toBe(false);
  });
});

describe('mergeExtractionConfig', () => {
  it('copies the base when there is no override', () => {
    const merged = mergeExtractionConfig(DEFAULT_EXTRACTION_CONFIG, undefined);
    expect(merged).toEqual(DEFAULT_EXTRACTION_CONFIG);
    expect(merged).not.toBe(DEFAULT_EXTRACTION_CONFIG);
  });
});

describe('loadExtractionConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('returns defaults when the file does not exist', () => {
    const file = loadExtractionConfig(join(tmpdir(), 'missing-extraction-config.json'));
    expect(file.defaults).toEqual(DEFAULT_EXTRACTION_CONFIG);
    expect(file.sites).toEqual({});
  });

  it('reads the repository config file', () => {
    const file = loadExtractionConfig(resolveExtractionConfigPath());
    expect(file.defaults.rootClassNames).toContain('entry-content');
    expect(file.sites['news.example.org']?.bannerSelectors).toEqual([
      '.wrapper-banner-image',
      '.hero-image',
    ]);
  });

  it('throws on malformed JSON', () => {
    dir = mkdtempSync(join(tmpdir(), 'extraction-config-'));
    const path = join(dir, 'extraction.json');
    writeFileSync(path, '{ not json');
    expect(() => loadExtractionConfig(path)).toThrow(/Failed to read extraction config/);
  });

  it('loads a custom file', () => {
    dir = mkdtempSync(join(tmpdir(), 'extraction-config-'));
    const path = join(dir, 'extraction.json');
    writeFileSync(path, JSON.stringify({ defaults: { noiseKeywords: ['staff'] } }));
    expect(loadExtractionConfig(path).defaults.noiseKeywords).toEqual(['staff']);
  });
});
