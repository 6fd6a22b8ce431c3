/**
 * Heuristic tables for blog extraction.
 *
 * Built-in defaults are merged with config/extraction.json, which may carry a
 * `defaults` block and a `sites` map of per-hostname overrides.
 */
import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../logger.js';

export interface ExtractionConfig {
  /** Selectors for the wrapper element that carries the hero image */
  bannerSelectors: string[];
  /** Class names that mark the article root when no <article> exists, in priority order */
  rootClassNames: string[];
  /** Case-insensitive substrings in alt/class/src that mark author headshots */
  noiseKeywords: string[];
  /** Literal site-specific markers matched against src and alt */
  noiseMarkers: string[];
  /** Patterns matched against src and alt */
  noisePatterns: RegExp[];
  /** Identify images by their query-less URL so resizer variants share one placeholder */
  canonicalAssetUrls: boolean;
}

export const DEFAULT_EXTRACTION_CONFIG: Readonly<ExtractionConfig> = Object.freeze({
  bannerSelectors: ['.wrapper-banner-image'],
  rootClassNames: ['blog-content', 'post-content', 'entry-content', 'content', 'article-body'],
  noiseKeywords: ['author', 'avatar', 'byline'],
  noiseMarkers: [],
  noisePatterns: [],
  canonicalAssetUrls: false,
});

// --- Zod validation schema ---

const patternSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

export const ExtractionConfigOverrideSchema = z
  .object({
    bannerSelectors: z.array(z.string().min(1)).optional(),
    rootClassNames: z.array(z.string().min(1)).optional(),
    noiseKeywords: z.array(z.string().min(1)).optional(),
    noiseMarkers: z.array(z.string().min(1)).optional(),
    noisePatterns: z.array(patternSource).optional(),
    canonicalAssetUrls: z.boolean().optional(),
  })
  .strip();

export type ExtractionConfigOverride = z.infer<typeof ExtractionConfigOverrideSchema>;

const ExtractionConfigFileSchema = z.object({
  defaults: ExtractionConfigOverrideSchema.optional(),
  sites: z.record(z.string(), z.unknown()).optional(),
});

/** Parsed config file: resolved defaults plus per-site overrides. */
export interface ExtractionConfigFile {
  defaults: ExtractionConfig;
  sites: Record<string, ExtractionConfigOverride>;
}

/** Apply an override on top of a base config. Patterns are compiled case-insensitively. */
export function mergeExtractionConfig(
  base: Readonly<ExtractionConfig>,
  override: ExtractionConfigOverride | undefined
): ExtractionConfig {
  if (!override) return { ...base };
  return {
    bannerSelectors: override.bannerSelectors ?? base.bannerSelectors,
    rootClassNames: override.rootClassNames ?? base.rootClassNames,
    noiseKeywords: override.noiseKeywords ?? base.noiseKeywords,
    noiseMarkers: override.noiseMarkers ?? base.noiseMarkers,
    noisePatterns: override.noisePatterns
      ? override.noisePatterns.map((source) => new RegExp(source, 'i'))
      : base.noisePatterns,
    canonicalAssetUrls: override.canonicalAssetUrls ?? base.canonicalAssetUrls,
  };
}

/**
 * Parse the raw JSON of an extraction config file.
 * An invalid `defaults` block throws; invalid site entries are skipped.
 */
export function parseExtractionConfigJson(raw: unknown): ExtractionConfigFile {
  const file = ExtractionConfigFileSchema.safeParse(raw);
  if (!file.success) {
    throw new Error(`Invalid extraction config: ${file.error.message}`);
  }

  const sites: Record<string, ExtractionConfigOverride> = {};
  for (const [domain, entry] of Object.entries(file.data.sites ?? {})) {
    const parsed = ExtractionConfigOverrideSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn({ domain, error: parsed.error.message }, 'Skipping invalid site extraction config');
      continue;
    }
    sites[domain.toLowerCase()] = parsed.data;
  }

  return {
    defaults: mergeExtractionConfig(DEFAULT_EXTRACTION_CONFIG, file.data.defaults),
    sites,
  };
}

/** Path of the extraction config JSON: EXTRACTION_CONFIG env, else config/extraction.json. */
export function resolveExtractionConfigPath(explicit?: string): string {
  if (explicit) return explicit;
  if (process.env.EXTRACTION_CONFIG) return process.env.EXTRACTION_CONFIG;
  const srcDir = dirname(fileURLToPath(import.meta.url));
  return join(srcDir, '..', '..', 'config', 'extraction.json');
}

/** Load and parse the config file. A missing file yields the built-in defaults. */
export function loadExtractionConfig(path?: string): ExtractionConfigFile {
  const configPath = resolveExtractionConfigPath(path);
  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'Extraction config not found, using defaults');
    return { defaults: { ...DEFAULT_EXTRACTION_CONFIG }, sites: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read extraction config ${configPath}: ${String(error)}`);
  }
  return parseExtractionConfigJson(raw);
}

/**
 * Get the extraction config for a page URL.
 * Matches the hostname without www./m. first, then its parent domains.
 */
export function getExtractionConfig(file: ExtractionConfigFile, url?: string): ExtractionConfig {
  if (!url) return { ...file.defaults };

  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase().replace(/^www\./, '').replace(/^m\./, '');
  } catch {
    return { ...file.defaults };
  }

  if (file.sites[hostname]) {
    return mergeExtractionConfig(file.defaults, file.sites[hostname]);
  }

  const parts = hostname.split('.');
  for (let i = 1; i < parts.length - 1; i++) {
    const candidate = parts.slice(i).join('.');
    if (file.sites[candidate]) {
      return mergeExtractionConfig(file.defaults, file.sites[candidate]);
    }
  }

  return { ...file.defaults };
}
