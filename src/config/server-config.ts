/**
 * Runtime configuration from environment variables
 */
import { z } from 'zod';
import type { PageFetchOptions } from '../fetch/types.js';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, MAX_HTML_SIZE_BYTES } from '../fetch/page-fetcher.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  SCRAPE_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  ALLOW_PRIVATE_HOSTS: booleanFlag,
  MAX_HTML_BYTES: z.coerce.number().int().positive().default(MAX_HTML_SIZE_BYTES),
  EXTRACTION_CONFIG: z.string().min(1).optional(),
});

export interface ServerConfig {
  port: number;
  host: string;
  fetch: Required<PageFetchOptions>;
  extractionConfigPath?: string;
}

/** Parse runtime config from the environment. Throws on invalid values. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment configuration:\n${issues.join('\n')}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    fetch: {
      timeoutMs: vars.SCRAPE_TIMEOUT_MS,
      userAgent: vars.SCRAPE_USER_AGENT,
      maxBytes: vars.MAX_HTML_BYTES,
      allowPrivateHosts: vars.ALLOW_PRIVATE_HOSTS,
    },
    extractionConfigPath: vars.EXTRACTION_CONFIG,
  };
}
