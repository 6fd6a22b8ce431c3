#!/usr/bin/env node
/**
 * CLI entry point for blog-scraper
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { scrapeBlog } from './scrape.js';
import { toScrapeResponse } from './extract/types.js';
import { loadExtractionConfig } from './config/extraction-config.js';
import { loadServerConfig } from './config/server-config.js';
import { startServer } from './server.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export type OutputMode = 'json' | 'html' | 'images';

interface SharedFlags {
  timeout?: number;
  allowPrivate: boolean;
}

type SharedFlagResult = { handled: true; index: number } | { handled: false } | { error: string };

function parseSharedFlag(args: string[], i: number, flags: SharedFlags): SharedFlagResult {
  switch (args[i]) {
    case '--timeout': {
      if (i + 1 >= args.length) return { error: '--timeout requires a value' };
      const v = parseInt(args[++i], 10);
      if (isNaN(v) || v <= 0)
        return { error: '--timeout must be a positive integer (milliseconds)' };
      flags.timeout = v;
      return { handled: true, index: i };
    }
    case '--allow-private':
      flags.allowPrivate = true;
      return { handled: true, index: i };
    default:
      return { handled: false };
  }
}

export interface CliOptions extends SharedFlags {
  url: string;
  output: OutputMode;
}

export interface ServeOptions extends SharedFlags {
  port?: number;
  host?: string;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'serve'; opts: ServeOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

function parseServeArgs(args: string[]): ParseResult {
  const warnings: string[] = [];
  const opts: ServeOptions = { allowPrivate: false };

  for (let i = 0; i < args.length; i++) {
    const shared = parseSharedFlag(args, i, opts);
    if ('error' in shared) return { kind: 'error', message: shared.error };
    if (shared.handled) {
      i = shared.index;
      continue;
    }

    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '--port': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--port requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v < 1 || v > 65535)
          return { kind: 'error', message: '--port must be an integer between 1 and 65535' };
        opts.port = v;
        break;
      }
      case '--host':
        if (i + 1 >= args.length) return { kind: 'error', message: '--host requires a value' };
        opts.host = args[++i];
        break;
      default:
        warnings.push(`Unknown option: ${arg}`);
    }
  }

  return { kind: 'serve', opts, warnings };
}

export function parseArgs(args: string[]): ParseResult {
  if (args[0] === 'serve') return parseServeArgs(args.slice(1));

  const positional: string[] = [];
  const warnings: string[] = [];
  const flags: SharedFlags = { allowPrivate: false };
  let output: OutputMode = 'json';

  for (let i = 0; i < args.length; i++) {
    const shared = parseSharedFlag(args, i, flags);
    if ('error' in shared) return { kind: 'error', message: shared.error };
    if (shared.handled) {
      i = shared.index;
      continue;
    }

    const arg = args[i];
    switch (arg) {
      case '--html':
        output = 'html';
        break;
      case '--images':
        output = 'images';
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument' };
  }

  return { kind: 'ok', opts: { url: positional[0], output, ...flags }, warnings };
}

function printUsage(): void {
  console.log(`Usage: blog-scraper <url> [options]
       blog-scraper serve [serve-options]

Prints the extracted article as JSON (title, content_html, images, image_names, image_url_map).

Options:
  --html              Print only the sanitized content HTML
  --images            Print one "filename<TAB>url" line per image
  --timeout <ms>      Request timeout in milliseconds (default: 20000)
  --allow-private     Allow fetching private/internal hosts
  -v, --version       Show version number
  -h, --help          Show this help message

Serve options:
  --port <n>          Port to listen on (env: PORT, default: 5000)
  --host <host>       Interface to bind (env: HOST, default: 0.0.0.0)`);
}

/** Run the CLI and return the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(argv);

  switch (result.kind) {
    case 'version':
      console.log(`blog-scraper ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  for (const warning of result.warnings) {
    console.error(`Warning: ${warning}`);
  }

  const config = loadServerConfig();
  const { opts } = result;
  const fetchOptions = {
    ...config.fetch,
    timeoutMs: opts.timeout ?? config.fetch.timeoutMs,
    allowPrivateHosts: config.fetch.allowPrivateHosts || opts.allowPrivate,
  };

  if (result.kind === 'serve') {
    await startServer({
      ...config,
      port: result.opts.port ?? config.port,
      host: result.opts.host ?? config.host,
      fetch: fetchOptions,
    });
    return 0;
  }

  const outcome = await scrapeBlog(result.opts.url, {
    ...fetchOptions,
    extractionConfig: loadExtractionConfig(config.extractionConfigPath),
  });

  if (!outcome.success) {
    console.error(`Error: ${outcome.error}: ${outcome.message}`);
    return 1;
  }

  const response = toScrapeResponse(outcome.extraction);
  switch (result.opts.output) {
    case 'html':
      console.log(response.content_html);
      break;
    case 'images':
      for (const name of response.image_names) {
        console.log(`${name}\t${response.image_url_map[name]}`);
      }
      break;
    default:
      console.log(JSON.stringify(response, null, 2));
  }
  return 0;
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exitCode = 1;
    });
}
