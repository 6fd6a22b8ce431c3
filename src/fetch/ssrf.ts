/**
 * SSRF guard for outbound page fetches.
 * Rejects URLs whose host is, or resolves to, a private/internal address.
 */
import { promises as dns } from 'dns';
import { isIP } from 'net';
import { logger } from '../logger.js';

const DNS_TIMEOUT_MS = 5000;

export class SsrfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SsrfError';
  }
}

/** Check if an IP address is private/internal. */
export function isPrivateIP(ip: string): boolean {
  const ipv4Private = [
    /^0\./, // 0.0.0.0/8 - "this network"
    /^127\./, // 127.0.0.0/8 - localhost
    /^10\./, // 10.0.0.0/8 - private
    /^172\.(1[6-9]|2[0-9]|3[01])\./, // 172.16.0.0/12 - private
    /^192\.168\./, // 192.168.0.0/16 - private
    /^169\.254\./, // 169.254.0.0/16 - link-local
  ];

  const ipv6Private = [
    /^::$/, // unspecified
    /^::1$/, // localhost
    /^fe80:/i, // link-local
    /^fc00:/i, // private
    /^fd00:/i, // private
  ];

  // IPv4-mapped IPv6 (::ffff:x.x.x.x, or ::ffff:7f00:1 as the URL parser writes it)
  if (ip.toLowerCase().startsWith('::ffff:')) {
    const ipv4Part = mappedIPv4(ip.substring(7));
    return ipv4Private.some((pattern) => pattern.test(ipv4Part));
  }

  const patterns = ip.includes(':') ? ipv6Private : ipv4Private;
  return patterns.some((pattern) => pattern.test(ip));
}

function mappedIPv4(tail: string): string {
  const hex = /^([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i.exec(tail);
  if (!hex) return tail;
  const high = parseInt(hex[1], 16);
  const low = parseInt(hex[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

/** Strip the brackets URL hostnames put around IPv6 literals. */
function bareHostname(url: string): string {
  return new URL(url).hostname.replace(/^\[|\]$/g, '');
}

/**
 * Resolve the URL's hostname and throw SsrfError if any address is private.
 * DNS failures are not SSRF errors: the fetch itself reports them.
 */
export async function validateSsrf(url: string): Promise<string[]> {
  const hostname = bareHostname(url);

  if (isIP(hostname)) {
    if (isPrivateIP(hostname)) {
      throw new SsrfError(`SSRF protection: hostname ${hostname} is a private IP`);
    }
    return [hostname];
  }

  const [ipv4Result, ipv6Result] = await Promise.allSettled([
    dns.resolve4(hostname),
    dns.resolve6(hostname),
  ]);

  const addresses: string[] = [];
  if (ipv4Result.status === 'fulfilled') addresses.push(...ipv4Result.value);
  if (ipv6Result.status === 'fulfilled') addresses.push(...ipv6Result.value);

  if (addresses.length === 0) {
    logger.debug({ hostname }, 'DNS resolution failed for both IPv4 and IPv6');
    return [];
  }

  for (const ip of addresses) {
    if (isPrivateIP(ip)) {
      throw new SsrfError(`SSRF protection: hostname ${hostname} resolves to private IP ${ip}`);
    }
  }
  return addresses;
}

/** validateSsrf with a bound on slow DNS lookups. */
export function validateSsrfWithTimeout(url: string, timeoutMs = DNS_TIMEOUT_MS): Promise<string[]> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error('DNS resolution timed out')), timeoutMs);
  });
  return Promise.race([validateSsrf(url), timeout]).finally(() => clearTimeout(timeoutId));
}
