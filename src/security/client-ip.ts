import { isIP } from 'net';
import * as ipaddr from 'ipaddr.js';

export type HeaderValue = string | string[] | undefined;
export type RequestHeaders = Record<string, HeaderValue>;

export const FALLBACK_CLIENT_IP = '0.0.0.0';

/**
 * Proxy headers checked for the client address, in priority order
 */
export const CLIENT_IP_HEADERS = [
  'cf-connecting-ip', // Cloudflare
  'x-forwarded-for', // Standard proxy header
  'x-forwarded', // Alternative proxy header
  'x-cluster-client-ip', // Cluster environments
  'forwarded-for', // RFC 7239 variants
  'forwarded',
] as const;

/**
 * Reads a header by lowercase name, taking the first value of repeated headers
 */
export function getHeader(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value[0];
  return value;
}

/**
 * True for a syntactically valid address outside private and reserved ranges
 */
export function isPublicIp(candidate: string): boolean {
  if (isIP(candidate) === 0) return false;
  // Normalizes IPv4-mapped IPv6 (::ffff:a.b.c.d) to IPv4
  return ipaddr.process(candidate).range() === 'unicast';
}

/**
 * Pulls the address out of one header value: the first comma-separated
 * entry, with RFC 7239 `for=` syntax, quotes, brackets and ports removed.
 */
export function extractCandidateIp(headerValue: string): string {
  let entry = headerValue.split(',')[0].trim();

  const forParam = entry
    .split(';')
    .map(part => part.trim())
    .find(part => part.toLowerCase().startsWith('for='));
  if (forParam) {
    entry = forParam.slice('for='.length);
  }

  entry = entry.replace(/^"|"$/g, '');

  const bracketed = entry.match(/^\[([^\]]+)\](?::\d+)?$/);
  if (bracketed) return bracketed[1];

  // IPv4 with port
  const withPort = entry.match(/^(\d{1,3}(?:\.\d{1,3}){3}):\d+$/);
  if (withPort) return withPort[1];

  return entry;
}

/**
 * Resolves the real client address from proxy headers, falling back to the
 * direct connection address
 */
export function resolveClientIp(headers: RequestHeaders, remoteAddress?: string): string {
  for (const header of CLIENT_IP_HEADERS) {
    const value = getHeader(headers, header);
    if (!value) continue;

    const candidate = extractCandidateIp(value);
    if (isPublicIp(candidate)) {
      return candidate;
    }
  }

  return remoteAddress || FALLBACK_CLIENT_IP;
}
