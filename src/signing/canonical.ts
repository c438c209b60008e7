/**
 * Canonical request construction for HMAC-SHA256 signing
 *
 * The canonical request is whitespace-exact: any deviation from the layout
 * below produces a signature the service rejects.
 */

import { SigningError } from '../errors/index.js';
import { sha256Hex } from './crypto.js';
import type { CanonicalRequest, SignableRequest } from './types.js';

/**
 * URI encode following RFC 3986
 * Unreserved characters (A-Z a-z 0-9 - _ . ~) are kept, everything else is
 * percent-encoded as UTF-8 bytes. Space becomes %20, never '+'.
 */
export function uriEncode(str: string): string {
  let encoded = '';
  for (const char of str) {
    const code = char.charCodeAt(0);

    if (
      (code >= 0x41 && code <= 0x5a) || // A-Z
      (code >= 0x61 && code <= 0x7a) || // a-z
      (code >= 0x30 && code <= 0x39) || // 0-9
      code === 0x2d || // -
      code === 0x5f || // _
      code === 0x2e || // .
      code === 0x7e // ~
    ) {
      encoded += char;
    } else {
      const utf8 = new TextEncoder().encode(char);
      for (const byte of utf8) {
        encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
      }
    }
  }
  return encoded;
}

/**
 * Decode a form-style query component ('+' is a space)
 */
function decodeQueryComponent(component: string): string {
  try {
    return decodeURIComponent(component.replace(/\+/g, ' '));
  } catch (error) {
    throw new SigningError(
      `Malformed percent-encoding in query component: ${component}`,
      'INVALID_QUERY',
      error
    );
  }
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Get canonical URI from path
 */
export function getCanonicalUri(path: string): string {
  if (!path) {
    return '/';
  }

  let normalized = path.startsWith('/') ? path : '/' + path;
  normalized = normalized.replace(/\/+/g, '/');

  return normalized
    .split('/')
    .map((segment) => uriEncode(decodePathSegment(segment)))
    .join('/');
}

/**
 * Get canonical query string
 * Pairs are decoded, re-encoded independently, then sorted by key and value.
 */
export function getCanonicalQueryString(query: string): string {
  const raw = query.startsWith('?') ? query.substring(1) : query;
  if (!raw) {
    return '';
  }

  const params: Array<[string, string]> = [];

  for (const pair of raw.split('&')) {
    if (!pair) continue;

    const idx = pair.indexOf('=');
    const key = idx === -1 ? pair : pair.substring(0, idx);
    const value = idx === -1 ? '' : pair.substring(idx + 1);
    params.push([
      uriEncode(decodeQueryComponent(key)),
      uriEncode(decodeQueryComponent(value)),
    ]);
  }

  params.sort((a, b) => {
    if (a[0] < b[0]) return -1;
    if (a[0] > b[0]) return 1;
    if (a[1] < b[1]) return -1;
    if (a[1] > b[1]) return 1;
    return 0;
  });

  return params.map(([key, value]) => `${key}=${value}`).join('&');
}

function sortedHeaderEntries(headers: Record<string, string>): Array<[string, string]> {
  return Object.entries(headers)
    .map(([name, value]): [string, string] => [name.toLowerCase(), value])
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Get canonical headers
 * One `name:value\n` line per header, names lowercased and sorted
 */
export function getCanonicalHeaders(headers: Record<string, string>): string {
  return sortedHeaderEntries(headers)
    .map(([name, value]) => `${name}:${value.trim().replace(/\s+/g, ' ')}\n`)
    .join('');
}

/**
 * Get signed headers (semicolon-separated list of lowercase header names)
 */
export function getSignedHeaders(headers: Record<string, string>): string {
  return sortedHeaderEntries(headers)
    .map(([name]) => name)
    .join(';');
}

/**
 * Hash the payload; an absent body hashes the empty string
 */
export function hashPayload(body?: string | Uint8Array): string {
  return sha256Hex(body ?? '');
}

/**
 * Parse a request URL, failing with a SigningError
 */
export function parseRequestUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (error) {
    throw new SigningError(`Cannot sign request with malformed URL: ${url}`, 'INVALID_URL', error);
  }
}

/**
 * Create the canonical request
 * Format:
 * HTTP_METHOD\n
 * CANONICAL_URI\n
 * CANONICAL_QUERY_STRING\n
 * CANONICAL_HEADERS\n   (each header line already ends in \n)
 * SIGNED_HEADERS\n
 * PAYLOAD_HASH
 *
 * The headers must already contain every header that is to be signed.
 */
export function buildCanonicalRequest(request: SignableRequest): CanonicalRequest {
  const url = parseRequestUrl(request.url);
  const payloadHash = hashPayload(request.body);
  const signedHeaders = getSignedHeaders(request.headers);

  const canonicalRequest = [
    request.method.toUpperCase(),
    getCanonicalUri(url.pathname),
    getCanonicalQueryString(url.search),
    getCanonicalHeaders(request.headers),
    signedHeaders,
    payloadHash,
  ].join('\n');

  return { canonicalRequest, signedHeaders, payloadHash };
}
