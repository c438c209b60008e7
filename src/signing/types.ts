/**
 * Signing types for HMAC-SHA256 request authentication
 */

/**
 * A request about to be signed
 */
export interface SignableRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
}

/**
 * A signed request. Headers include Host, X-Date, Content-Type and Authorization.
 */
export interface SignedRequest extends SignableRequest {
  headers: Record<string, string>;
}

/**
 * Binds a derived key to one day, one region and one service
 */
export interface SigningScope {
  /** YYYYMMDD */
  date: string;
  region: string;
  service: string;
}

/**
 * Canonical form of a request plus the header list it covers
 */
export interface CanonicalRequest {
  canonicalRequest: string;
  signedHeaders: string;
  payloadHash: string;
}
