/**
 * Signing key derivation for HMAC-SHA256 request signing
 */

import { hmacSha256, toBytes } from './crypto.js';
import type { SigningScope } from './types.js';

/**
 * Terminator of the derivation chain and of the credential scope
 */
export const SCOPE_TERMINATOR = 'request';

/**
 * Derive the signing key using HMAC-SHA256 chaining
 * kDate    = HMAC-SHA256(secretKey, date)
 * kRegion  = HMAC-SHA256(kDate, region)
 * kService = HMAC-SHA256(kRegion, service)
 * kSigning = HMAC-SHA256(kService, "request")
 *
 * The key is valid for one date only and is derived again for every request.
 */
export function deriveSigningKey(
  secretKey: string | Uint8Array,
  scope: SigningScope
): Uint8Array {
  const kDate = hmacSha256(toBytes(secretKey), scope.date);
  const kRegion = hmacSha256(kDate, scope.region);
  const kService = hmacSha256(kRegion, scope.service);
  return hmacSha256(kService, SCOPE_TERMINATOR);
}

/**
 * Credential scope string: {date}/{region}/{service}/request
 */
export function formatCredentialScope(scope: SigningScope): string {
  return `${scope.date}/${scope.region}/${scope.service}/${SCOPE_TERMINATOR}`;
}
