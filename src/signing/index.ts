/**
 * HMAC-SHA256 request signing
 *
 * - Canonical request construction
 * - Four-stage signing key derivation (date, region, service, "request")
 * - Authorization header generation
 *
 * Signing keys are derived for every request and never cached.
 */

export type {
  SignableRequest,
  SignedRequest,
  SigningScope,
  CanonicalRequest,
} from './types.js';

export {
  RequestSigner,
  type RequestSignerConfig,
  SIGNING_ALGORITHM,
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  DEFAULT_CONTENT_TYPE,
} from './signer.js';

export { hmacSha256, sha256Hex, toBytes, toHex, type ByteInput } from './crypto.js';

export {
  buildCanonicalRequest,
  getCanonicalUri,
  getCanonicalQueryString,
  getCanonicalHeaders,
  getSignedHeaders,
  hashPayload,
  uriEncode,
} from './canonical.js';

export {
  deriveSigningKey,
  formatCredentialScope,
  SCOPE_TERMINATOR,
} from './key-derivation.js';

export { formatDateStamp, formatRequestDate } from './format.js';
