/**
 * RequestSigner - HMAC-SHA256 request signing
 */

import { SigningError } from '../errors/index.js';
import type { KeyPairCredentials } from '../auth/types.js';
import { hmacSha256, sha256Hex, toHex } from './crypto.js';
import { buildCanonicalRequest, parseRequestUrl } from './canonical.js';
import { formatDateStamp, formatRequestDate } from './format.js';
import { deriveSigningKey, formatCredentialScope } from './key-derivation.js';
import type { SignableRequest, SignedRequest, SigningScope } from './types.js';

export const SIGNING_ALGORITHM = 'HMAC-SHA256';
export const DEFAULT_REGION = 'cn-north-1';
export const DEFAULT_SERVICE = 'cv';
export const DEFAULT_CONTENT_TYPE = 'application/json';

/**
 * Headers the signer always sets; caller values for them are replaced
 */
const INJECTED_HEADERS = ['host', 'x-date', 'content-type', 'authorization'];

export interface RequestSignerConfig {
  credentials: KeyPairCredentials;
  region?: string; // default: "cn-north-1"
  service?: string; // default: "cv"
  contentType?: string; // default: "application/json"
  clock?: () => Date;
}

export class RequestSigner {
  private readonly credentials: KeyPairCredentials;
  private readonly region: string;
  private readonly service: string;
  private readonly contentType: string;
  private readonly clock: () => Date;

  constructor(config: RequestSignerConfig) {
    this.credentials = config.credentials;
    this.region = config.region || DEFAULT_REGION;
    this.service = config.service || DEFAULT_SERVICE;
    this.contentType = config.contentType || DEFAULT_CONTENT_TYPE;
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Scope for a request made at the given instant
   */
  scopeFor(timestamp: Date): SigningScope {
    return {
      date: formatDateStamp(timestamp),
      region: this.region,
      service: this.service,
    };
  }

  /**
   * Sign a request
   * Returns a copy of the request whose headers gain Host, X-Date,
   * Content-Type and Authorization; all other caller headers are kept.
   */
  sign(request: SignableRequest, timestamp?: Date): SignedRequest {
    const accessKeyId = this.credentials.accessKeyId;
    if (!accessKeyId || this.credentials.secretAccessKey.isEmpty()) {
      throw new SigningError(
        'Cannot sign request without an access key ID and secret access key',
        'MISSING_CREDENTIALS'
      );
    }

    const url = parseRequestUrl(request.url);
    const now = timestamp ?? this.clock();
    if (Number.isNaN(now.getTime())) {
      throw new SigningError('Cannot sign request with an invalid timestamp', 'SIGNING_FAILED');
    }
    const requestDate = formatRequestDate(now);
    const scope = this.scopeFor(now);

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      if (!INJECTED_HEADERS.includes(name.toLowerCase())) {
        headers[name] = value;
      }
    }
    headers['Host'] = url.host;
    headers['X-Date'] = requestDate;
    headers['Content-Type'] = this.contentType;

    const { canonicalRequest, signedHeaders } = buildCanonicalRequest({
      method: request.method,
      url: request.url,
      headers,
      body: request.body,
    });

    const credentialScope = formatCredentialScope(scope);
    const stringToSign = [
      SIGNING_ALGORITHM,
      requestDate,
      credentialScope,
      sha256Hex(canonicalRequest),
    ].join('\n');

    const signingKey = deriveSigningKey(this.credentials.secretAccessKey.expose(), scope);
    const signature = toHex(hmacSha256(signingKey, stringToSign));

    headers['Authorization'] = [
      `${SIGNING_ALGORITHM} Credential=${accessKeyId}/${credentialScope}`,
      `SignedHeaders=${signedHeaders}`,
      `Signature=${signature}`,
    ].join(', ');

    return {
      ...request,
      headers,
    };
  }
}
