/**
 * Credential type definitions
 * @module volcengine-video-jobs/auth/types
 */

import type { SecretString } from './secret.js';

/**
 * Access key pair for services that require keyed-hash signatures
 */
export interface KeyPairCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: SecretString;
}

/**
 * Static API token for bearer-authenticated services
 */
export interface BearerCredentials {
  readonly token: SecretString;
}

/**
 * Credentials available to the process. Either half may be absent; the
 * operation that needs a missing half fails with a ConfigurationError.
 */
export interface Credentials {
  readonly keyPair?: KeyPairCredentials;
  readonly bearer?: BearerCredentials;
}

/**
 * Supplier of process credentials
 */
export interface CredentialsProvider {
  getCredentials(): Promise<Credentials>;
}
