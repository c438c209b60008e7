/**
 * Credentials for signed and token-authenticated services
 * @module volcengine-video-jobs/auth
 */

export type {
  KeyPairCredentials,
  BearerCredentials,
  Credentials,
  CredentialsProvider,
} from './types.js';

export { SecretString } from './secret.js';

export {
  StaticCredentialsProvider,
  EnvironmentCredentialsProvider,
  KeyFileCredentialsProvider,
  ChainCredentialsProvider,
  type KeyFileLocations,
  parseKeyPairFile,
  parseBearerTokenFile,
  loadKeyPairFile,
  loadBearerTokenFile,
  decodeBase64Secret,
  requireKeyPair,
  requireBearer,
} from './provider.js';
