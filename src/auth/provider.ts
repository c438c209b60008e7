/**
 * Credentials provider implementations
 * @module volcengine-video-jobs/auth/provider
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors/index.js';
import { SecretString } from './secret.js';
import type {
  BearerCredentials,
  Credentials,
  CredentialsProvider,
  KeyPairCredentials,
} from './types.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Decode a base64-encoded secret. Returns undefined when the value is not
 * base64 or does not decode to printable UTF-8.
 */
export function decodeBase64Secret(value: string): string | undefined {
  if (value.length % 4 !== 0 || !BASE64_PATTERN.test(value)) {
    return undefined;
  }

  let decoded: string;
  try {
    decoded = new TextDecoder('utf-8', { fatal: true }).decode(Buffer.from(value, 'base64'));
  } catch {
    return undefined;
  }

  if (decoded === '' || CONTROL_CHARS.test(decoded)) {
    return undefined;
  }
  return decoded;
}

/**
 * Parse a key-pair file.
 *
 * ```
 * AccessKeyId: AKLT...
 * SecretAccessKey: <base64 or plain>
 * ```
 *
 * Returns undefined when either line is missing or empty.
 */
export function parseKeyPairFile(content: string): KeyPairCredentials | undefined {
  let accessKeyId: string | undefined;
  let secret: string | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('AccessKeyId:')) {
      accessKeyId = line.substring('AccessKeyId:'.length).trim();
    } else if (line.startsWith('SecretAccessKey:')) {
      const encoded = line.substring('SecretAccessKey:'.length).trim();
      secret = decodeBase64Secret(encoded) ?? encoded;
    }
  }

  if (!accessKeyId || !secret) {
    return undefined;
  }
  return { accessKeyId, secretAccessKey: new SecretString(secret) };
}

/**
 * Parse a bearer token file: the trimmed content. Blank files and files
 * holding only a '#' comment count as missing.
 */
export function parseBearerTokenFile(content: string): BearerCredentials | undefined {
  const token = content.trim();
  if (!token || token.startsWith('#')) {
    return undefined;
  }
  return { token: new SecretString(token) };
}

async function readOptionalFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigurationError({
      message: `Failed to read credentials file: ${path}`,
      code: 'CREDENTIALS_FILE_UNREADABLE',
      details: { path },
      cause: error,
    });
  }
}

/**
 * Load a key pair from a file; undefined when the file is absent or incomplete
 */
export async function loadKeyPairFile(path: string): Promise<KeyPairCredentials | undefined> {
  const content = await readOptionalFile(path);
  return content === undefined ? undefined : parseKeyPairFile(content);
}

/**
 * Load a bearer token from a file; undefined when the file is absent or blank
 */
export async function loadBearerTokenFile(path: string): Promise<BearerCredentials | undefined> {
  const content = await readOptionalFile(path);
  return content === undefined ? undefined : parseBearerTokenFile(content);
}

/**
 * Static credentials provider using fixed credentials.
 */
export class StaticCredentialsProvider implements CredentialsProvider {
  private readonly credentials: Credentials;

  constructor(credentials: Credentials) {
    this.credentials = credentials;
  }

  async getCredentials(): Promise<Credentials> {
    return { ...this.credentials };
  }
}

/**
 * Environment-based credentials provider.
 *
 * - VOLC_ACCESS_KEY_ID / VOLC_SECRET_ACCESS_KEY: key pair for signed services
 * - ARK_API_KEY: bearer token for token-authenticated services
 */
export class EnvironmentCredentialsProvider implements CredentialsProvider {
  static readonly ENV_VARS = {
    ACCESS_KEY_ID: 'VOLC_ACCESS_KEY_ID',
    SECRET_ACCESS_KEY: 'VOLC_SECRET_ACCESS_KEY',
    API_KEY: 'ARK_API_KEY',
  } as const;

  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  async getCredentials(): Promise<Credentials> {
    const vars = EnvironmentCredentialsProvider.ENV_VARS;
    const accessKeyId = this.env[vars.ACCESS_KEY_ID]?.trim();
    const secretAccessKey = this.env[vars.SECRET_ACCESS_KEY]?.trim();
    const token = this.env[vars.API_KEY]?.trim();

    return {
      keyPair:
        accessKeyId && secretAccessKey
          ? { accessKeyId, secretAccessKey: new SecretString(secretAccessKey) }
          : undefined,
      bearer: token ? { token: new SecretString(token) } : undefined,
    };
  }
}

export interface KeyFileLocations {
  /** File with `AccessKeyId:` and `SecretAccessKey:` lines */
  keyPairFile?: string;
  /** File holding only the bearer token */
  bearerTokenFile?: string;
}

/**
 * Reads credentials from key files on every call
 */
export class KeyFileCredentialsProvider implements CredentialsProvider {
  private readonly locations: KeyFileLocations;

  constructor(locations: KeyFileLocations) {
    this.locations = locations;
  }

  async getCredentials(): Promise<Credentials> {
    const { keyPairFile, bearerTokenFile } = this.locations;
    return {
      keyPair: keyPairFile ? await loadKeyPairFile(keyPairFile) : undefined,
      bearer: bearerTokenFile ? await loadBearerTokenFile(bearerTokenFile) : undefined,
    };
  }
}

/**
 * Combines providers; for each half of the credentials the first provider
 * that supplies it wins
 */
export class ChainCredentialsProvider implements CredentialsProvider {
  private readonly providers: CredentialsProvider[];

  constructor(providers: CredentialsProvider[]) {
    this.providers = providers;
  }

  async getCredentials(): Promise<Credentials> {
    let keyPair: KeyPairCredentials | undefined;
    let bearer: BearerCredentials | undefined;

    for (const provider of this.providers) {
      if (keyPair && bearer) break;
      const credentials = await provider.getCredentials();
      keyPair = keyPair ?? credentials.keyPair;
      bearer = bearer ?? credentials.bearer;
    }

    return { keyPair, bearer };
  }
}

/**
 * Require the key pair, failing with a ConfigurationError
 */
export function requireKeyPair(credentials: Credentials): KeyPairCredentials {
  if (!credentials.keyPair) {
    throw ConfigurationError.missingCredentials('keyPair');
  }
  return credentials.keyPair;
}

/**
 * Require the bearer token, failing with a ConfigurationError
 */
export function requireBearer(credentials: Credentials): BearerCredentials {
  if (!credentials.bearer) {
    throw ConfigurationError.missingCredentials('bearerToken');
  }
  return credentials.bearer;
}
