/**
 * Tests for credentials providers and key-file parsing
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ChainCredentialsProvider,
  EnvironmentCredentialsProvider,
  KeyFileCredentialsProvider,
  StaticCredentialsProvider,
  decodeBase64Secret,
  parseBearerTokenFile,
  parseKeyPairFile,
  requireBearer,
  requireKeyPair,
} from '../provider.js';
import { SecretString } from '../secret.js';
import { ConfigurationError } from '../../errors/index.js';

describe('decodeBase64Secret', () => {
  it('should decode base64 that yields printable text', () => {
    // "test-secret"
    expect(decodeBase64Secret('dGVzdC1zZWNyZXQ=')).toBe('test-secret');
  });

  it('should return undefined for values that are not base64', () => {
    expect(decodeBase64Secret('plain-secret!')).toBeUndefined();
  });

  it('should return undefined when the decoded bytes are not printable', () => {
    // bytes 00 01 02
    expect(decodeBase64Secret('AAEC')).toBeUndefined();
  });
});

describe('parseKeyPairFile', () => {
  it('should read both lines and decode the secret', () => {
    const credentials = parseKeyPairFile(
      'AccessKeyId: test-access-key\nSecretAccessKey: dGVzdC1zZWNyZXQ=\n'
    );

    expect(credentials?.accessKeyId).toBe('test-access-key');
    expect(credentials?.secretAccessKey.expose()).toBe('test-secret');
  });

  it('should use a secret that is not base64 as-is', () => {
    const credentials = parseKeyPairFile(
      '  AccessKeyId:test-access-key  \r\nSecretAccessKey: plain_secret!\r\n'
    );

    expect(credentials?.accessKeyId).toBe('test-access-key');
    expect(credentials?.secretAccessKey.expose()).toBe('plain_secret!');
  });

  it('should return undefined when a line is missing', () => {
    expect(parseKeyPairFile('AccessKeyId: test-access-key\n')).toBeUndefined();
  });
});

describe('parseBearerTokenFile', () => {
  it('should trim the token', () => {
    expect(parseBearerTokenFile('  test-token\n')?.token.expose()).toBe('test-token');
  });

  it('should treat blank and comment files as missing', () => {
    expect(parseBearerTokenFile('  \n')).toBeUndefined();
    expect(parseBearerTokenFile('# put your key here\n')).toBeUndefined();
  });
});

describe('EnvironmentCredentialsProvider', () => {
  it('should read both credential halves', async () => {
    const provider = new EnvironmentCredentialsProvider({
      VOLC_ACCESS_KEY_ID: 'test-access-key',
      VOLC_SECRET_ACCESS_KEY: 'test-secret',
      ARK_API_KEY: 'test-token',
    });

    const credentials = await provider.getCredentials();

    expect(credentials.keyPair?.accessKeyId).toBe('test-access-key');
    expect(credentials.keyPair?.secretAccessKey.expose()).toBe('test-secret');
    expect(credentials.bearer?.token.expose()).toBe('test-token');
  });

  it('should leave out an incomplete key pair', async () => {
    const credentials = await new EnvironmentCredentialsProvider({
      VOLC_ACCESS_KEY_ID: 'test-access-key',
    }).getCredentials();

    expect(credentials.keyPair).toBeUndefined();
    expect(credentials.bearer).toBeUndefined();
  });
});

describe('KeyFileCredentialsProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'videogen-keys-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load credentials from files', async () => {
    const keyPairFile = join(dir, 'keys.txt');
    const bearerTokenFile = join(dir, 'API-KEY.txt');
    await writeFile(keyPairFile, 'AccessKeyId: test-access-key\nSecretAccessKey: dGVzdC1zZWNyZXQ=\n');
    await writeFile(bearerTokenFile, 'test-token\n');

    const credentials = await new KeyFileCredentialsProvider({
      keyPairFile,
      bearerTokenFile,
    }).getCredentials();

    expect(credentials.keyPair?.secretAccessKey.expose()).toBe('test-secret');
    expect(credentials.bearer?.token.expose()).toBe('test-token');
  });

  it('should treat absent files as missing credentials', async () => {
    const credentials = await new KeyFileCredentialsProvider({
      keyPairFile: join(dir, 'absent.txt'),
      bearerTokenFile: join(dir, 'absent-token.txt'),
    }).getCredentials();

    expect(credentials).toEqual({ keyPair: undefined, bearer: undefined });
  });
});

describe('ChainCredentialsProvider', () => {
  it('should take each half from the first provider that has it', async () => {
    const chain = new ChainCredentialsProvider([
      new StaticCredentialsProvider({ bearer: { token: new SecretString('first-token') } }),
      new StaticCredentialsProvider({
        keyPair: { accessKeyId: 'test-access-key', secretAccessKey: new SecretString('test-secret') },
        bearer: { token: new SecretString('second-token') },
      }),
    ]);

    const credentials = await chain.getCredentials();

    expect(credentials.bearer?.token.expose()).toBe('first-token');
    expect(credentials.keyPair?.accessKeyId).toBe('test-access-key');
  });
});

describe('requireKeyPair / requireBearer', () => {
  it('should throw ConfigurationError for missing halves', () => {
    expect(() => requireKeyPair({})).toThrow(ConfigurationError);
    expect(() => requireBearer({})).toThrow(ConfigurationError);
  });
});

describe('SecretString', () => {
  it('should redact itself when serialized', () => {
    const secret = new SecretString('test-secret');
    expect(String(secret)).toBe('[REDACTED]');
    expect(JSON.stringify({ secret })).toBe('{"secret":"[REDACTED]"}');
  });
});
