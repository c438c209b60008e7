/**
 * Tests for canonical request construction
 */

import { describe, it, expect } from 'vitest';
import {
  buildCanonicalRequest,
  getCanonicalHeaders,
  getCanonicalQueryString,
  getCanonicalUri,
  getSignedHeaders,
  hashPayload,
  uriEncode,
} from '../canonical.js';
import { SigningError } from '../../errors/index.js';

const SUBMIT_URL = 'https://visual.volcengineapi.com?Action=CVSubmitTask&Version=2022-08-31';
const SUBJECT_BODY =
  '{"req_key":"realman_avatar_picture_create_role_omni","image_url":"https://example.com/subject.png"}';

describe('uriEncode', () => {
  it('should keep unreserved characters', () => {
    expect(uriEncode('AZaz09-_.~')).toBe('AZaz09-_.~');
  });

  it('should encode space as %20', () => {
    expect(uriEncode('a b')).toBe('a%20b');
  });

  it('should encode reserved characters with uppercase hex', () => {
    expect(uriEncode('a/b+c=d&e')).toBe('a%2Fb%2Bc%3Dd%26e');
  });

  it('should encode multi-byte characters as UTF-8 bytes', () => {
    expect(uriEncode('é')).toBe('%C3%A9');
  });
});

describe('getCanonicalUri', () => {
  it('should default an empty path to /', () => {
    expect(getCanonicalUri('')).toBe('/');
  });

  it('should collapse duplicate slashes', () => {
    expect(getCanonicalUri('//api//v3/tasks')).toBe('/api/v3/tasks');
  });

  it('should encode each segment once', () => {
    expect(getCanonicalUri('/a%20b/c d')).toBe('/a%20b/c%20d');
  });
});

describe('getCanonicalQueryString', () => {
  it('should sort parameters by key', () => {
    expect(getCanonicalQueryString('?Version=2022-08-31&Action=CVSubmitTask')).toBe(
      'Action=CVSubmitTask&Version=2022-08-31'
    );
  });

  it('should sort repeated keys by value', () => {
    expect(getCanonicalQueryString('a=2&a=1')).toBe('a=1&a=2');
  });

  it('should give pairs without = an empty value', () => {
    expect(getCanonicalQueryString('flag&x=1')).toBe('flag=&x=1');
  });

  it('should decode + as a space before re-encoding', () => {
    expect(getCanonicalQueryString('q=a+b')).toBe('q=a%20b');
  });

  it('should re-encode percent-encoded values', () => {
    expect(getCanonicalQueryString('q=%7e%2f')).toBe('q=~%2F');
  });

  it('should return an empty string for no query', () => {
    expect(getCanonicalQueryString('')).toBe('');
    expect(getCanonicalQueryString('?')).toBe('');
  });

  it('should reject malformed percent-encoding', () => {
    expect(() => getCanonicalQueryString('q=%zz')).toThrow(SigningError);
  });
});

describe('getCanonicalHeaders', () => {
  it('should lowercase, sort and trim headers', () => {
    const headers = { 'X-Date': '20240115T083000Z', Host: '  visual.volcengineapi.com ' };
    expect(getCanonicalHeaders(headers)).toBe(
      'host:visual.volcengineapi.com\nx-date:20240115T083000Z\n'
    );
  });

  it('should collapse internal whitespace', () => {
    expect(getCanonicalHeaders({ 'X-Custom': 'a   b\t c' })).toBe('x-custom:a b c\n');
  });

  it('should list signed header names', () => {
    expect(getSignedHeaders({ 'X-Date': 'd', Host: 'h', 'Content-Type': 'c' })).toBe(
      'content-type;host;x-date'
    );
  });
});

describe('hashPayload', () => {
  it('should hash an absent body as the empty string', () => {
    expect(hashPayload()).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should hash string and byte bodies identically', () => {
    expect(hashPayload(new TextEncoder().encode(SUBJECT_BODY))).toBe(hashPayload(SUBJECT_BODY));
  });
});

describe('buildCanonicalRequest', () => {
  it('should produce the exact canonical layout', () => {
    const result = buildCanonicalRequest({
      method: 'POST',
      url: SUBMIT_URL,
      headers: {
        Host: 'visual.volcengineapi.com',
        'X-Date': '20240115T083000Z',
        'Content-Type': 'application/json',
      },
      body: SUBJECT_BODY,
    });

    expect(result.payloadHash).toBe(
      'e0623ca5e89d8c16e3f34b7cb88c94002b1e3b5824d4441624bdc3d62e1d952d'
    );
    expect(result.signedHeaders).toBe('content-type;host;x-date');
    expect(result.canonicalRequest).toBe(
      [
        'POST',
        '/',
        'Action=CVSubmitTask&Version=2022-08-31',
        'content-type:application/json',
        'host:visual.volcengineapi.com',
        'x-date:20240115T083000Z',
        '',
        'content-type;host;x-date',
        'e0623ca5e89d8c16e3f34b7cb88c94002b1e3b5824d4441624bdc3d62e1d952d',
      ].join('\n')
    );
  });

  it('should reject a malformed URL', () => {
    expect(() =>
      buildCanonicalRequest({ method: 'POST', url: 'not a url', headers: {} })
    ).toThrow(SigningError);
  });
});
