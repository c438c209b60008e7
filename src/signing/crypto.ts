/**
 * Hash primitives for request signing, on @noble/hashes
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

export type ByteInput = string | Uint8Array;

/**
 * String input is UTF-8 encoded; byte arrays pass through untouched
 */
export function toBytes(data: ByteInput): Uint8Array {
  return typeof data === 'string' ? utf8ToBytes(data) : data;
}

export function hmacSha256(key: Uint8Array, data: ByteInput): Uint8Array {
  return hmac(sha256, key, toBytes(data));
}

export function sha256Hex(data: ByteInput): string {
  return bytesToHex(sha256(toBytes(data)));
}

/**
 * Lower-case hex, two digits per byte
 */
export const toHex = bytesToHex;
