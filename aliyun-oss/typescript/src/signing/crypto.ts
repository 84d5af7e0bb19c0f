/**
 * Cryptographic utilities for OSS request signing
 * Uses @noble/hashes for HMAC-SHA1 operations
 */

import { hmac } from '@noble/hashes/hmac';
import { sha1 } from '@noble/hashes/sha1';

/**
 * Compute HMAC-SHA1
 */
export function hmacSha1(key: string | Uint8Array, data: string | Uint8Array): Uint8Array {
  const keyBytes = typeof key === 'string' ? new TextEncoder().encode(key) : key;
  const dataBytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  return hmac(sha1, keyBytes, dataBytes);
}

/**
 * Convert byte array to base64 string
 */
export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Compute HMAC-SHA1 and return the digest as base64
 */
export function hmacSha1Base64(key: string | Uint8Array, data: string | Uint8Array): string {
  return toBase64(hmacSha1(key, data));
}
