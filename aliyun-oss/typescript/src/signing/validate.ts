/**
 * Header validation: anything that reaches the wire must be a legal
 * HTTP/1.1 header (RFC 7230 section 3.2).
 */

import { EncodingError } from '../errors/categories.js';

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Returns true when every character is HTAB, SP, visible ASCII or obs-text
 */
export function isValidHeaderValue(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code === 0x09) continue;
    if (code < 0x20 || code === 0x7f || code > 0xff) {
      return false;
    }
  }
  return true;
}

export function isValidHeaderName(name: string): boolean {
  return TOKEN.test(name);
}

/**
 * @throws {EncodingError} If the name or the value cannot be sent
 */
export function assertValidHeader(name: string, value: string): void {
  if (!isValidHeaderName(name)) {
    throw EncodingError.invalidHeaderName(name);
  }
  if (!isValidHeaderValue(value)) {
    throw EncodingError.invalidHeaderValue(name);
  }
}
