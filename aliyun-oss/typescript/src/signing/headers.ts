/**
 * Canonical header construction
 */

import { compareNames } from './resources.js';
import type { HeaderInput } from './types.js';

/**
 * Headers with this prefix are part of the signature
 */
export const OSS_HEADER_PREFIX = 'x-oss-';

/**
 * Prefix of user-defined object metadata headers
 */
export const OSS_META_PREFIX = 'x-oss-meta-';

/**
 * Flattens a header input into ordered name/value pairs
 */
export function headerEntries(headers: HeaderInput): Array<readonly [string, string]> {
  if (isHeaderList(headers)) {
    return [...headers];
  }
  return Object.entries(headers);
}

function isHeaderList(
  headers: HeaderInput
): headers is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(headers);
}

/**
 * First value of a header, matched case-insensitively
 */
export function findHeader(headers: HeaderInput, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of headerEntries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Builds the canonicalized `x-oss-*` header block.
 *
 * Names are lower-cased and sorted; values of names that collide after
 * lower-casing are comma-joined in source order. Every entry ends with
 * its own newline, so an empty selection yields an empty string.
 *
 * @example
 * ```typescript
 * canonicalizeHeaders({ 'X-OSS-Meta-B': '2', 'x-oss-meta-a': '1', Date: '...' });
 * // 'x-oss-meta-a:1\nx-oss-meta-b:2\n'
 * ```
 */
export function canonicalizeHeaders(headers: HeaderInput): string {
  const merged = new Map<string, string[]>();

  for (const [name, value] of headerEntries(headers)) {
    const lowerName = name.toLowerCase();
    if (!lowerName.startsWith(OSS_HEADER_PREFIX)) continue;

    const values = merged.get(lowerName);
    if (values) {
      values.push(value);
    } else {
      merged.set(lowerName, [value]);
    }
  }

  return [...merged.keys()]
    .sort(compareNames)
    .map((name) => `${name}:${(merged.get(name) ?? []).join(',')}\n`)
    .join('');
}
