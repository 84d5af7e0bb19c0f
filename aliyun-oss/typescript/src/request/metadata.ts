/**
 * User metadata headers
 * @module @oss-integrations/aliyun-oss/request/metadata
 */

import { OSS_META_PREFIX } from '../signing/index.js';
import type { Metadata } from '../types/index.js';

/**
 * Converts a metadata map into `x-oss-meta-*` headers. Keys are
 * lower-cased.
 *
 * @example
 * ```typescript
 * encodeMetadata({ Author: 'jane' });
 * // { 'x-oss-meta-author': 'jane' }
 * ```
 */
export function encodeMetadata(metadata: Metadata | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!metadata) {
    return headers;
  }

  for (const [key, value] of Object.entries(metadata)) {
    headers[`${OSS_META_PREFIX}${key.toLowerCase()}`] = value;
  }
  return headers;
}

/**
 * Extracts user metadata from response headers, prefix stripped.
 *
 * @param keys - Only keep these metadata keys (matched case-insensitively)
 *
 * @example
 * ```typescript
 * decodeMetadata({ 'X-OSS-Meta-Author': 'jane', etag: '"abc"' });
 * // { author: 'jane' }
 * ```
 */
export function decodeMetadata(
  headers: Readonly<Record<string, string>>,
  keys?: readonly string[]
): Metadata {
  const wanted = keys ? new Set(keys.map((key) => key.toLowerCase())) : undefined;
  const metadata: Metadata = {};

  for (const [name, value] of Object.entries(headers)) {
    const lowerName = name.toLowerCase();
    if (!lowerName.startsWith(OSS_META_PREFIX)) continue;

    const key = lowerName.slice(OSS_META_PREFIX.length);
    if (wanted && !wanted.has(key)) continue;

    metadata[key] = value;
  }

  return metadata;
}
