/**
 * Canonical resource construction
 *
 * Only sub-resources the service knows about take part in the signature;
 * every other query parameter travels in the URL unsigned.
 */

import subResourceNames from './sub-resources.json' with { type: 'json' };
import type { QueryParams } from './types.js';

/**
 * Query-parameter names that participate in signing
 */
export const SUB_RESOURCES: ReadonlySet<string> = new Set<string>(subResourceNames);

export function isSubResource(name: string): boolean {
  return SUB_RESOURCES.has(name);
}

/**
 * Byte-wise ordering for ASCII names
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Builds the canonical resource string `k1=v1&k2&k3=v3`.
 *
 * Keeps allow-listed names only, sorted by name. A parameter without a
 * value contributes its bare name. Values are used as given, unescaped.
 *
 * @example
 * ```typescript
 * canonicalizeResource({ uploadId: 'u1', acl: null, 'list-type': '2' });
 * // 'acl&uploadId=u1'
 * ```
 */
export function canonicalizeResource(params: QueryParams | undefined): string {
  if (!params) {
    return '';
  }

  return Object.keys(params)
    .filter(isSubResource)
    .sort(compareNames)
    .map((name) => {
      const value = params[name];
      return value === null || value === undefined ? name : `${name}=${value}`;
    })
    .join('&');
}
