/**
 * Request assembly: URL, headers and signature for one transport call
 * @module @oss-integrations/aliyun-oss/request/assembler
 */

import type { HttpMethod, HttpRequest } from '../transport/index.js';
import type { EndpointScheme } from '../config/index.js';
import type { ListOptions, Metadata } from '../types/index.js';
import {
  canonicalizeResource,
  formatHttpDate,
  type OssSigner,
  type QueryParams,
} from '../signing/index.js';
import { ConfigError } from '../errors/index.js';
import { encodeMetadata } from './metadata.js';

/**
 * Operation-specific parts of a request
 */
export interface AssembleInput {
  method: HttpMethod;
  bucket: string;
  /** Object key; empty for bucket-level requests such as a listing */
  key: string;
  query?: QueryParams;
  contentType?: string;
  metadata?: Metadata;
  headers?: Readonly<Record<string, string>>;
  body?: Uint8Array;
}

/**
 * Client-level parts of a request
 */
export interface AssembleContext {
  scheme: EndpointScheme;
  host: string;
  signer: OssSigner;
  date: Date;
}

/**
 * Renders query parameters in insertion order, values percent-encoded.
 * A `null` or `undefined` value renders the bare name.
 *
 * @example
 * ```typescript
 * buildQueryString({ acl: null, prefix: 'a b' }); // '?acl&prefix=a%20b'
 * buildQueryString({}); // ''
 * ```
 */
export function buildQueryString(query: QueryParams | undefined): string {
  if (!query) {
    return '';
  }

  const parts = Object.entries(query).map(([name, value]) =>
    value === null || value === undefined
      ? encodeURIComponent(name)
      : `${encodeURIComponent(name)}=${encodeURIComponent(value)}`
  );
  return parts.length > 0 ? `?${parts.join('&')}` : '';
}

/**
 * Builds a virtual-hosted URL `scheme://bucket.host/key?query`.
 *
 * The bucket and key are inserted as given: escaping a key that needs
 * it is the caller's job.
 */
export function buildObjectUrl(
  scheme: EndpointScheme,
  host: string,
  bucket: string,
  key: string,
  query?: QueryParams
): string {
  return `${scheme}://${bucket}.${host}/${key}${buildQueryString(query)}`;
}

/**
 * Query of a ListObjectsV2 request. Only non-empty options are sent.
 *
 * @throws {ConfigError} If `maxKeys` is outside 1-1000
 *
 * @example
 * ```typescript
 * buildListQuery({ prefix: 'logs/', maxKeys: 2 });
 * // { 'list-type': '2', 'max-keys': '2', prefix: 'logs/' }
 * ```
 */
export function buildListQuery(options: ListOptions = {}): Record<string, string> {
  const query: Record<string, string> = { 'list-type': '2' };

  if (options.marker) {
    query['continuation-token'] = options.marker;
  }
  if (options.delimiter) {
    query.delimiter = options.delimiter;
  }
  if (options.maxKeys !== undefined) {
    assertMaxKeys(options.maxKeys);
    query['max-keys'] = String(options.maxKeys);
  }
  if (options.prefix) {
    query.prefix = options.prefix;
  }

  return query;
}

export function assertMaxKeys(maxKeys: number): void {
  if (!Number.isInteger(maxKeys) || maxKeys < 1 || maxKeys > 1000) {
    throw new ConfigError({
      message: `maxKeys must be an integer between 1 and 1000, got ${maxKeys}`,
      code: 'INVALID_MAX_KEYS',
      details: { maxKeys },
    });
  }
}

/**
 * Sets a header, replacing any existing spelling of the same name
 */
function setHeader(headers: Record<string, string>, name: string, value: string): void {
  const lowerName = name.toLowerCase();
  for (const existing of Object.keys(headers)) {
    if (existing.toLowerCase() === lowerName) {
      delete headers[existing];
    }
  }
  headers[name] = value;
}

/**
 * Produces a signed request ready for the transport.
 *
 * Header precedence, lowest first: extra headers, metadata, then
 * `Content-Type`, `Content-Length`, `Date` and `Authorization`, which
 * always replace a caller-supplied value. The URL carries every query
 * parameter; only allow-listed ones reach the signature.
 *
 * @throws {EncodingError} If a header name or value cannot be sent
 *
 * @example
 * ```typescript
 * const request = assembleRequest(
 *   { method: 'PUT', bucket: 'b', key: 'o.txt', body: bytes },
 *   { scheme: 'https', host: 'oss-cn-hangzhou.aliyuncs.com', signer, date: new Date() }
 * );
 * await transport.send(request);
 * ```
 */
export function assembleRequest(input: AssembleInput, context: AssembleContext): HttpRequest {
  const headers: Record<string, string> = {};

  for (const [name, value] of Object.entries(input.headers ?? {})) {
    headers[name] = value;
  }
  for (const [name, value] of Object.entries(encodeMetadata(input.metadata))) {
    setHeader(headers, name, value);
  }
  if (input.contentType) {
    setHeader(headers, 'Content-Type', input.contentType);
  }
  if (input.body) {
    setHeader(headers, 'Content-Length', String(input.body.byteLength));
  }
  setHeader(headers, 'Date', formatHttpDate(context.date));

  const authorization = context.signer.authorization({
    verb: input.method,
    bucket: input.bucket,
    objectKey: input.key,
    canonicalResource: canonicalizeResource(input.query),
    headers,
  });
  setHeader(headers, 'Authorization', authorization);

  const request: HttpRequest = {
    method: input.method,
    url: buildObjectUrl(context.scheme, context.host, input.bucket, input.key, input.query),
    headers,
  };
  if (input.body) {
    request.body = input.body;
  }
  return request;
}
