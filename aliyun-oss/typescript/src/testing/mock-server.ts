/**
 * In-process OSS stand-in for tests
 * @module @oss-integrations/aliyun-oss/testing/mock-server
 */

import { sha1 } from '@noble/hashes/sha1';
import { bytesToHex } from '@noble/hashes/utils';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';
import { getHeader } from '../transport/index.js';
import {
  OssSigner,
  canonicalizeResource,
  compareNames,
  toEpochSeconds,
  type OssCredentials,
} from '../signing/index.js';
import { decodeMetadata, encodeMetadata } from '../request/index.js';
import { COPY_SOURCE_HEADER, METADATA_DIRECTIVE_HEADER } from '../objects/index.js';
import { PRESIGN_PARAMS } from '../presign/index.js';
import {
  buildCopyObjectResultXml,
  buildErrorXml,
  buildListBucketResultXml,
} from '../xml/index.js';
import type { Clock, Metadata, ObjectSummary } from '../types/index.js';
import { systemClock } from '../types/index.js';

const DEFAULT_MAX_KEYS = 100;

const PRESIGN_PARAM_NAMES: ReadonlySet<string> = new Set(Object.values(PRESIGN_PARAMS));

const STATUS_TEXT: Readonly<Record<number, string>> = {
  200: 'OK',
  204: 'No Content',
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
};

/**
 * An object held by the mock
 */
export interface StoredObject {
  data: Uint8Array;
  contentType?: string;
  metadata: Metadata;
  eTag: string;
  lastModified: Date;
}

export interface MockOssServerOptions {
  /**
   * Credentials requests must be signed with
   */
  credentials: OssCredentials;

  /**
   * Clock for presigned URL expiry and `Last-Modified`
   */
  clock?: Clock;
}

interface ParsedRequest {
  bucket: string;
  key: string;
  host: string;
  query: Record<string, string | null>;
}

type QueryRecord = Record<string, string | null>;

/**
 * Splits a virtual-hosted URL back into bucket, raw key and decoded query
 */
function parseRequestUrl(url: string): ParsedRequest {
  const withoutScheme = url.replace(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//, '');
  const slash = withoutScheme.indexOf('/');
  const authority = slash === -1 ? withoutScheme : withoutScheme.slice(0, slash);
  const pathAndQuery = slash === -1 ? '' : withoutScheme.slice(slash + 1);

  const questionMark = pathAndQuery.indexOf('?');
  const key = questionMark === -1 ? pathAndQuery : pathAndQuery.slice(0, questionMark);
  const rawQuery = questionMark === -1 ? '' : pathAndQuery.slice(questionMark + 1);

  const query: QueryRecord = {};
  for (const part of rawQuery.split('&')) {
    if (!part) continue;
    const equals = part.indexOf('=');
    if (equals === -1) {
      query[decodeURIComponent(part)] = null;
    } else {
      query[decodeURIComponent(part.slice(0, equals))] = decodeURIComponent(part.slice(equals + 1));
    }
  }

  const dot = authority.indexOf('.');
  return {
    bucket: dot === -1 ? authority : authority.slice(0, dot),
    host: authority,
    key,
    query,
  };
}

function encodeToken(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64');
}

function decodeToken(token: string): string {
  return Buffer.from(token, 'base64').toString('utf8');
}

/**
 * In-memory HTTP transport that answers like the object storage service.
 *
 * Every request must carry a valid header or query-string signature for
 * the configured credentials, or it is refused with 403. Listings walk
 * a sorted key list, so continuation tokens are stable while the bucket
 * does not change.
 *
 * @example
 * ```typescript
 * const server = new MockOssServer({
 *   credentials: { accessKeyId: 'test-access-key-id', accessKeySecret: 'test-secret' },
 * });
 * const client = createClient(config, { transport: server });
 * ```
 */
export class MockOssServer implements HttpTransport {
  private readonly store = new Map<string, Map<string, StoredObject>>();
  private readonly signer: OssSigner;
  private readonly clock: Clock;
  private readonly received: HttpRequest[] = [];
  private requestCount = 0;
  private closed = false;

  constructor(private readonly options: MockOssServerOptions) {
    this.signer = new OssSigner(options.credentials);
    this.clock = options.clock ?? systemClock;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.received.push(request);
    this.requestCount += 1;

    const parsed = parseRequestUrl(request.url);
    const denied = this.authenticate(request, parsed);
    if (denied) {
      return denied;
    }

    const { key, query } = parsed;

    if (key === '' && request.method === 'GET' && query['list-type'] === '2') {
      return this.list(parsed);
    }

    switch (request.method) {
      case 'PUT':
        return getHeader(request.headers, COPY_SOURCE_HEADER) !== undefined
          ? this.copy(request, parsed)
          : this.put(request, parsed);
      case 'GET':
        return this.get(parsed, false);
      case 'HEAD':
        return this.get(parsed, true);
      case 'DELETE':
        this.bucket(parsed.bucket).delete(key);
        return this.respond(204);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // ========================================
  // Testing Utilities
  // ========================================

  /**
   * Requests received so far, in order
   */
  get requests(): readonly HttpRequest[] {
    return this.received;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stores an object directly (for test setup)
   */
  putObject(bucket: string, key: string, data: Uint8Array | string, metadata: Metadata = {}): void {
    const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    this.bucket(bucket).set(key, {
      data: bytes,
      metadata,
      eTag: this.eTag(bytes),
      lastModified: this.clock(),
    });
  }

  /**
   * Reads a stored object directly (for test assertions)
   */
  getObject(bucket: string, key: string): StoredObject | undefined {
    return this.store.get(bucket)?.get(key);
  }

  /**
   * Sorted keys of a bucket
   */
  keys(bucket: string): string[] {
    return [...this.bucket(bucket).keys()].sort(compareNames);
  }

  // ========================================
  // Request handling
  // ========================================

  private authenticate(request: HttpRequest, parsed: ParsedRequest): HttpResponse | undefined {
    const signature = parsed.query[PRESIGN_PARAMS.SIGNATURE];
    if (signature) {
      return this.authenticateQuery(request, parsed, signature);
    }

    const authorization = getHeader(request.headers, 'authorization');
    if (!authorization) {
      return this.error(403, 'AccessDenied', 'Authorization header is missing.', parsed);
    }

    const expected = this.signer.authorization({
      verb: request.method,
      bucket: parsed.bucket,
      objectKey: parsed.key,
      canonicalResource: canonicalizeResource(parsed.query),
      headers: request.headers,
    });
    if (authorization !== expected) {
      return this.error(
        403,
        'SignatureDoesNotMatch',
        'The request signature we calculated does not match the signature you provided.',
        parsed
      );
    }
    return undefined;
  }

  private authenticateQuery(
    request: HttpRequest,
    parsed: ParsedRequest,
    signature: string
  ): HttpResponse | undefined {
    const expires = Number(parsed.query[PRESIGN_PARAMS.EXPIRES]);
    if (!Number.isInteger(expires) || toEpochSeconds(this.clock()) > expires) {
      return this.error(403, 'AccessDenied', 'Request has expired.', parsed);
    }

    if (parsed.query[PRESIGN_PARAMS.ACCESS_KEY_ID] !== this.options.credentials.accessKeyId) {
      return this.error(
        403,
        'InvalidAccessKeyId',
        'The OSS Access Key Id you provided does not exist in our records.',
        parsed
      );
    }

    const signedQuery: QueryRecord = {};
    for (const [name, value] of Object.entries(parsed.query)) {
      if (!PRESIGN_PARAM_NAMES.has(name)) {
        signedQuery[name] = value;
      }
    }

    const expected = this.signer.presign({
      verb: request.method,
      bucket: parsed.bucket,
      objectKey: parsed.key,
      canonicalResource: canonicalizeResource(signedQuery),
      headers: request.headers,
      expires,
    });
    if (signature !== expected) {
      return this.error(
        403,
        'SignatureDoesNotMatch',
        'The request signature we calculated does not match the signature you provided.',
        parsed
      );
    }
    return undefined;
  }

  private put(request: HttpRequest, parsed: ParsedRequest): HttpResponse {
    const data = request.body ?? new Uint8Array(0);
    const stored: StoredObject = {
      data,
      contentType: getHeader(request.headers, 'content-type'),
      metadata: decodeMetadata(request.headers),
      eTag: this.eTag(data),
      lastModified: this.clock(),
    };
    this.bucket(parsed.bucket).set(parsed.key, stored);
    return this.respond(200, { etag: stored.eTag });
  }

  private get(parsed: ParsedRequest, headOnly: boolean): HttpResponse {
    const stored = this.getObject(parsed.bucket, parsed.key);
    if (!stored) {
      return headOnly
        ? this.respond(404)
        : this.error(404, 'NoSuchKey', 'The specified key does not exist.', parsed);
    }

    const headers: Record<string, string> = {
      'content-length': String(stored.data.byteLength),
      etag: stored.eTag,
      'last-modified': stored.lastModified.toUTCString(),
      ...encodeMetadata(stored.metadata),
    };
    if (stored.contentType) {
      headers['content-type'] = stored.contentType;
    }

    return this.respond(200, headers, headOnly ? new Uint8Array(0) : stored.data);
  }

  private copy(request: HttpRequest, parsed: ParsedRequest): HttpResponse {
    const source = getHeader(request.headers, COPY_SOURCE_HEADER) ?? '';
    const path = source.startsWith('/') ? source.slice(1) : source;
    const slash = path.indexOf('/');
    const sourceBucket = slash === -1 ? path : path.slice(0, slash);
    const sourceKey = slash === -1 ? '' : path.slice(slash + 1);

    const original = this.getObject(sourceBucket, sourceKey);
    if (!original) {
      return this.error(404, 'NoSuchKey', 'The specified key does not exist.', parsed);
    }

    const replace = getHeader(request.headers, METADATA_DIRECTIVE_HEADER) === 'REPLACE';
    const stored: StoredObject = {
      ...original,
      metadata: replace ? decodeMetadata(request.headers) : { ...original.metadata },
      lastModified: this.clock(),
    };
    this.bucket(parsed.bucket).set(parsed.key, stored);

    return this.respond(
      200,
      { 'content-type': 'application/xml' },
      new TextEncoder().encode(
        buildCopyObjectResultXml(stored.eTag, stored.lastModified.toISOString())
      )
    );
  }

  private list(parsed: ParsedRequest): HttpResponse {
    const { query } = parsed;
    const prefix = query.prefix ?? '';
    const delimiter = query.delimiter ?? '';
    const maxKeys = query['max-keys'] ? parseInt(query['max-keys'], 10) : DEFAULT_MAX_KEYS;
    const token = query['continuation-token'] ?? undefined;
    const after = token ? decodeToken(token) : undefined;

    const contents: ObjectSummary[] = [];
    const commonPrefixes: string[] = [];
    let last: string | undefined;
    let isTruncated = false;

    for (const key of this.keys(parsed.bucket)) {
      if (!key.startsWith(prefix)) continue;
      if (after !== undefined && !this.isAfter(key, after, delimiter)) continue;

      const rest = key.slice(prefix.length);
      const cut = delimiter ? rest.indexOf(delimiter) : -1;
      const commonPrefix = cut === -1 ? undefined : prefix + rest.slice(0, cut + delimiter.length);
      if (commonPrefix !== undefined && commonPrefix === last) continue;

      if (contents.length + commonPrefixes.length === maxKeys) {
        isTruncated = true;
        break;
      }

      if (commonPrefix !== undefined) {
        commonPrefixes.push(commonPrefix);
        last = commonPrefix;
      } else {
        const stored = this.bucket(parsed.bucket).get(key);
        if (!stored) continue;
        contents.push({
          key,
          lastModified: stored.lastModified.toISOString(),
          eTag: stored.eTag,
          size: String(stored.data.byteLength),
        });
        last = key;
      }
    }

    const xml = buildListBucketResultXml({
      name: parsed.bucket,
      prefix,
      delimiter: delimiter || undefined,
      maxKeys,
      isTruncated,
      continuationToken: token,
      nextContinuationToken: isTruncated && last !== undefined ? encodeToken(last) : undefined,
      contents,
      commonPrefixes,
    });

    return this.respond(200, { 'content-type': 'application/xml' }, new TextEncoder().encode(xml));
  }

  /**
   * Whether `key` sorts after the page boundary. A boundary that is a
   * common prefix also excludes every key under it.
   */
  private isAfter(key: string, boundary: string, delimiter: string): boolean {
    if (compareNames(key, boundary) <= 0) {
      return false;
    }
    return !(delimiter && boundary.endsWith(delimiter) && key.startsWith(boundary));
  }

  // ========================================
  // Helpers
  // ========================================

  private bucket(name: string): Map<string, StoredObject> {
    let bucket = this.store.get(name);
    if (!bucket) {
      bucket = new Map();
      this.store.set(name, bucket);
    }
    return bucket;
  }

  private eTag(data: Uint8Array): string {
    return `"${bytesToHex(sha1(data)).slice(0, 32).toUpperCase()}"`;
  }

  private requestId(): string {
    return `MOCK${String(this.requestCount).padStart(20, '0')}`;
  }

  private respond(
    status: number,
    headers: Record<string, string> = {},
    body: Uint8Array = new Uint8Array(0)
  ): HttpResponse {
    return {
      status,
      statusText: STATUS_TEXT[status],
      headers: { ...headers, 'x-oss-request-id': this.requestId() },
      body,
    };
  }

  private error(status: number, code: string, message: string, parsed: ParsedRequest): HttpResponse {
    const xml = buildErrorXml({
      code,
      message,
      requestId: this.requestId(),
      hostId: parsed.host,
    });
    return this.respond(status, { 'content-type': 'application/xml' }, new TextEncoder().encode(xml));
  }
}
