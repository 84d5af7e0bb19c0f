/**
 * XML builders for OSS response documents
 * @module @oss-integrations/aliyun-oss/xml/builders
 */

import type { ObjectSummary } from '../types/common.js';
import type { ParsedError } from './error.js';
import { buildXml } from './parser.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Contents of one ListObjectsV2 result page
 */
export interface ListBucketResultInput {
  name: string;
  prefix?: string;
  delimiter?: string;
  maxKeys: number;
  isTruncated: boolean;
  continuationToken?: string;
  nextContinuationToken?: string;
  contents: readonly ObjectSummary[];
  commonPrefixes: readonly string[];
}

/**
 * Builds a `ListBucketResult` document
 *
 * @example
 * ```typescript
 * buildListBucketResultXml({
 *   name: 'examplebucket',
 *   maxKeys: 100,
 *   isTruncated: false,
 *   contents: [{ key: 'a.txt', lastModified: '...', eTag: '"..."', size: '3' }],
 *   commonPrefixes: [],
 * });
 * ```
 */
export function buildListBucketResultXml(input: ListBucketResultInput): string {
  const result: Record<string, unknown> = {
    Name: input.name,
    Prefix: input.prefix ?? '',
    MaxKeys: String(input.maxKeys),
    Delimiter: input.delimiter,
    IsTruncated: String(input.isTruncated),
    ContinuationToken: input.continuationToken,
    NextContinuationToken: input.nextContinuationToken,
    KeyCount: String(input.contents.length + input.commonPrefixes.length),
    Contents: input.contents.map((entry) => ({
      Key: entry.key,
      LastModified: entry.lastModified,
      ETag: entry.eTag,
      Type: 'Normal',
      Size: entry.size,
      StorageClass: 'Standard',
    })),
    CommonPrefixes: input.commonPrefixes.map((prefix) => ({ Prefix: prefix })),
  };

  return XML_DECLARATION + buildXml({ ListBucketResult: result });
}

/**
 * Builds an `Error` document
 *
 * @example
 * ```typescript
 * buildErrorXml({ code: 'NoSuchKey', message: 'The specified key does not exist.' });
 * ```
 */
export function buildErrorXml(error: ParsedError): string {
  return (
    XML_DECLARATION +
    buildXml({
      Error: {
        Code: error.code,
        Message: error.message,
        RequestId: error.requestId,
        HostId: error.hostId,
        Resource: error.resource,
      },
    })
  );
}

/**
 * Builds the `CopyObjectResult` document returned by a server-side copy
 */
export function buildCopyObjectResultXml(eTag: string, lastModified: string): string {
  return (
    XML_DECLARATION +
    buildXml({
      CopyObjectResult: {
        ETag: eTag,
        LastModified: lastModified,
      },
    })
  );
}
