/**
 * HeadObject implementation for Aliyun OSS
 * @module @oss-integrations/aliyun-oss/objects/head
 */

import type { HeadObjectOutput } from '../types/index.js';
import { classifyResponse } from '../errors/index.js';
import { getHeader } from '../transport/index.js';
import { decodeMetadata } from '../request/index.js';
import type { ObjectsContext } from './context.js';
import { parseIntHeader, sendRequest } from './utils.js';

/**
 * Retrieves object metadata without the body.
 *
 * @throws {ObjectError} `head` error on any non-2xx status
 */
export async function headObject(context: ObjectsContext, key: string): Promise<HeadObjectOutput> {
  const response = await sendRequest(context, { method: 'HEAD', key });

  const error = classifyResponse('head', response);
  if (error) {
    throw error;
  }

  return {
    metadata: decodeMetadata(response.headers),
    contentLength: parseIntHeader(response.headers, 'content-length'),
    contentType: getHeader(response.headers, 'content-type'),
    eTag: getHeader(response.headers, 'etag'),
    lastModified: getHeader(response.headers, 'last-modified'),
    headers: response.headers,
  };
}
