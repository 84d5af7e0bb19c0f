/**
 * PutObject implementation for Aliyun OSS
 * @module @oss-integrations/aliyun-oss/objects/put
 */

import type { PutObjectOutput, PutOptions } from '../types/index.js';
import { classifyResponse } from '../errors/index.js';
import { getHeader, getRequestId } from '../transport/index.js';
import type { ObjectsContext } from './context.js';
import { sendRequest } from './utils.js';

/**
 * Uploads an object from a buffer.
 *
 * A string body is sent as its UTF-8 bytes.
 *
 * @throws {ObjectError} `put` error on any non-2xx status
 *
 * @example
 * ```typescript
 * await putObject(context, 'notes/today.txt', 'hello', {
 *   contentType: 'text/plain',
 *   metadata: { author: 'jane' },
 * });
 * ```
 */
export async function putObject(
  context: ObjectsContext,
  key: string,
  body: Uint8Array | string,
  options: PutOptions = {}
): Promise<PutObjectOutput> {
  const response = await sendRequest(context, {
    method: 'PUT',
    key,
    body: typeof body === 'string' ? new TextEncoder().encode(body) : body,
    contentType: options.contentType,
    metadata: options.metadata,
    headers: options.headers,
    query: options.query,
  });

  const error = classifyResponse('put', response);
  if (error) {
    throw error;
  }

  return {
    eTag: getHeader(response.headers, 'etag'),
    requestId: getRequestId(response.headers),
  };
}
