/**
 * GetObject implementation for Aliyun OSS
 * @module @oss-integrations/aliyun-oss/objects/get
 */

import type { GetBufferOutput, GetObjectOutput, GetOptions } from '../types/index.js';
import { classifyResponse, Utf8Error } from '../errors/index.js';
import { decodeMetadata } from '../request/index.js';
import type { ObjectsContext } from './context.js';
import { sendRequest } from './utils.js';

/**
 * Downloads an object as bytes.
 *
 * @throws {ObjectError} `get` error on any non-2xx status
 *
 * @example
 * ```typescript
 * const { content, metadata } = await getObjectBuffer(context, 'images/logo.png');
 * ```
 */
export async function getObjectBuffer(
  context: ObjectsContext,
  key: string,
  options: GetOptions = {}
): Promise<GetBufferOutput> {
  const response = await sendRequest(context, {
    method: 'GET',
    key,
    headers: options.headers,
    query: options.query,
  });

  const error = classifyResponse('get', response);
  if (error) {
    throw error;
  }

  return {
    content: response.body,
    metadata: decodeMetadata(response.headers, options.metaKeys),
    headers: response.headers,
  };
}

/**
 * Downloads an object as UTF-8 text.
 *
 * @throws {ObjectError} `get` error on any non-2xx status
 * @throws {Utf8Error} If the body is not valid UTF-8
 */
export async function getObject(
  context: ObjectsContext,
  key: string,
  options: GetOptions = {}
): Promise<GetObjectOutput> {
  const output = await getObjectBuffer(context, key, options);
  return { ...output, content: decodeUtf8(output.content, key) };
}

function decodeUtf8(bytes: Uint8Array, key: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new Utf8Error({
      message: `Object ${key} is not valid UTF-8`,
      code: 'INVALID_UTF8',
      details: { key },
      cause: error,
    });
  }
}
