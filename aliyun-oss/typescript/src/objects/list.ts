/**
 * ListObjectsV2 implementation for Aliyun OSS
 * @module @oss-integrations/aliyun-oss/objects/list
 */

import type { ListOptions, ListPage } from '../types/index.js';
import { classifyResponse } from '../errors/index.js';
import { buildListQuery } from '../request/index.js';
import { decodeKeyList, decodeListPage } from '../xml/index.js';
import type { HttpResponse } from '../transport/index.js';
import type { ObjectsContext } from './context.js';
import { sendRequest } from './utils.js';

async function requestListing(context: ObjectsContext, options: ListOptions): Promise<HttpResponse> {
  const response = await sendRequest(context, {
    method: 'GET',
    key: '',
    query: buildListQuery(options),
  });

  // A listing is a GET on the bucket
  const error = classifyResponse('get', response);
  if (error) {
    throw error;
  }
  return response;
}

/**
 * Lists one page of object keys, in listing order.
 *
 * @throws {ObjectError} `get` error on any non-2xx status
 * @throws {DecodeError} If the listing document is malformed
 */
export async function listObjects(
  context: ObjectsContext,
  options: ListOptions = {}
): Promise<string[]> {
  const response = await requestListing(context, options);
  return decodeKeyList(response.body);
}

/**
 * Lists one page of object summaries and common prefixes.
 *
 * Pagination is driven by the caller: while `isTruncated` is true, pass
 * `nextMarker` back as `marker`.
 *
 * @throws {ObjectError} `get` error on any non-2xx status
 * @throws {DecodeError} If the listing document is malformed
 *
 * @example
 * ```typescript
 * let options: ListOptions = { prefix: 'logs/', maxKeys: 100 };
 * for (;;) {
 *   const page = await listDetails(context, options);
 *   handle(page.entries);
 *   if (!page.isTruncated) break;
 *   options = { ...options, marker: page.nextMarker };
 * }
 * ```
 */
export async function listDetails(
  context: ObjectsContext,
  options: ListOptions = {}
): Promise<ListPage> {
  const response = await requestListing(context, options);
  return decodeListPage(response.body);
}
