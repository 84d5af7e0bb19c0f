/**
 * DeleteObject implementation for Aliyun OSS
 * @module @oss-integrations/aliyun-oss/objects/delete
 */

import { classifyResponse } from '../errors/index.js';
import type { ObjectsContext } from './context.js';
import { sendRequest } from './utils.js';

/**
 * Deletes a single object. The service answers 204 for a missing key as
 * well, so deleting twice succeeds.
 *
 * @throws {ObjectError} `delete` error on any non-2xx status
 */
export async function deleteObject(context: ObjectsContext, key: string): Promise<void> {
  const response = await sendRequest(context, { method: 'DELETE', key });

  const error = classifyResponse('delete', response);
  if (error) {
    throw error;
  }
}

/**
 * Deletes objects one request at a time, in order. Stops at the first
 * failure; keys before it stay deleted.
 *
 * @throws {ObjectError} The first `delete` error
 */
export async function deleteObjects(
  context: ObjectsContext,
  keys: readonly string[]
): Promise<void> {
  for (const key of keys) {
    await deleteObject(context, key);
  }
}
