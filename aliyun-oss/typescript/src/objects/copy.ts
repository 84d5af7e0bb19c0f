/**
 * CopyObject implementation for Aliyun OSS
 * @module @oss-integrations/aliyun-oss/objects/copy
 */

import type { CopyObjectOutput, CopyOptions } from '../types/index.js';
import { classifyResponse } from '../errors/index.js';
import { decodeCopyResult } from '../xml/index.js';
import type { ObjectsContext } from './context.js';
import { sendRequest } from './utils.js';

export const COPY_SOURCE_HEADER = 'x-oss-copy-source';
export const METADATA_DIRECTIVE_HEADER = 'x-oss-metadata-directive';

/**
 * Copies an object server-side into the client's bucket.
 *
 * The source is named `/<sourceBucket>/<sourceKey>`; like target keys,
 * it is sent as given.
 *
 * @throws {ObjectError} `copy` error on any non-2xx status
 * @throws {DecodeError} If the result document is malformed
 *
 * @example
 * ```typescript
 * await copyObject(context, 'original/file.txt', 'backup/file.txt', {
 *   metadataDirective: 'REPLACE',
 *   metadata: { stage: 'archived' },
 * });
 * ```
 */
export async function copyObject(
  context: ObjectsContext,
  sourceKey: string,
  targetKey: string,
  options: CopyOptions = {}
): Promise<CopyObjectOutput> {
  const sourceBucket = options.sourceBucket ?? context.config.bucket;
  const headers: Record<string, string> = {
    ...options.headers,
    [COPY_SOURCE_HEADER]: `/${sourceBucket}/${sourceKey}`,
  };
  if (options.metadataDirective) {
    headers[METADATA_DIRECTIVE_HEADER] = options.metadataDirective;
  }

  const response = await sendRequest(context, {
    method: 'PUT',
    key: targetKey,
    headers,
    metadata: options.metadata,
  });

  const error = classifyResponse('copy', response);
  if (error) {
    throw error;
  }

  return decodeCopyResult(response.body);
}
