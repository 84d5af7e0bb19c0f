/**
 * Response classification for object operations
 * @module @oss-integrations/aliyun-oss/errors/classify
 */

import type { HttpResponse } from '../transport/types.js';
import { getRequestId, isSuccessResponse } from '../transport/types.js';
import { parseErrorResponse } from '../xml/error.js';
import { OssError } from './error.js';
import { ObjectError, type ObjectOperation } from './categories.js';

/**
 * Maps a transport outcome to a typed operation error.
 *
 * Returns `undefined` for any 2xx status. Every other status yields an
 * {@link ObjectError} for `operation` whose message carries the numeric
 * status; when the body is a service error document its code and message
 * are appended.
 *
 * @example
 * ```typescript
 * const error = classifyResponse('get', response);
 * if (error) throw error;
 * ```
 */
export function classifyResponse(
  operation: ObjectOperation,
  response: HttpResponse
): ObjectError | undefined {
  if (isSuccessResponse(response)) {
    return undefined;
  }

  const statusLine = response.statusText
    ? `${response.status} ${response.statusText}`
    : String(response.status);
  let message = `can not ${operation} object, status code: ${statusLine}`;

  const parsed = response.body.length > 0 ? parseErrorResponse(response.body) : undefined;
  if (parsed) {
    message += ` (${parsed.code}: ${parsed.message})`;
  }

  return new ObjectError({
    operation,
    message,
    status: response.status,
    code: parsed?.code,
    requestId: parsed?.requestId ?? getRequestId(response.headers),
    details: parsed?.hostId ? { hostId: parsed.hostId } : undefined,
  });
}

/**
 * Type guard to check if a value is an OssError
 */
export function isOssError(error: unknown): error is OssError {
  return error instanceof OssError;
}
