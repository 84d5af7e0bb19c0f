/**
 * Utility functions for object operations
 * @module @oss-integrations/aliyun-oss/objects/utils
 */

import type { HttpResponse } from '../transport/index.js';
import { getHeader, getRequestId } from '../transport/index.js';
import { assembleRequest, type AssembleInput } from '../request/index.js';
import type { ObjectsContext } from './context.js';

/**
 * Assembles, signs and sends one request, then logs the round trip.
 *
 * The response is returned whatever its status; classifying it is the
 * operation's job.
 *
 * @throws {EncodingError} If a header cannot be sent
 * @throws {NetworkError} If the transport fails
 */
export async function sendRequest(
  context: ObjectsContext,
  input: Omit<AssembleInput, 'bucket'>
): Promise<HttpResponse> {
  const { config } = context;
  const request = assembleRequest(
    { ...input, bucket: config.bucket },
    {
      scheme: config.scheme,
      host: config.host,
      signer: context.signer,
      date: context.clock(),
    }
  );

  const startTime = Date.now();
  const response = await context.transport.send(request);

  context.logger.debug('OSS request completed', {
    method: request.method,
    bucket: config.bucket,
    key: input.key,
    status: response.status,
    durationMs: Date.now() - startTime,
    requestId: getRequestId(response.headers),
  });

  return response;
}

/**
 * Parses a numeric header such as `Content-Length`
 */
export function parseIntHeader(
  headers: Record<string, string>,
  name: string
): number | undefined {
  const value = getHeader(headers, name);
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}
