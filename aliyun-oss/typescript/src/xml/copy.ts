/**
 * XML parsing for CopyObject responses
 * @module @oss-integrations/aliyun-oss/xml/copy
 */

import type { CopyObjectOutput } from '../types/index.js';
import { xmlEvents } from './parser.js';

/**
 * Reads `ETag` and `LastModified` from a `CopyObjectResult` document.
 * An empty body yields an empty result.
 *
 * @throws {DecodeError} If the document is malformed
 */
export function decodeCopyResult(xml: Uint8Array | string): CopyObjectOutput {
  if (xml.length === 0) {
    return {};
  }

  let eTag: string | undefined;
  let lastModified: string | undefined;
  let current: string | undefined;

  for (const event of xmlEvents(xml)) {
    if (event.type === 'start') {
      current = event.name;
    } else if (event.type === 'text') {
      if (current === 'ETag') {
        eTag = event.text;
      } else if (current === 'LastModified') {
        lastModified = event.text;
      }
    } else {
      current = undefined;
    }
  }

  return { eTag, lastModified };
}
