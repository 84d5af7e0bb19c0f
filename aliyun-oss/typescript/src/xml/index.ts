/**
 * XML parsing and building utilities for the Aliyun OSS integration
 *
 * Responses are read as a forward-only event stream from a SAX tokenizer:
 * listing pages go through a small state machine that keeps only what it
 * needs.
 *
 * @module @oss-integrations/aliyun-oss/xml
 *
 * @example
 * ```typescript
 * import { decodeListPage, parseErrorResponse } from '@oss-integrations/aliyun-oss';
 *
 * const page = decodeListPage(response.body);
 * console.log(page.entries.map((entry) => entry.key));
 * ```
 */

// Core parser utilities
export {
  createXmlBuilder,
  xmlEvents,
  decodeBody,
  buildXml,
  parseBooleanStrict,
  type XmlEvent,
} from './parser.js';

// Listing decoding
export { ListingDecoder, decodeListPage, decodeKeyList } from './list-objects.js';

// Copy result parsing
export { decodeCopyResult } from './copy.js';

// Error parsing
export {
  parseErrorResponse,
  isErrorResponse,
  formatErrorMessage,
  type ParsedError,
} from './error.js';

// XML builders
export {
  buildListBucketResultXml,
  buildErrorXml,
  buildCopyObjectResultXml,
  type ListBucketResultInput,
} from './builders.js';
