/**
 * Request assembly for the Aliyun OSS integration
 */

export type { AssembleInput, AssembleContext } from './assembler.js';

export {
  assembleRequest,
  assertMaxKeys,
  buildListQuery,
  buildObjectUrl,
  buildQueryString,
} from './assembler.js';

export { encodeMetadata, decodeMetadata } from './metadata.js';
