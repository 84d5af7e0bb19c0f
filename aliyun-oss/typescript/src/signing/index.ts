/**
 * OSS request signing
 *
 * - Canonical resource: allow-listed sub-resources, sorted by name
 * - Canonical headers: `x-oss-*` headers, lower-cased, sorted, merged
 * - Signature: base64 HMAC-SHA1 over the string-to-sign
 * - Header (`Authorization: OSS id:sig`) and query-string (presigned) shapes
 */

export type {
  HeaderInput,
  QueryParams,
  OssCredentials,
  SigningRequest,
  StringToSignParts,
} from './types.js';

export { OssSigner, buildStringToSign } from './signer.js';

export { SUB_RESOURCES, isSubResource, canonicalizeResource, compareNames } from './resources.js';

export {
  OSS_HEADER_PREFIX,
  OSS_META_PREFIX,
  canonicalizeHeaders,
  findHeader,
  headerEntries,
} from './headers.js';

export { hmacSha1, hmacSha1Base64, toBase64 } from './crypto.js';

export { formatHttpDate, toEpochSeconds } from './format.js';

export { assertValidHeader, isValidHeaderName, isValidHeaderValue } from './validate.js';
