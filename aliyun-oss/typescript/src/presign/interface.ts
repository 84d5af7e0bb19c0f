/**
 * Presign service interface for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/presign/interface
 */

import type { PresignedUrl, PresignOptions } from '../types/index.js';

/**
 * Service for generating presigned URLs.
 *
 * A presigned URL carries `OSSAccessKeyId`, `Expires` and `Signature` as
 * query parameters, so a bearer without credentials can use it until the
 * expiry second passes.
 */
export interface OssPresignService {
  /**
   * @throws {ConfigError} If the lifetime is not a positive integer
   * @throws {EncodingError} If the content type cannot be sent as a header
   */
  signUrl(key: string, options?: PresignOptions): PresignedUrl;
}
