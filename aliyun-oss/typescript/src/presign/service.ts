/**
 * Presign service implementation for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/presign/service
 */

import type { OssPresignService } from './interface.js';
import type { NormalizedOssConfig } from '../config/index.js';
import type { Clock, PresignedUrl, PresignOptions } from '../types/index.js';
import { canonicalizeResource, toEpochSeconds, type OssSigner } from '../signing/index.js';
import { buildObjectUrl } from '../request/index.js';
import { ConfigError } from '../errors/index.js';

/**
 * Query parameters a presigned URL carries, appended after the caller's
 */
export const PRESIGN_PARAMS = {
  ACCESS_KEY_ID: 'OSSAccessKeyId',
  EXPIRES: 'Expires',
  SIGNATURE: 'Signature',
} as const;

/**
 * Implementation of OssPresignService over the query-string signature.
 *
 * The expiry is an absolute epoch second: `expires` when given, otherwise
 * the clock plus `expiresIn` (or the configured default lifetime).
 */
export class OssPresignServiceImpl implements OssPresignService {
  constructor(
    private readonly config: NormalizedOssConfig,
    private readonly signer: OssSigner,
    private readonly clock: Clock
  ) {}

  /**
   * @example
   * ```typescript
   * const { url } = presign.signUrl('reports/q1.pdf', { expiresIn: 600 });
   * await fetch(url);
   * ```
   */
  signUrl(key: string, options: PresignOptions = {}): PresignedUrl {
    const method = options.method ?? 'GET';
    const expires = this.resolveExpires(options);

    const signature = this.signer.presign({
      verb: method,
      bucket: this.config.bucket,
      objectKey: key,
      canonicalResource: canonicalizeResource(options.query),
      headers: options.contentType ? { 'Content-Type': options.contentType } : {},
      expires,
    });

    const url = buildObjectUrl(this.config.scheme, this.config.host, this.config.bucket, key, {
      ...options.query,
      [PRESIGN_PARAMS.ACCESS_KEY_ID]: this.signer.accessKeyId,
      [PRESIGN_PARAMS.EXPIRES]: String(expires),
      [PRESIGN_PARAMS.SIGNATURE]: signature,
    });

    return { url, expires };
  }

  private resolveExpires(options: PresignOptions): number {
    if (options.expires) {
      return toEpochSeconds(options.expires);
    }

    const expiresIn = options.expiresIn ?? this.config.defaultPresignExpiresIn;
    if (!Number.isInteger(expiresIn) || expiresIn <= 0) {
      throw new ConfigError({
        message: `expiresIn must be a positive integer, got ${expiresIn}`,
        code: 'INVALID_EXPIRES_IN',
        details: { expiresIn },
      });
    }
    return toEpochSeconds(this.clock()) + expiresIn;
  }
}
