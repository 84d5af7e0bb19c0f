/**
 * Fluent configuration builder for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/config/builder
 */

import type { OssConfig, NormalizedOssConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing OSS configuration.
 *
 * @example
 * ```typescript
 * const config = new OssConfigBuilder()
 *   .credentials('access-key-id', 'test-secret')
 *   .endpoint('https://oss-cn-hangzhou.aliyuncs.com')
 *   .bucket('examplebucket')
 *   .build();
 * ```
 */
export class OssConfigBuilder {
  private config: Partial<OssConfig> = {};

  /**
   * Sets the access credentials.
   */
  credentials(accessKeyId: string, accessKeySecret: string): this {
    this.config.accessKeyId = accessKeyId;
    this.config.accessKeySecret = accessKeySecret;
    return this;
  }

  endpoint(url: string): this {
    this.config.endpoint = url;
    return this;
  }

  bucket(name: string): this {
    this.config.bucket = name;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Sets the default presigned URL lifetime in seconds.
   */
  presignExpiresIn(seconds: number): this {
    this.config.defaultPresignExpiresIn = seconds;
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): NormalizedOssConfig {
    return normalizeConfig(this.config);
  }
}
