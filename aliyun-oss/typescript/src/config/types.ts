/**
 * Configuration type definitions for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/config/types
 */

/**
 * Core OSS configuration parameters.
 */
export interface OssConfig {
  /**
   * OSS access key ID.
   */
  accessKeyId: string;

  /**
   * OSS access key secret.
   */
  accessKeySecret: string;

  /**
   * Service endpoint, e.g. `https://oss-cn-hangzhou.aliyuncs.com`.
   * An endpoint without a scheme is reached over plain http.
   */
  endpoint: string;

  /**
   * Bucket the client addresses.
   */
  bucket: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000
   */
  timeout?: number;

  /**
   * Lifetime of presigned URLs in seconds when a call names none.
   * @default 3600
   */
  defaultPresignExpiresIn?: number;
}

export type EndpointScheme = 'http' | 'https';

/**
 * Normalized configuration with all required fields populated.
 */
export interface NormalizedOssConfig extends Required<OssConfig> {
  /**
   * Scheme split out of `endpoint`.
   */
  scheme: EndpointScheme;

  /**
   * Bare host (and port) of the endpoint, without scheme or path.
   */
  host: string;
}
