/**
 * Default configuration values for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/config/defaults
 */

/**
 * Default request timeout in milliseconds (1 minute).
 */
export const DEFAULT_TIMEOUT = 60000;

/**
 * Default presigned URL lifetime in seconds (1 hour).
 */
export const DEFAULT_PRESIGN_EXPIRES_IN = 3600;

/**
 * Scheme used when the endpoint names none.
 */
export const DEFAULT_SCHEME = 'http';
