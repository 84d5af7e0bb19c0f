/**
 * Configuration validation and normalization for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/config/validation
 */

import { ConfigError } from '../errors/index.js';
import type { EndpointScheme, NormalizedOssConfig, OssConfig } from './types.js';
import { DEFAULT_PRESIGN_EXPIRES_IN, DEFAULT_SCHEME, DEFAULT_TIMEOUT } from './defaults.js';

const BUCKET_NAME = /^[a-z0-9][a-z0-9-]{1,61}[a-z0-9]$/;
const SCHEME_PREFIX = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

/**
 * Checks a bucket name against the provider rule: 3 to 63 lower-case
 * letters, digits and hyphens, not starting or ending with a hyphen.
 */
export function isValidBucketName(bucket: string): boolean {
  return BUCKET_NAME.test(bucket);
}

/**
 * Splits an endpoint into scheme and bare host.
 *
 * @throws {ConfigError} If the scheme is not http(s) or no host remains
 *
 * @example
 * ```typescript
 * parseEndpoint('oss-cn-hangzhou.aliyuncs.com');
 * // { scheme: 'http', host: 'oss-cn-hangzhou.aliyuncs.com' }
 * ```
 */
export function parseEndpoint(endpoint: string): { scheme: EndpointScheme; host: string } {
  const trimmed = endpoint.trim();
  const match = SCHEME_PREFIX.exec(trimmed);
  const rawScheme = match ? match[1].toLowerCase() : DEFAULT_SCHEME;

  if (rawScheme !== 'http' && rawScheme !== 'https') {
    throw ConfigError.invalidEndpoint(endpoint, 'endpoint must use http or https protocol');
  }

  const rest = match ? trimmed.slice(match[0].length) : trimmed;
  const host = rest.split('/')[0];
  if (!host) {
    throw ConfigError.invalidEndpoint(endpoint, 'endpoint has no host');
  }

  return { scheme: rawScheme, host };
}

function assertPositiveInteger(value: number | undefined, field: string): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new ConfigError({
      message: `${field} must be a positive integer`,
      code: `INVALID_${field.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`,
      details: { field, value },
    });
  }
}

/**
 * Validates OSS configuration.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function validateConfig(config: Partial<OssConfig>): asserts config is OssConfig {
  if (!config.accessKeyId) {
    throw ConfigError.missingField('accessKeyId');
  }

  if (!config.accessKeySecret) {
    throw ConfigError.missingField('accessKeySecret');
  }

  if (!config.endpoint) {
    throw ConfigError.missingField('endpoint');
  }

  if (!config.bucket) {
    throw ConfigError.missingField('bucket');
  }

  if (!isValidBucketName(config.bucket)) {
    throw ConfigError.invalidBucketName(config.bucket);
  }

  parseEndpoint(config.endpoint);
  assertPositiveInteger(config.timeout, 'timeout');
  assertPositiveInteger(config.defaultPresignExpiresIn, 'defaultPresignExpiresIn');
}

/**
 * Normalizes OSS configuration by applying defaults and validating.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: Partial<OssConfig>): NormalizedOssConfig {
  validateConfig(config);

  const { scheme, host } = parseEndpoint(config.endpoint);

  return {
    accessKeyId: config.accessKeyId,
    accessKeySecret: config.accessKeySecret,
    endpoint: config.endpoint,
    bucket: config.bucket,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    defaultPresignExpiresIn: config.defaultPresignExpiresIn ?? DEFAULT_PRESIGN_EXPIRES_IN,
    scheme,
    host,
  };
}
