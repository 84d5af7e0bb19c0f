/**
 * Environment variable configuration loading for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/config/env
 */

import { ConfigError } from '../errors/index.js';
import type { OssConfig, NormalizedOssConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names for OSS configuration.
 */
export const ENV_VARS = {
  ACCESS_KEY_ID: 'OSS_ACCESS_KEY_ID',
  ACCESS_KEY_SECRET: 'OSS_ACCESS_KEY_SECRET',
  ENDPOINT: 'OSS_ENDPOINT',
  BUCKET: 'OSS_BUCKET',
  TIMEOUT_MS: 'OSS_TIMEOUT_MS',
} as const;

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Parses an integer from an environment variable.
 *
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  if (!/^\s*-?\d+\s*$/.test(value)) {
    throw new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
      details: { variable: name },
    });
  }

  return parseInt(value, 10);
}

/**
 * Creates OSS configuration from environment variables.
 *
 * Environment variables:
 * - OSS_ACCESS_KEY_ID (required)
 * - OSS_ACCESS_KEY_SECRET (required)
 * - OSS_ENDPOINT (required)
 * - OSS_BUCKET (required)
 * - OSS_TIMEOUT_MS (optional): Request timeout in milliseconds
 *
 * @throws {ConfigError} If required environment variables are missing or invalid
 */
export function createConfigFromEnv(env: Env = process.env): NormalizedOssConfig {
  const config: Partial<OssConfig> = {
    accessKeyId: env[ENV_VARS.ACCESS_KEY_ID],
    accessKeySecret: env[ENV_VARS.ACCESS_KEY_SECRET],
    endpoint: env[ENV_VARS.ENDPOINT],
    bucket: env[ENV_VARS.BUCKET],
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
  };

  return normalizeConfig(config);
}
