/**
 * Factory functions for creating OSS clients
 * @module @oss-integrations/aliyun-oss/client/factory
 */

import type { OssClient, OssClientOptions } from './interface.js';
import { OssClientImpl } from './client.js';
import type { NormalizedOssConfig, OssConfig } from '../config/index.js';
import { normalizeConfig, createConfigFromEnv } from '../config/index.js';
import { OssSigner } from '../signing/index.js';
import { createFetchTransport } from '../transport/index.js';
import { NoopLogger } from '../observability/index.js';
import { systemClock } from '../types/index.js';

/**
 * Builds a client around an already normalized configuration
 */
export function createClientFromNormalized(
  config: NormalizedOssConfig,
  options: OssClientOptions = {}
): OssClient {
  const signer = new OssSigner({
    accessKeyId: config.accessKeyId,
    accessKeySecret: config.accessKeySecret,
  });

  return new OssClientImpl(
    config,
    options.transport ?? createFetchTransport(config.timeout),
    signer,
    options.logger ?? new NoopLogger(),
    options.clock ?? systemClock
  );
}

/**
 * Creates an OSS client from a configuration object
 *
 * @throws {ConfigError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   accessKeyId: 'access-key-id',
 *   accessKeySecret: 'test-secret',
 *   endpoint: 'https://oss-cn-hangzhou.aliyuncs.com',
 *   bucket: 'examplebucket',
 *   timeout: 30000,
 * });
 *
 * try {
 *   const { content } = await client.objects.get('notes.txt');
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(config: OssConfig, options: OssClientOptions = {}): OssClient {
  return createClientFromNormalized(normalizeConfig(config), options);
}

/**
 * Creates an OSS client from environment variables
 *
 * Reads OSS_ACCESS_KEY_ID, OSS_ACCESS_KEY_SECRET, OSS_ENDPOINT, OSS_BUCKET
 * and, optionally, OSS_TIMEOUT_MS.
 *
 * @throws {ConfigError} If required environment variables are missing or invalid
 */
export function createClientFromEnv(options: OssClientOptions = {}): OssClient {
  return createClientFromNormalized(createConfigFromEnv(), options);
}
