/**
 * Test support for the Aliyun OSS integration
 *
 * @module @oss-integrations/aliyun-oss/testing
 *
 * @example
 * ```typescript
 * const { client, server } = createTestClient();
 * server.putObject('test-bucket', 'a.txt', 'hello');
 * const { content } = await client.objects.get('a.txt');
 * ```
 */

import type { NormalizedOssConfig, OssConfig } from '../config/index.js';
import { normalizeConfig } from '../config/index.js';
import type { OssClient, OssClientOptions } from '../client/index.js';
import { createClientFromNormalized } from '../client/index.js';
import type { Clock } from '../types/index.js';
import { MockOssServer } from './mock-server.js';

export { MockOssServer, type MockOssServerOptions, type StoredObject } from './mock-server.js';

/**
 * 2024-01-01T00:00:00Z, the default time of test clocks
 */
export const TEST_DATE = new Date(Date.UTC(2024, 0, 1, 0, 0, 0));

/**
 * A clock that always reads `date`
 */
export function fixedClock(date: Date | string | number = TEST_DATE): Clock {
  const time = new Date(date).getTime();
  return () => new Date(time);
}

/**
 * Normalized configuration with placeholder credentials
 */
export function createTestConfig(overrides: Partial<OssConfig> = {}): NormalizedOssConfig {
  return normalizeConfig({
    accessKeyId: 'test-access-key-id',
    accessKeySecret: 'test-secret',
    endpoint: 'http://oss-test.aliyuncs.com',
    bucket: 'test-bucket',
    ...overrides,
  });
}

export interface TestClient {
  client: OssClient;
  server: MockOssServer;
  config: NormalizedOssConfig;
}

/**
 * A client wired to a fresh MockOssServer that shares its credentials
 * and clock
 */
export function createTestClient(
  overrides: Partial<OssConfig> = {},
  options: Omit<OssClientOptions, 'transport'> = {}
): TestClient {
  const config = createTestConfig(overrides);
  const clock = options.clock ?? fixedClock();
  const server = new MockOssServer({
    credentials: { accessKeyId: config.accessKeyId, accessKeySecret: config.accessKeySecret },
    clock,
  });
  const client = createClientFromNormalized(config, { ...options, transport: server, clock });
  return { client, server, config };
}
