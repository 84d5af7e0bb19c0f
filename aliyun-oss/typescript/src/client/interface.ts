/**
 * Client interface for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/client/interface
 */

import type { OssObjectsService } from '../objects/index.js';
import type { OssPresignService } from '../presign/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { Logger } from '../observability/index.js';
import type { Clock } from '../types/index.js';

/**
 * Main OSS client interface
 *
 * A client is an immutable value bound to one bucket. To address another
 * bucket, derive a client with `withBucket`; the original is unchanged
 * and both share one transport.
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   accessKeyId: 'access-key-id',
 *   accessKeySecret: 'test-secret',
 *   endpoint: 'https://oss-cn-hangzhou.aliyuncs.com',
 *   bucket: 'examplebucket',
 * });
 *
 * await client.objects.put('hello.txt', 'Hello, world!');
 * const archive = client.withBucket('example-archive');
 *
 * await client.close();
 * ```
 */
export interface OssClient {
  /**
   * Service for object operations (put, get, head, delete, copy, list)
   */
  readonly objects: OssObjectsService;

  /**
   * Service for presigned URL generation
   */
  readonly presign: OssPresignService;

  readonly bucket: string;

  /**
   * Endpoint as configured
   */
  readonly endpoint: string;

  /**
   * Returns a client for `bucket` sharing this client's transport,
   * credentials, logger and clock.
   *
   * @throws {ConfigError} If the bucket name is invalid
   */
  withBucket(bucket: string): OssClient;

  /**
   * Closes the underlying transport. Clients derived with `withBucket`
   * share it, so closing any of them closes all of them. Repeated calls
   * do nothing.
   */
  close(): Promise<void>;

  /**
   * Whether this client's transport has been closed, by this client or
   * by one sharing it
   */
  isClosed(): boolean;
}

/**
 * Collaborators a client can be given instead of the defaults
 */
export interface OssClientOptions {
  /**
   * @default FetchTransport with the configured timeout
   */
  transport?: HttpTransport;

  /**
   * @default NoopLogger
   */
  logger?: Logger;

  /**
   * @default the system clock
   */
  clock?: Clock;
}
