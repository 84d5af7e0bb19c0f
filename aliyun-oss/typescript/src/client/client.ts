/**
 * Main OSS client implementation
 * @module @oss-integrations/aliyun-oss/client/client
 */

import type { OssClient } from './interface.js';
import type { NormalizedOssConfig } from '../config/index.js';
import { ConfigError } from '../errors/index.js';
import { isValidBucketName } from '../config/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { OssSigner } from '../signing/index.js';
import type { Logger } from '../observability/index.js';
import type { Clock } from '../types/index.js';
import { OssObjectsServiceImpl, type OssObjectsService } from '../objects/index.js';
import { OssPresignServiceImpl, type OssPresignService } from '../presign/index.js';

/**
 * Closed flag of one transport, shared by every client over it
 */
interface TransportLease {
  closed: boolean;
}

/**
 * Main OSS client implementation
 *
 * Wires the object and presign services to one configuration. Nothing
 * here changes after construction.
 */
export class OssClientImpl implements OssClient {
  readonly objects: OssObjectsService;
  readonly presign: OssPresignService;

  constructor(
    private readonly config: NormalizedOssConfig,
    private readonly transport: HttpTransport,
    private readonly signer: OssSigner,
    private readonly logger: Logger,
    private readonly clock: Clock,
    private readonly lease: TransportLease = { closed: false }
  ) {
    this.objects = new OssObjectsServiceImpl({ config, transport, signer, logger, clock });
    this.presign = new OssPresignServiceImpl(config, signer, clock);
  }

  get bucket(): string {
    return this.config.bucket;
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  withBucket(bucket: string): OssClient {
    if (!isValidBucketName(bucket)) {
      throw ConfigError.invalidBucketName(bucket);
    }
    return new OssClientImpl(
      { ...this.config, bucket },
      this.transport,
      this.signer,
      this.logger,
      this.clock,
      this.lease
    );
  }

  async close(): Promise<void> {
    if (this.lease.closed) {
      return;
    }
    this.lease.closed = true;
    await this.transport.close();
  }

  /**
   * Gets the normalized configuration
   * @internal
   */
  getConfig(): NormalizedOssConfig {
    return this.config;
  }

  isClosed(): boolean {
    return this.lease.closed;
  }
}
