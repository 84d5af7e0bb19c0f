/**
 * Fluent builder for OSS client construction
 * @module @oss-integrations/aliyun-oss/client/builder
 */

import type { OssClient, OssClientOptions } from './interface.js';
import { OssConfigBuilder } from '../config/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { Logger } from '../observability/index.js';
import type { Clock } from '../types/index.js';
import { createClientFromNormalized } from './factory.js';

/**
 * Fluent builder for creating OSS clients
 *
 * @example
 * ```typescript
 * const client = new OssClientBuilder()
 *   .credentials('access-key-id', 'test-secret')
 *   .endpoint('https://oss-cn-hangzhou.aliyuncs.com')
 *   .bucket('examplebucket')
 *   .logger(new ConsoleLogger({ level: LogLevel.Debug }))
 *   .build();
 * ```
 */
export class OssClientBuilder {
  private readonly configBuilder = new OssConfigBuilder();
  private readonly options: OssClientOptions = {};

  credentials(accessKeyId: string, accessKeySecret: string): this {
    this.configBuilder.credentials(accessKeyId, accessKeySecret);
    return this;
  }

  endpoint(url: string): this {
    this.configBuilder.endpoint(url);
    return this;
  }

  bucket(name: string): this {
    this.configBuilder.bucket(name);
    return this;
  }

  /**
   * Sets the request timeout in milliseconds
   */
  timeout(ms: number): this {
    this.configBuilder.timeout(ms);
    return this;
  }

  /**
   * Sets the default presigned URL lifetime in seconds
   */
  presignExpiresIn(seconds: number): this {
    this.configBuilder.presignExpiresIn(seconds);
    return this;
  }

  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  clock(clock: Clock): this {
    this.options.clock = clock;
    return this;
  }

  /**
   * Validates the configuration and creates the client
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): OssClient {
    return createClientFromNormalized(this.configBuilder.build(), this.options);
  }
}
