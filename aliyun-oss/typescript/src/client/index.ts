/**
 * Client module for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/client
 */

export type { OssClient, OssClientOptions } from './interface.js';
export { OssClientImpl } from './client.js';
export { createClient, createClientFromEnv, createClientFromNormalized } from './factory.js';
export { OssClientBuilder } from './builder.js';
