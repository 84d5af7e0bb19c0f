/**
 * Aliyun OSS client
 *
 * Request signing, object operations and paginated listing for Aliyun
 * Object Storage Service.
 *
 * @module @oss-integrations/aliyun-oss
 *
 * @example
 * ```typescript
 * import { createClient } from '@oss-integrations/aliyun-oss';
 *
 * const client = createClient({
 *   accessKeyId: process.env.OSS_ACCESS_KEY_ID ?? '',
 *   accessKeySecret: process.env.OSS_ACCESS_KEY_SECRET ?? '',
 *   endpoint: 'https://oss-cn-hangzhou.aliyuncs.com',
 *   bucket: 'examplebucket',
 * });
 *
 * await client.objects.put('hello.txt', 'Hello, world!', { contentType: 'text/plain' });
 * const page = await client.objects.listDetails({ prefix: 'logs/', maxKeys: 100 });
 * const { url } = client.presign.signUrl('hello.txt', { expiresIn: 600 });
 * ```
 */

export * from './client/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './objects/index.js';
export * from './observability/index.js';
export * from './presign/index.js';
export * from './request/index.js';
export * from './signing/index.js';
export * from './transport/index.js';
export * from './types/index.js';
export * from './xml/index.js';
