/**
 * Objects service interface for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/objects/interface
 */

import type {
  CopyObjectOutput,
  CopyOptions,
  GetBufferOutput,
  GetObjectOutput,
  GetOptions,
  HeadObjectOutput,
  ListOptions,
  ListPage,
  PutObjectOutput,
  PutOptions,
} from '../types/index.js';

/**
 * Object operations on the client's bucket.
 *
 * Every method is a single round trip (`deleteMany` is one per key) with
 * no retries. A non-2xx status rejects with an `ObjectError`.
 */
export interface OssObjectsService {
  /**
   * Upload an object from a buffer
   *
   * @example
   * ```typescript
   * await objects.put('hello.txt', 'Hello, world!', { contentType: 'text/plain' });
   * ```
   */
  put(key: string, body: Uint8Array | string, options?: PutOptions): Promise<PutObjectOutput>;

  /**
   * Download an object as UTF-8 text
   */
  get(key: string, options?: GetOptions): Promise<GetObjectOutput>;

  /**
   * Download an object as bytes
   */
  getBuffer(key: string, options?: GetOptions): Promise<GetBufferOutput>;

  head(key: string): Promise<HeadObjectOutput>;

  delete(key: string): Promise<void>;

  /**
   * Delete objects sequentially, stopping at the first failure
   */
  deleteMany(keys: readonly string[]): Promise<void>;

  copy(sourceKey: string, targetKey: string, options?: CopyOptions): Promise<CopyObjectOutput>;

  /**
   * One page of keys
   */
  listObjects(options?: ListOptions): Promise<string[]>;

  /**
   * One page of summaries, common prefixes and the continuation marker
   */
  listDetails(options?: ListOptions): Promise<ListPage>;
}
