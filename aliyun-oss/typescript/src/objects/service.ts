/**
 * Objects service implementation for Aliyun OSS
 * @module @oss-integrations/aliyun-oss/objects/service
 */

import type { OssObjectsService } from './interface.js';
import type { ObjectsContext } from './context.js';
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
import { putObject } from './put.js';
import { getObject, getObjectBuffer } from './get.js';
import { deleteObject, deleteObjects } from './delete.js';
import { headObject } from './head.js';
import { copyObject } from './copy.js';
import { listDetails, listObjects } from './list.js';

/**
 * Main implementation of OssObjectsService
 *
 * Each method delegates to its operation function with the shared
 * context: signer, transport, logger and clock of the owning client.
 */
export class OssObjectsServiceImpl implements OssObjectsService {
  constructor(private readonly context: ObjectsContext) {}

  async put(key: string, body: Uint8Array | string, options?: PutOptions): Promise<PutObjectOutput> {
    return putObject(this.context, key, body, options);
  }

  async get(key: string, options?: GetOptions): Promise<GetObjectOutput> {
    return getObject(this.context, key, options);
  }

  async getBuffer(key: string, options?: GetOptions): Promise<GetBufferOutput> {
    return getObjectBuffer(this.context, key, options);
  }

  async head(key: string): Promise<HeadObjectOutput> {
    return headObject(this.context, key);
  }

  async delete(key: string): Promise<void> {
    return deleteObject(this.context, key);
  }

  async deleteMany(keys: readonly string[]): Promise<void> {
    return deleteObjects(this.context, keys);
  }

  async copy(sourceKey: string, targetKey: string, options?: CopyOptions): Promise<CopyObjectOutput> {
    return copyObject(this.context, sourceKey, targetKey, options);
  }

  async listObjects(options?: ListOptions): Promise<string[]> {
    return listObjects(this.context, options);
  }

  async listDetails(options?: ListOptions): Promise<ListPage> {
    return listDetails(this.context, options);
  }
}
