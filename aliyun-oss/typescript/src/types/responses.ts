/**
 * Response type definitions for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/types/responses
 */

import type { Metadata } from './common.js';

export interface PutObjectOutput {
  readonly eTag?: string;
  readonly requestId?: string;
}

/**
 * Downloaded object with its metadata and raw response headers
 */
export interface GetObjectOutput<T = string> {
  readonly content: T;
  readonly metadata: Metadata;
  readonly headers: Record<string, string>;
}

export type GetBufferOutput = GetObjectOutput<Uint8Array>;

export interface HeadObjectOutput {
  readonly metadata: Metadata;
  readonly contentLength?: number;
  readonly contentType?: string;
  readonly eTag?: string;
  readonly lastModified?: string;
  readonly headers: Record<string, string>;
}

export interface CopyObjectOutput {
  readonly eTag?: string;
  readonly lastModified?: string;
}

/**
 * A presigned URL and the epoch second it stops working
 */
export interface PresignedUrl {
  readonly url: string;
  readonly expires: number;
}
