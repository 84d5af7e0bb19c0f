/**
 * Request type definitions for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/types/requests
 */

import type { HttpMethod } from '../transport/types.js';
import type { QueryParams } from '../signing/types.js';
import type { Metadata, MetadataDirective } from './common.js';

/**
 * Object upload options
 */
export interface PutOptions {
  /**
   * MIME type of the object
   */
  readonly contentType?: string;

  /**
   * User metadata, sent as `x-oss-meta-*` headers
   */
  readonly metadata?: Metadata;

  /**
   * Extra request headers, sent as given
   */
  readonly headers?: Readonly<Record<string, string>>;

  /**
   * Extra query parameters; allow-listed names are signed
   */
  readonly query?: QueryParams;
}

/**
 * Object download options
 */
export interface GetOptions {
  /**
   * Only return these metadata keys (without prefix). All when omitted.
   */
  readonly metaKeys?: readonly string[];

  readonly headers?: Readonly<Record<string, string>>;

  readonly query?: QueryParams;
}

export interface CopyOptions {
  /**
   * Bucket holding the source object. Defaults to the client's bucket.
   */
  readonly sourceBucket?: string;

  /**
   * `REPLACE` sends `metadata` as the target's metadata
   */
  readonly metadataDirective?: MetadataDirective;

  readonly metadata?: Metadata;

  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Presigned URL options
 */
export interface PresignOptions {
  /**
   * Method the URL will be used with
   * @default 'GET'
   */
  readonly method?: HttpMethod;

  /**
   * Lifetime in seconds from now. Ignored when `expires` is set.
   */
  readonly expiresIn?: number;

  /**
   * Absolute expiry time
   */
  readonly expires?: Date;

  /**
   * Content type the bearer must send; part of the signature
   */
  readonly contentType?: string;

  /**
   * Query parameters carried by the URL; allow-listed names are signed
   */
  readonly query?: QueryParams;
}
