/**
 * Type definitions for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/types
 */

export type {
  ObjectSummary,
  ListPage,
  ListOptions,
  Metadata,
  Clock,
  MetadataDirective,
} from './common.js';

export { systemClock } from './common.js';

export type { PutOptions, GetOptions, CopyOptions, PresignOptions } from './requests.js';

export type {
  PutObjectOutput,
  GetObjectOutput,
  GetBufferOutput,
  HeadObjectOutput,
  CopyObjectOutput,
  PresignedUrl,
} from './responses.js';
