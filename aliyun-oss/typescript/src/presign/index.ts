/**
 * Presigned URL generation for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/presign
 */

export type { OssPresignService } from './interface.js';
export { OssPresignServiceImpl, PRESIGN_PARAMS } from './service.js';
