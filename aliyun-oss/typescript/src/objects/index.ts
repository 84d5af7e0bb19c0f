/**
 * Objects module for the Aliyun OSS integration
 *
 * - Upload objects (PUT) from a buffer, with metadata and extra headers
 * - Download objects as text or bytes
 * - Retrieve object metadata (HEAD)
 * - Delete one object, or several in sequence
 * - Server-side copy
 * - Caller-driven paginated listing (ListObjectsV2)
 *
 * @module @oss-integrations/aliyun-oss/objects
 */

// Service interface
export type { OssObjectsService } from './interface.js';
export type { ObjectsContext } from './context.js';

// Service implementation
export { OssObjectsServiceImpl } from './service.js';

// Individual operation functions
export { putObject } from './put.js';
export { getObject, getObjectBuffer } from './get.js';
export { deleteObject, deleteObjects } from './delete.js';
export { headObject } from './head.js';
export { copyObject, COPY_SOURCE_HEADER, METADATA_DIRECTIVE_HEADER } from './copy.js';
export { listObjects, listDetails } from './list.js';

export { ListOptionsBuilder } from './list-options.js';

export { sendRequest, parseIntHeader } from './utils.js';
