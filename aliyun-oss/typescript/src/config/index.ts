/**
 * Configuration module for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/config
 */

export type { OssConfig, NormalizedOssConfig, EndpointScheme } from './types.js';

export { DEFAULT_TIMEOUT, DEFAULT_PRESIGN_EXPIRES_IN, DEFAULT_SCHEME } from './defaults.js';

export { validateConfig, normalizeConfig, parseEndpoint, isValidBucketName } from './validation.js';

export { OssConfigBuilder } from './builder.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
