/**
 * Error system for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/errors
 */

export { OssError, type OssErrorKind, type OssErrorParams } from './error.js';

export {
  ConfigError,
  DecodeError,
  EncodingError,
  NetworkError,
  ObjectError,
  Utf8Error,
  type ObjectOperation,
} from './categories.js';

export { classifyResponse, isOssError } from './classify.js';
