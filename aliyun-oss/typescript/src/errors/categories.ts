/**
 * Specific error categories for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/errors/categories
 */

import { OssError, type OssErrorParams } from './error.js';

type CategoryParams = Omit<OssErrorParams, 'kind'>;

/**
 * Configuration and initialization errors
 */
export class ConfigError extends OssError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'config' });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static missingField(field: string): ConfigError {
    return new ConfigError({
      message: `${field} is required`,
      code: `MISSING_${field.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`,
      details: { field },
    });
  }

  static invalidEndpoint(endpoint: string, reason: string): ConfigError {
    return new ConfigError({
      message: `Invalid endpoint URL: ${reason}`,
      code: 'INVALID_ENDPOINT',
      details: { endpoint },
    });
  }

  static invalidBucketName(bucket: string): ConfigError {
    return new ConfigError({
      message: `Invalid bucket name: ${bucket}`,
      code: 'INVALID_BUCKET_NAME',
      details: { bucket },
    });
  }
}

/**
 * Connection, DNS, TLS and timeout failures raised by the transport
 */
export class NetworkError extends OssError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'transport' });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
      cause,
    });
  }

  static dnsError(url: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `DNS resolution failed for ${url}`,
      code: 'DNS_ERROR',
      details: { url },
      cause,
    });
  }

  static connectionFailed(message: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Connection failed: ${message}`,
      code: 'CONNECTION_FAILED',
      cause,
    });
  }
}

/**
 * A header name or value that cannot be put on the wire
 */
export class EncodingError extends OssError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'encoding' });
    this.name = 'EncodingError';
    Object.setPrototypeOf(this, EncodingError.prototype);
  }

  static invalidHeaderName(name: string): EncodingError {
    return new EncodingError({
      message: `Invalid header name: ${JSON.stringify(name)}`,
      code: 'INVALID_HEADER_NAME',
      details: { name },
    });
  }

  static invalidHeaderValue(name: string): EncodingError {
    return new EncodingError({
      message: `Invalid value for header ${name}`,
      code: 'INVALID_HEADER_VALUE',
      details: { name },
    });
  }
}

/**
 * Object operations that classify a non-2xx answer
 */
export type ObjectOperation = 'put' | 'get' | 'copy' | 'delete' | 'head';

/**
 * The service answered an object operation with a non-2xx status
 */
export class ObjectError extends OssError {
  readonly operation: ObjectOperation;

  constructor(params: CategoryParams & { operation: ObjectOperation }) {
    const { operation, ...rest } = params;
    super({ ...rest, kind: 'protocol' });
    this.name = 'ObjectError';
    this.operation = operation;
    Object.setPrototypeOf(this, ObjectError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation };
  }
}

/**
 * A response document that could not be decoded
 */
export class DecodeError extends OssError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'decode' });
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }

  static malformedXml(reason: string, cause?: unknown): DecodeError {
    return new DecodeError({
      message: `Malformed XML document: ${reason}`,
      code: 'MALFORMED_XML',
      cause,
    });
  }

  static invalidBoolean(element: string, text: string): DecodeError {
    return new DecodeError({
      message: `${element} must be "true" or "false", got ${JSON.stringify(text)}`,
      code: 'INVALID_BOOLEAN',
      details: { element, text },
    });
  }
}

/**
 * A buffered body that is not valid UTF-8
 */
export class Utf8Error extends OssError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'utf8' });
    this.name = 'Utf8Error';
    Object.setPrototypeOf(this, Utf8Error.prototype);
  }
}
