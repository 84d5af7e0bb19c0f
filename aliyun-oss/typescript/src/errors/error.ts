/**
 * Base error class for the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/errors/error
 */

/**
 * Failure classes surfaced by the client.
 *
 * - `config`: invalid or missing configuration
 * - `transport`: connection, DNS, TLS or timeout failure from the transport
 * - `encoding`: a header name or value that cannot be sent
 * - `protocol`: the service answered with a non-2xx status
 * - `decode`: a malformed response document
 * - `utf8`: a byte body that is not valid UTF-8
 */
export type OssErrorKind = 'config' | 'transport' | 'encoding' | 'protocol' | 'decode' | 'utf8';

/**
 * Parameters for creating an OssError
 */
export interface OssErrorParams {
  /**
   * Failure class
   */
  readonly kind: OssErrorKind;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Machine-readable error code (service code or local code)
   */
  readonly code?: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Request ID for troubleshooting
   */
  readonly requestId?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying failure
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all OSS operations.
 *
 * Every failure is one tagged value: switch on `kind` for programmatic
 * handling instead of on the concrete subclass.
 */
export class OssError extends Error {
  readonly kind: OssErrorKind;
  readonly code?: string;
  readonly status?: number;
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;

  constructor(params: OssErrorParams) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, OssError.prototype);

    this.name = 'OssError';
    this.kind = params.kind;
    this.code = params.code;
    this.status = params.status;
    this.requestId = params.requestId;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OssError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      status: this.status,
      requestId: this.requestId,
      details: this.details,
    };
  }

  toString(): string {
    const parts = [this.name, this.kind];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}
