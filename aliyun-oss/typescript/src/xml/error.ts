/**
 * XML parsing for OSS error responses
 * @module @oss-integrations/aliyun-oss/xml/error
 */

import { xmlEvents } from './parser.js';
import { DecodeError, Utf8Error } from '../errors/categories.js';

/**
 * Parsed error information from an OSS response
 */
export interface ParsedError {
  /**
   * Error code (e.g., 'NoSuchKey', 'AccessDenied')
   */
  readonly code: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Request ID for debugging
   */
  readonly requestId?: string;

  readonly resource?: string;

  readonly hostId?: string;
}

const ERROR_FIELDS = new Map<string, keyof ParsedError>([
  ['Code', 'code'],
  ['Message', 'message'],
  ['RequestId', 'requestId'],
  ['Resource', 'resource'],
  ['HostId', 'hostId'],
]);

/**
 * Reads the direct children of a root `<Error>` element.
 *
 * @throws {DecodeError} If the document is malformed
 * @throws {Utf8Error} If the bytes are not valid UTF-8
 */
function readErrorFields(body: Uint8Array | string): Map<keyof ParsedError, string> | undefined {
  const fields = new Map<keyof ParsedError, string>();
  let depth = 0;
  let isError = false;
  let current: keyof ParsedError | undefined;

  for (const event of xmlEvents(body)) {
    if (event.type === 'start') {
      depth += 1;
      if (depth === 1) {
        isError = event.name === 'Error';
      } else if (depth === 2 && isError) {
        current = ERROR_FIELDS.get(event.name);
      }
    } else if (event.type === 'text') {
      if (current && depth === 2) {
        fields.set(current, (fields.get(current) ?? '') + event.text);
      }
    } else {
      if (depth === 2) {
        current = undefined;
      }
      depth -= 1;
    }
  }

  return isError ? fields : undefined;
}

/**
 * Parses an OSS error document.
 *
 * Returns `undefined` when the body is not an `<Error>` document with a
 * `Code`, so callers can fall back to the bare status.
 *
 * @example
 * ```typescript
 * const parsed = parseErrorResponse(
 *   '<Error><Code>NoSuchKey</Code><Message>The specified key does not exist.</Message></Error>'
 * );
 * parsed?.code; // 'NoSuchKey'
 * ```
 */
export function parseErrorResponse(body: Uint8Array | string): ParsedError | undefined {
  let fields: Map<keyof ParsedError, string> | undefined;
  try {
    fields = readErrorFields(body);
  } catch (error) {
    if (error instanceof DecodeError || error instanceof Utf8Error) {
      return undefined;
    }
    throw error;
  }

  const code = fields?.get('code');
  if (!fields || !code) {
    return undefined;
  }

  return {
    code,
    message: fields.get('message') ?? '',
    requestId: fields.get('requestId'),
    resource: fields.get('resource'),
    hostId: fields.get('hostId'),
  };
}

/**
 * Checks whether a body is an OSS error document
 */
export function isErrorResponse(body: Uint8Array | string): boolean {
  return parseErrorResponse(body) !== undefined;
}

/**
 * Creates a one-line message from a parsed error
 *
 * @example
 * ```typescript
 * formatErrorMessage({ code: 'NoSuchKey', message: 'Not found', requestId: 'r1' });
 * // 'NoSuchKey: Not found (RequestId: r1)'
 * ```
 */
export function formatErrorMessage(error: ParsedError): string {
  let message = `${error.code}: ${error.message}`;

  if (error.requestId) {
    message += ` (RequestId: ${error.requestId})`;
  }

  if (error.resource) {
    message += ` [Resource: ${error.resource}]`;
  }

  return message;
}
