/**
 * HTTP transport type definitions for Aliyun OSS
 */

/**
 * HTTP methods used by object operations
 */
export type HttpMethod = 'GET' | 'PUT' | 'DELETE' | 'HEAD';

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body, present only for PUT */
  body?: Uint8Array;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Reason phrase, when the transport reports one */
  statusText?: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Response body as buffer */
  body: Uint8Array;
}

/**
 * HTTP transport interface.
 *
 * A transport performs exactly one round trip per call. It surfaces
 * connection failures as rejections and hands every status code back
 * unchanged; classifying statuses is the caller's job.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Closes the transport and releases resources
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Helper to check if response is successful (2xx status)
 */
export function isSuccessResponse(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Helper to extract request ID from response headers
 */
export function getRequestId(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'x-oss-request-id');
}
