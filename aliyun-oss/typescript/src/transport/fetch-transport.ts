/**
 * Fetch-based HTTP transport implementation for Aliyun OSS
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { NetworkError } from '../errors/categories.js';
import { OssError } from '../errors/error.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeout: number;
  /** Whether to use keep-alive connections */
  keepAlive?: boolean;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses the global Fetch API. Bodies are always buffered; status codes are
 * passed through untouched.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        keepalive: this.options.keepAlive !== false,
        signal: controller.signal,
      });

      const body =
        request.method === 'HEAD' ? new Uint8Array(0) : new Uint8Array(await response.arrayBuffer());

      return {
        status: response.status,
        statusText: response.statusText,
        headers: this.convertHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.handleError(error, request);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Closes the transport (no-op for fetch-based transport)
   */
  async close(): Promise<void> {
    // Fetch API doesn't require explicit cleanup
  }

  /**
   * Converts Headers object to plain object
   */
  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  /**
   * Handles errors from fetch operations
   */
  private handleError(error: unknown, request: HttpRequest): OssError {
    if (error instanceof OssError) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return NetworkError.timeout(this.options.timeout, error);
      }

      // undici wraps the system error in `cause`
      const detail =
        error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
      const lower = detail.toLowerCase();

      if (lower.includes('enotfound') || lower.includes('eai_again')) {
        return NetworkError.dnsError(request.url, error);
      }

      return NetworkError.connectionFailed(detail, error);
    }

    return NetworkError.connectionFailed(String(error), error);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number = 60000): HttpTransport {
  return new FetchTransport({ timeout });
}
