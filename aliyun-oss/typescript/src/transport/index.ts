/**
 * HTTP transport layer for the Aliyun OSS integration
 *
 * The transport is an opaque capability: one request in, one buffered
 * response out. Connection pooling, TLS and any retry policy belong to
 * the transport or to the caller, never to the object operations.
 */

export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from './types.js';

export { getHeader, isSuccessResponse, getRequestId } from './types.js';

export type { FetchTransportOptions } from './fetch-transport.js';
export { FetchTransport, createFetchTransport } from './fetch-transport.js';
