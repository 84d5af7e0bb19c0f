/**
 * Tests for the fetch transport
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchTransport } from '../fetch-transport.js';
import { NetworkError } from '../../errors/index.js';

function stubFetch(impl: () => Promise<Response>): void {
  vi.stubGlobal('fetch', vi.fn(impl));
}

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const transport = new FetchTransport({ timeout: 1000 });

  it('should hand back every status with a buffered body', async () => {
    stubFetch(async () =>
      new Response('<Error/>', {
        status: 404,
        statusText: 'Not Found',
        headers: { 'x-oss-request-id': 'REQ-1' },
      })
    );

    const response = await transport.send({
      method: 'GET',
      url: 'http://b.oss-test.aliyuncs.com/k',
      headers: {},
    });

    expect(response.status).toBe(404);
    expect(response.statusText).toBe('Not Found');
    expect(response.headers['x-oss-request-id']).toBe('REQ-1');
    expect(new TextDecoder().decode(response.body)).toBe('<Error/>');
  });

  it('should skip the body of HEAD responses', async () => {
    stubFetch(async () => new Response(null, { status: 200, headers: { 'content-length': '5' } }));

    const response = await transport.send({
      method: 'HEAD',
      url: 'http://b.oss-test.aliyuncs.com/k',
      headers: {},
    });

    expect(response.body).toHaveLength(0);
    expect(response.headers['content-length']).toBe('5');
  });

  it('should map an abort to a timeout', async () => {
    stubFetch(async () => {
      throw Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    });

    const error = await transport
      .send({ method: 'GET', url: 'http://b.oss-test.aliyuncs.com/k', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ kind: 'transport', code: 'TIMEOUT' });
  });

  it('should recognise DNS failures', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND b.oss-test') });
    });

    const error = await transport
      .send({ method: 'GET', url: 'http://b.oss-test.aliyuncs.com/k', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ code: 'DNS_ERROR' });
  });

  it('should report other connection failures', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') });
    });

    const error = await transport
      .send({ method: 'GET', url: 'http://b.oss-test.aliyuncs.com/k', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'Connection failed: fetch failed: connect ECONNREFUSED',
    });
  });
});
