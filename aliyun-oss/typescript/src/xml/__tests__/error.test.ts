/**
 * Tests for error document parsing
 */

import { describe, it, expect } from 'vitest';
import { parseErrorResponse, isErrorResponse, formatErrorMessage } from '../error.js';

const NO_SUCH_KEY = `<?xml version="1.0" encoding="UTF-8"?>
<Error>
  <Code>NoSuchKey</Code>
  <Message>The specified key does not exist.</Message>
  <RequestId>5C3D9175B6FC201293AD****</RequestId>
  <HostId>examplebucket.oss-cn-hangzhou.aliyuncs.com</HostId>
  <Key>missing.txt</Key>
</Error>`;

describe('parseErrorResponse', () => {
  it('should read the error fields', () => {
    expect(parseErrorResponse(NO_SUCH_KEY)).toEqual({
      code: 'NoSuchKey',
      message: 'The specified key does not exist.',
      requestId: '5C3D9175B6FC201293AD****',
      resource: undefined,
      hostId: 'examplebucket.oss-cn-hangzhou.aliyuncs.com',
    });
  });

  it('should accept bytes', () => {
    expect(parseErrorResponse(new TextEncoder().encode(NO_SUCH_KEY))?.code).toBe('NoSuchKey');
  });

  it('should return undefined for documents that are not errors', () => {
    expect(parseErrorResponse('<ListBucketResult><Name>b</Name></ListBucketResult>')).toBeUndefined();
    expect(parseErrorResponse('<Error><Message>no code</Message></Error>')).toBeUndefined();
  });

  it('should return undefined for bodies that are not XML', () => {
    expect(parseErrorResponse('Service Unavailable')).toBeUndefined();
    expect(parseErrorResponse('<Error><Code>X</Code>')).toBeUndefined();
  });

  it('should return undefined for bodies that are not valid UTF-8', () => {
    const body = new Uint8Array([...new TextEncoder().encode('<Error><Code>'), 0xc3, 0x28, 0x3c]);
    expect(parseErrorResponse(body)).toBeUndefined();
  });

  it('should ignore fields nested deeper than the error element', () => {
    expect(
      parseErrorResponse('<Error><Code>A</Code><Detail><Code>B</Code></Detail></Error>')?.code
    ).toBe('A');
  });
});

describe('isErrorResponse', () => {
  it('should recognise error documents', () => {
    expect(isErrorResponse(NO_SUCH_KEY)).toBe(true);
    expect(isErrorResponse('<Other/>')).toBe(false);
  });
});

describe('formatErrorMessage', () => {
  it('should include request id and resource when present', () => {
    expect(formatErrorMessage({ code: 'NoSuchKey', message: 'Not found', requestId: 'r1' })).toBe(
      'NoSuchKey: Not found (RequestId: r1)'
    );
    expect(
      formatErrorMessage({ code: 'AccessDenied', message: 'Denied', resource: '/b/k' })
    ).toBe('AccessDenied: Denied [Resource: /b/k]');
  });
});
