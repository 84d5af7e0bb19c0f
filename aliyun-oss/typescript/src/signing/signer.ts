/**
 * OssSigner - header and query-string signing for OSS requests
 *
 * String-to-sign layout:
 *
 * ```
 * VERB\n
 * Content-MD5\n
 * Content-Type\n
 * Date (or Expires)\n
 * CanonicalizedHeaders
 * /bucket/object[?CanonicalizedResource]
 * ```
 */

import { hmacSha1Base64 } from './crypto.js';
import { canonicalizeHeaders, findHeader, headerEntries } from './headers.js';
import { assertValidHeader } from './validate.js';
import type { OssCredentials, SigningRequest, StringToSignParts } from './types.js';

/**
 * Joins the parts of a string-to-sign
 */
export function buildStringToSign(parts: StringToSignParts): string {
  const resource = `/${parts.bucket}/${parts.objectKey}`;
  return [
    parts.verb,
    parts.contentMd5,
    parts.contentType,
    parts.dateOrExpires,
    parts.canonicalHeaders + resource + (parts.canonicalResource ? `?${parts.canonicalResource}` : ''),
  ].join('\n');
}

export class OssSigner {
  private readonly credentials: OssCredentials;

  constructor(credentials: OssCredentials) {
    this.credentials = credentials;
  }

  get accessKeyId(): string {
    return this.credentials.accessKeyId;
  }

  /**
   * Builds the string-to-sign for a request.
   *
   * @throws {EncodingError} If a header cannot be sent
   */
  stringToSign(request: SigningRequest): string {
    for (const [name, value] of headerEntries(request.headers)) {
      assertValidHeader(name, value);
    }

    return buildStringToSign({
      verb: request.verb,
      contentMd5: findHeader(request.headers, 'content-md5') ?? '',
      contentType: findHeader(request.headers, 'content-type') ?? '',
      dateOrExpires:
        request.expires !== undefined
          ? String(request.expires)
          : findHeader(request.headers, 'date') ?? '',
      canonicalHeaders: canonicalizeHeaders(request.headers),
      bucket: request.bucket,
      objectKey: request.objectKey,
      canonicalResource: request.canonicalResource,
    });
  }

  /**
   * Base64 HMAC-SHA1 signature of the request, keyed with the secret
   */
  sign(request: SigningRequest): string {
    return hmacSha1Base64(this.credentials.accessKeySecret, this.stringToSign(request));
  }

  /**
   * Query-string signature for a presigned URL. `expires` takes the place
   * of the `Date` header in the string-to-sign.
   */
  presign(request: SigningRequest & { expires: number }): string {
    return this.sign(request);
  }

  /**
   * `Authorization` header value: `OSS <accessKeyId>:<signature>`
   *
   * @throws {EncodingError} If the assembled value cannot be sent
   */
  authorization(request: Omit<SigningRequest, 'expires'>): string {
    const value = `OSS ${this.credentials.accessKeyId}:${this.sign(request)}`;
    assertValidHeader('Authorization', value);
    return value;
  }
}
