/**
 * Signing types for OSS header and query-string authentication
 */

/**
 * Header set as a record, or as an ordered list of pairs when the same
 * name may occur more than once
 */
export type HeaderInput = Readonly<Record<string, string>> | ReadonlyArray<readonly [string, string]>;

/**
 * Query parameters; `null` or `undefined` marks a flag-style parameter
 * that is sent without a value (`?acl`)
 */
export type QueryParams = Readonly<Record<string, string | null | undefined>>;

export interface OssCredentials {
  readonly accessKeyId: string;
  readonly accessKeySecret: string;
}

/**
 * Inputs of one signature
 */
export interface SigningRequest {
  verb: string;
  bucket: string;
  objectKey: string;
  /** Output of `canonicalizeResource` */
  canonicalResource: string;
  headers: HeaderInput;
  /**
   * Unix epoch seconds. When set, the signature is for a presigned URL
   * and takes the place of the `Date` header.
   */
  expires?: number;
}

/**
 * The exact fields of a string-to-sign
 */
export interface StringToSignParts {
  verb: string;
  contentMd5: string;
  contentType: string;
  dateOrExpires: string;
  canonicalHeaders: string;
  bucket: string;
  objectKey: string;
  canonicalResource: string;
}
