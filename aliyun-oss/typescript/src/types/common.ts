/**
 * Common types shared across the Aliyun OSS integration
 * @module @oss-integrations/aliyun-oss/types/common
 */

/**
 * One object in a detailed listing. Every field is the raw text of its
 * element; `size` is left for the caller to parse.
 */
export interface ObjectSummary {
  readonly key: string;
  readonly lastModified: string;
  readonly eTag: string;
  readonly size: string;
}

/**
 * One page of a detailed listing.
 *
 * `isTruncated === false` means the listing is complete and `nextMarker`
 * is empty. Otherwise pass `nextMarker` back as `marker` to fetch the
 * following page.
 */
export interface ListPage {
  readonly entries: ObjectSummary[];
  readonly commonPrefixes: string[];
  readonly isTruncated: boolean;
  readonly nextMarker: string;
}

/**
 * Listing request options. Every field is optional; an omitted field is
 * not sent and the service default applies (`max-keys` defaults to 100).
 */
export interface ListOptions {
  /** Only keys starting with this prefix */
  readonly prefix?: string;
  /** Opaque continuation token from a previous page's `nextMarker` */
  readonly marker?: string;
  /** Group keys sharing the text up to this character into common prefixes */
  readonly delimiter?: string;
  /** Page size, 1 to 1000 */
  readonly maxKeys?: number;
}

/**
 * User metadata, keyed without the `x-oss-meta-` prefix
 */
export type Metadata = Record<string, string>;

/**
 * Source of the request time. Injected so signatures can be reproduced.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Whether a copy keeps the source metadata or replaces it with the
 * request's own
 */
export type MetadataDirective = 'COPY' | 'REPLACE';
