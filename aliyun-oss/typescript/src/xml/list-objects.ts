/**
 * Streaming decoder for ListObjectsV2 (`list-type=2`) responses
 * @module @oss-integrations/aliyun-oss/xml/list-objects
 */

import type { ListPage, ObjectSummary } from '../types/common.js';
import { DecodeError } from '../errors/categories.js';
import { xmlEvents, parseBooleanStrict, type XmlEvent } from './parser.js';

type SummaryField = keyof ObjectSummary;

const SUMMARY_FIELDS: ReadonlyMap<string, SummaryField> = new Map<string, SummaryField>([
  ['Key', 'key'],
  ['LastModified', 'lastModified'],
  ['ETag', 'eTag'],
  ['Size', 'size'],
]);

/**
 * Where the decoder is in the document. Only the elements it consumes
 * move it; every other element is skipped.
 */
type DecoderState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'inContents'; readonly entry: Record<SummaryField, string> }
  | { readonly kind: 'inCommonPrefixes' };

/**
 * Text being collected for the element named `element`
 */
interface Capture {
  readonly element: string;
  text: string;
}

function emptyEntry(): Record<SummaryField, string> {
  return { key: '', lastModified: '', eTag: '', size: '' };
}

/**
 * Forward-only decoder. Feed it events with `push`, then call `finish`.
 */
export class ListingDecoder {
  private state: DecoderState = { kind: 'idle' };
  private capture: Capture | undefined;

  private readonly entries: ObjectSummary[] = [];
  private readonly commonPrefixes: string[] = [];
  private isTruncated = false;
  private continuationToken = '';

  push(event: XmlEvent): void {
    switch (event.type) {
      case 'start':
        this.onStart(event.name);
        break;
      case 'text':
        if (this.capture) {
          this.capture.text += event.text;
        }
        break;
      case 'end':
        this.onEnd(event.name);
        break;
    }
  }

  /**
   * @throws {DecodeError} If the document ended inside a container, or
   * a truncated page has no continuation token
   */
  finish(): ListPage {
    if (this.state.kind !== 'idle' || this.capture) {
      throw DecodeError.malformedXml('document ended inside an open element');
    }

    if (this.isTruncated && !this.continuationToken) {
      throw new DecodeError({
        message: 'Truncated listing carries no NextContinuationToken',
        code: 'MISSING_CONTINUATION_TOKEN',
      });
    }

    return {
      entries: this.entries,
      commonPrefixes: this.commonPrefixes,
      isTruncated: this.isTruncated,
      nextMarker: this.isTruncated ? this.continuationToken : '',
    };
  }

  private onStart(name: string): void {
    switch (this.state.kind) {
      case 'idle':
        if (name === 'Contents') {
          this.state = { kind: 'inContents', entry: emptyEntry() };
        } else if (name === 'CommonPrefixes') {
          this.state = { kind: 'inCommonPrefixes' };
        } else if (name === 'IsTruncated' || name === 'NextContinuationToken') {
          this.capture = { element: name, text: '' };
        }
        break;

      case 'inContents':
        if (SUMMARY_FIELDS.has(name)) {
          this.capture = { element: name, text: '' };
        }
        break;

      case 'inCommonPrefixes':
        if (name === 'Prefix') {
          this.capture = { element: name, text: '' };
        }
        break;
    }
  }

  private onEnd(name: string): void {
    if (this.capture && this.capture.element === name) {
      this.commit(this.capture);
      this.capture = undefined;
      return;
    }

    if (this.state.kind === 'inContents' && name === 'Contents') {
      this.entries.push({ ...this.state.entry });
      this.state = { kind: 'idle' };
    } else if (this.state.kind === 'inCommonPrefixes' && name === 'CommonPrefixes') {
      this.state = { kind: 'idle' };
    }
  }

  private commit({ element, text }: Capture): void {
    switch (this.state.kind) {
      case 'inContents': {
        const field = SUMMARY_FIELDS.get(element);
        if (field) {
          this.state.entry[field] = text;
        }
        break;
      }

      case 'inCommonPrefixes':
        this.commonPrefixes.push(text);
        break;

      case 'idle':
        if (element === 'IsTruncated') {
          this.isTruncated = parseBooleanStrict(element, text.trim());
        } else {
          this.continuationToken = text;
        }
        break;
    }
  }
}

/**
 * Decodes a detailed listing page.
 *
 * Entries keep document order; unknown elements are ignored. Keys and
 * the continuation token are kept exactly as written, surrounding
 * whitespace included. On any failure nothing is returned: a partly
 * decoded page is discarded.
 *
 * @throws {DecodeError} If the document is malformed or `IsTruncated` is
 * not a boolean literal
 * @throws {Utf8Error} If the body is not valid UTF-8
 *
 * @example
 * ```typescript
 * const page = decodeListPage(response.body);
 * if (page.isTruncated) {
 *   next = { ...options, marker: page.nextMarker };
 * }
 * ```
 */
export function decodeListPage(xml: Uint8Array | string): ListPage {
  const decoder = new ListingDecoder();
  for (const event of xmlEvents(xml)) {
    decoder.push(event);
  }
  return decoder.finish();
}

/**
 * Decodes the keys of a listing page, in document order
 *
 * @throws {DecodeError} If the document is malformed
 */
export function decodeKeyList(xml: Uint8Array | string): string[] {
  return decodeListPage(xml).entries.map((entry) => entry.key);
}
