/**
 * Core XML utilities for OSS API responses
 * @module @oss-integrations/aliyun-oss/xml/parser
 */

import { XMLBuilder } from 'fast-xml-parser';
import { SaxesParser } from 'saxes';
import { DecodeError, Utf8Error } from '../errors/categories.js';

const TEXT_NODE = '#text';

/**
 * Bytes handed to the tokenizer per step
 */
const CHUNK_SIZE = 64 * 1024;

/**
 * Builder options for generating OSS XML documents
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: true,
  textNodeName: TEXT_NODE,
  format: false,
  suppressEmptyNode: true,
};

/**
 * One step of a forward-only walk over a document
 */
export type XmlEvent =
  | { readonly type: 'start'; readonly name: string }
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'end'; readonly name: string };

export function createXmlBuilder(): XMLBuilder {
  return new XMLBuilder(BUILDER_OPTIONS);
}

function invalidUtf8(cause: unknown): Utf8Error {
  return new Utf8Error({
    message: 'Response body is not valid UTF-8',
    code: 'INVALID_UTF8',
    cause,
  });
}

/**
 * Decodes a UTF-8 response body
 *
 * @throws {Utf8Error} If the bytes are not valid UTF-8
 */
export function decodeBody(body: Uint8Array | string): string {
  if (typeof body === 'string') {
    return body;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(body);
  } catch (error) {
    throw invalidUtf8(error);
  }
}

/**
 * Decodes a body piecewise. A multi-byte sequence split across chunks is
 * carried over to the next one.
 *
 * @throws {Utf8Error} If the bytes are not valid UTF-8
 */
function* textChunks(body: Uint8Array | string): Generator<string, void, undefined> {
  if (typeof body === 'string') {
    yield body;
    return;
  }

  const decoder = new TextDecoder('utf-8', { fatal: true });
  try {
    for (let offset = 0; offset < body.length; offset += CHUNK_SIZE) {
      yield decoder.decode(body.subarray(offset, offset + CHUNK_SIZE), { stream: true });
    }
    yield decoder.decode();
  } catch (error) {
    throw invalidUtf8(error);
  }
}

function tokenize(step: () => void): void {
  try {
    step();
  } catch (error) {
    throw DecodeError.malformedXml(error instanceof Error ? error.message : String(error), error);
  }
}

/**
 * Produces start/text/end events for a document in document order.
 *
 * The body is tokenized a chunk at a time and events are handed out as
 * they are found; no tree is built. Text is reported as written,
 * whitespace included, with entities resolved and CDATA as plain text.
 * A malformed document fails at the point it goes wrong, so a consumer
 * may already have seen the events before it.
 *
 * @throws {DecodeError} If the document is not well-formed XML
 * @throws {Utf8Error} If the bytes are not valid UTF-8
 *
 * @example
 * ```typescript
 * [...xmlEvents('<A><B>x</B></A>')];
 * // start A, start B, text x, end B, end A
 * ```
 */
export function* xmlEvents(xml: Uint8Array | string): Generator<XmlEvent, void, undefined> {
  const pending: XmlEvent[] = [];
  const parser = new SaxesParser();
  parser.on('opentag', (tag) => pending.push({ type: 'start', name: tag.name }));
  parser.on('text', (text) => pending.push({ type: 'text', text }));
  parser.on('cdata', (text) => pending.push({ type: 'text', text }));
  parser.on('closetag', (tag) => pending.push({ type: 'end', name: tag.name }));

  for (const chunk of textChunks(xml)) {
    tokenize(() => parser.write(chunk));
    yield* pending.splice(0);
  }

  tokenize(() => parser.close());
  yield* pending.splice(0);
}

/**
 * Converts an object to an XML string
 *
 * @example
 * ```typescript
 * buildXml({ Root: { Value: 'example' } });
 * // '<Root><Value>example</Value></Root>'
 * ```
 */
export function buildXml(obj: Record<string, unknown>): string {
  return createXmlBuilder().build(obj);
}

/**
 * Parses the strict `true`/`false` literal used by boolean elements
 *
 * @throws {DecodeError} For any other text
 */
export function parseBooleanStrict(element: string, text: string): boolean {
  if (text === 'true') return true;
  if (text === 'false') return false;
  throw DecodeError.invalidBoolean(element, text);
}
