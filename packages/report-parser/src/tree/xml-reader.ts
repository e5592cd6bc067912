import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { SourceParseError } from '@bureau-insights/types';
import type { RawNode } from './raw-node.js';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

// preserveOrder keeps sibling order and repeated tags as separate entries,
// which the normalizer needs to detect collisions.
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
  // numeric character references (&#8377;, &#x41;) are only decoded with this on
  htmlEntities: true,
});

const ENCODING_DECLARATION = /^\s*<\?xml[^>]*?\sencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

/**
 * Decodes raw report bytes using the byte-order mark or the encoding named in
 * the XML declaration, falling back to UTF-8.
 */
function decodeSource(bytes: Buffer): string {
  let encoding = 'utf-8';
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    encoding = 'utf-16le';
  } else if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    encoding = 'utf-16be';
  } else {
    // The declaration itself is ASCII in every ASCII-compatible encoding.
    const declared = ENCODING_DECLARATION.exec(bytes.subarray(0, 256).toString('latin1'));
    if (declared?.[1] !== undefined) {
      encoding = declared[1];
    }
  }

  try {
    return new TextDecoder(encoding).decode(bytes);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new SourceParseError(`Unsupported document encoding "${encoding}"`);
    }
    throw error;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function readAttributes(item: Record<string, unknown>): Record<string, string> {
  const attributes: Record<string, string> = {};
  const raw = item[ATTRIBUTES_KEY];
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [name, value] of Object.entries(raw)) {
    attributes[name] = scalarText(value);
  }
  return attributes;
}

function toRawNode(item: Record<string, unknown>): RawNode | undefined {
  const tag = Object.keys(item).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
  if (tag === undefined) {
    return undefined;
  }

  const content = item[tag];
  const children: RawNode[] = [];
  let text = '';

  for (const entry of Array.isArray(content) ? content : []) {
    if (!isRecord(entry)) continue;

    if (TEXT_KEY in entry) {
      // Only the leading text belongs to the element; text after a child is that child's tail.
      if (children.length === 0) {
        text += scalarText(entry[TEXT_KEY]);
      }
      continue;
    }

    const child = toRawNode(entry);
    if (child !== undefined) {
      children.push(child);
    }
  }

  const node: RawNode = { tag, attributes: readAttributes(item), children };
  if (text !== '') {
    node.text = text;
  }
  return node;
}

/**
 * Parses an XML bureau report into its root element.
 *
 * Bytes are decoded per their declared encoding; a string is taken as already
 * decoded.
 *
 * @throws SourceParseError when the document is empty, malformed, in an
 *   unsupported encoding, or has more than one root element
 */
export function parseXmlDocument(xml: string | Buffer): RawNode {
  const source = typeof xml === 'string' ? xml : decodeSource(xml);

  if (source.trim() === '') {
    throw new SourceParseError('Report document is empty');
  }

  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new SourceParseError(`Invalid XML at line ${line}, column ${col}: ${msg}`, {
      line,
      column: col,
    });
  }

  const parsed: unknown = parser.parse(source);
  const roots = (Array.isArray(parsed) ? parsed : [])
    .filter(isRecord)
    .filter((item) => !(TEXT_KEY in item))
    .map(toRawNode)
    .filter((node): node is RawNode => node !== undefined);

  const [root, ...rest] = roots;
  if (root === undefined) {
    throw new SourceParseError('Report document has no root element');
  }
  if (rest.length > 0) {
    throw new SourceParseError(`Report document has ${roots.length} root elements, expected 1`);
  }
  return root;
}
