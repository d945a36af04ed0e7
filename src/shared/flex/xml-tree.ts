/**
 * XML Tree Reader
 *
 * Well-formedness check and generic parse of a Flex document into ordered
 * elements with attribute maps. Text content is not significant in Flex
 * documents and is dropped here.
 *
 * @module shared/flex/xml-tree
 * @security DOCTYPE declarations are rejected, so only the predefined XML and
 * HTML entities and character references are ever expanded
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FLEX_PARSER_ERROR_CODES, FlexParserError } from './errors';

export interface XmlElement {
  readonly name: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: readonly XmlElement[];
  /** Concatenated character data; only envelopes such as `FlexStatementResponse` carry any */
  readonly text: string;
}

export type XmlInput = string | Uint8Array;

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';

/** Keys of ordered nodes that never denote an element */
const TEXT_KEY = '#text';
const NON_ELEMENT_KEYS = new Set([TEXT_KEY, '#comment', '#cdata', ATTRIBUTES_KEY]);

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode input to text. Bytes must be valid UTF-8; a leading BOM is dropped.
 */
export function decodeXmlInput(input: XmlInput): string {
  if (typeof input === 'string') {
    return input.startsWith('\uFEFF') ? input.slice(1) : input;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch (error) {
    throw new FlexParserError(FLEX_PARSER_ERROR_CODES.MALFORMED_XML, 'Input is not valid UTF-8', {
      details: { cause: error instanceof Error ? error.message : String(error) },
    });
  }
}

// ============================================================================
// Parsing
// ============================================================================

function createOrderedParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    // Attribute text is coerced by the schema, never by the XML layer
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    processEntities: true,
    // Numeric character references (&#233; &#xE9;) are only decoded with this on
    htmlEntities: true,
  });
}

function isPlainObject(value: unknown): value is { readonly [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string): FlexParserError {
  return new FlexParserError(FLEX_PARSER_ERROR_CODES.MALFORMED_XML, message);
}

function readAttributes(raw: unknown): ReadonlyMap<string, string> {
  const attributes = new Map<string, string>();
  if (!isPlainObject(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) continue;
    attributes.set(key.slice(ATTRIBUTE_PREFIX.length), typeof value === 'string' ? value : String(value));
  }
  return attributes;
}

function readElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) {
    throw malformed('Unexpected XML node structure');
  }

  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isPlainObject(node)) continue;
    const name = Object.keys(node).find((key) => !NON_ELEMENT_KEYS.has(key));
    if (name === undefined) continue;

    elements.push({
      name,
      attributes: readAttributes(node[ATTRIBUTES_KEY]),
      children: readElements(node[name]),
      text: readText(node[name]),
    });
  }
  return elements;
}

function readText(nodes: unknown): string {
  if (!Array.isArray(nodes)) return '';
  let text = '';
  for (const node of nodes) {
    if (isPlainObject(node) && Object.hasOwn(node, TEXT_KEY)) {
      text += String(node[TEXT_KEY]);
    }
  }
  return text;
}

/**
 * Trimmed text of the first child element with the given name
 */
export function childText(element: XmlElement, name: string): string | undefined {
  return element.children.find((child) => child.name === name)?.text.trim();
}

/**
 * Parse a document into its root element
 *
 * @throws FlexParserError with code MALFORMED_XML
 */
export function readXmlTree(input: XmlInput): XmlElement {
  const xml = decodeXmlInput(input);

  if (/<!DOCTYPE/i.test(xml)) {
    throw malformed('DOCTYPE declarations are not accepted');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new FlexParserError(
      FLEX_PARSER_ERROR_CODES.MALFORMED_XML,
      `Invalid XML structure: ${validation.err.msg}`,
      { details: { line: validation.err.line, col: validation.err.col } }
    );
  }

  const parsed: unknown = createOrderedParser().parse(xml);
  const roots = readElements(parsed);
  if (roots.length !== 1) {
    throw malformed(`Expected exactly one root element, found ${roots.length}`);
  }
  return roots[0];
}
