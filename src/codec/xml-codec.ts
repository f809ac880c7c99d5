import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { WireFormatError } from '../errors.js';
import type { ApiListBase } from '../model/list-base.js';
import {
  ITEMS_ATTR,
  isListType,
  isPlainObject,
  isRecordType,
  type FieldType,
  type ListSchema,
} from './wire-schema.js';

/**
 * XML codec for list envelopes.
 *
 * Layout: `<clusterList><items><cluster>…</cluster>…</items></clusterList>`.
 * Every scalar is written as element text; on decode, text is coerced
 * back by the declared field type before zod validation.
 */

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

/** Node shape handed to the builder: text or nested elements. */
type XmlNode = string | XmlElement;
interface XmlElement {
  [tag: string]: XmlNode | XmlNode[];
}

const builder = new XMLBuilder({
  ignoreAttributes: true,
  format: false,
  suppressEmptyNode: false,
});

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: false,
});

export function encodeListXml<T>(list: ApiListBase<T>): string {
  const { xmlRoot, xmlElement, itemType } = list.schema;
  const elements = list.items.map((item) => toXmlNode(item, itemType));
  const document: XmlElement = {
    [xmlRoot]: { [ITEMS_ATTR]: wrapItems(xmlElement, elements) },
  };
  return XML_DECLARATION + builder.build(document);
}

export function decodeListXml<T, L>(text: string, schema: ListSchema<T, L>): L {
  let document: unknown;
  try {
    document = parser.parse(text, true);
  } catch (err) {
    throw new WireFormatError('xml', err instanceof Error ? err.message : String(err));
  }
  if (!isPlainObject(document) || !(schema.xmlRoot in document)) {
    throw new WireFormatError('xml', `expected root element <${schema.xmlRoot}>`);
  }

  const root = document[schema.xmlRoot];
  const wrapper = isPlainObject(root) ? root[ITEMS_ATTR] : undefined;
  const rawItems = isPlainObject(wrapper) ? asArray(wrapper[schema.xmlElement]) : [];

  const values = rawItems.map((raw, index) => {
    const parsed = schema.item.safeParse(fromXmlNode(raw, schema.itemType));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `/${issue.path.join('/')}` : '';
      throw new WireFormatError(
        'xml',
        `<${schema.xmlElement}>[${index}]${where}: ${issue?.message ?? 'invalid value'}`,
      );
    }
    return parsed.data;
  });
  return schema.create(values);
}

function wrapItems(element: string, nodes: XmlNode[]): XmlNode {
  // An empty array would drop the wrapper entirely; keep `<items></items>`
  return nodes.length === 0 ? '' : { [element]: nodes };
}

function toXmlNode(value: unknown, type: FieldType): XmlNode {
  if (isRecordType(type)) {
    const out: XmlElement = {};
    if (!isPlainObject(value)) return out;
    for (const mapping of type.fields) {
      const fieldValue = value[mapping.property];
      if (fieldValue === undefined || fieldValue === null) continue;
      out[mapping.xml] = toXmlNode(fieldValue, mapping.type);
    }
    return out;
  }
  if (isListType(type)) {
    const items = Array.isArray(value) ? value : [];
    return { [ITEMS_ATTR]: wrapItems(type.element, items.map((item) => toXmlNode(item, type.of))) };
  }
  return String(value);
}

function fromXmlNode(node: unknown, type: FieldType): unknown {
  if (isRecordType(type)) {
    if (node === '') return {};
    if (!isPlainObject(node)) return node;
    const out: Record<string, unknown> = {};
    for (const mapping of type.fields) {
      const raw = node[mapping.xml];
      if (raw === undefined) continue;
      out[mapping.property] = fromXmlNode(raw, mapping.type);
    }
    return out;
  }
  if (isListType(type)) {
    const wrapper = isPlainObject(node) ? node[ITEMS_ATTR] : undefined;
    const items = isPlainObject(wrapper) ? asArray(wrapper[type.element]) : [];
    return items.map((item) => fromXmlNode(item, type.of));
  }
  return coerceScalar(node, type);
}

function coerceScalar(node: unknown, type: 'string' | 'number' | 'boolean'): unknown {
  if (typeof node !== 'string') return node;
  switch (type) {
    case 'number': {
      const n = Number(node);
      return node.trim() === '' || Number.isNaN(n) ? node : n;
    }
    case 'boolean':
      if (node === 'true') return true;
      if (node === 'false') return false;
      return node;
    case 'string':
      return node;
  }
}

/** The parser collapses a single repeated element into a scalar; undo that. */
function asArray(value: unknown): unknown[] {
  if (value === undefined || value === '') return [];
  return Array.isArray(value) ? value : [value];
}
