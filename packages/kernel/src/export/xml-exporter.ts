import { XMLBuilder } from 'fast-xml-parser';
import type { XmlNode } from '@bibkit/contracts';
import type { Entry } from '../elements/entry.js';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Name of the document element wrapping all entries.
 */
export const XML_ROOT = 'bibliography';

/**
 * Node shape fast-xml-parser expects with `preserveOrder`: one key naming
 * the tag, `:@` holding prefixed attributes, `#text` for text nodes.
 */
interface OrderedXml {
  [name: string]: OrderedXml[] | Record<string, string> | string;
}

/**
 * Entry types and field names set in code may hold characters XML names
 * cannot; those become `_`, and a name that cannot start one gets a `_` prefix.
 */
export function toXmlName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_.-]/g, '_');
  return /^[A-Za-z_]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

function toOrdered(node: XmlNode): OrderedXml {
  const ordered: OrderedXml = {
    [toXmlName(node.tag)]: node.children.map((child) =>
      typeof child === 'string' ? { '#text': child } : toOrdered(child),
    ),
  };

  const attributes = Object.entries(node.attributes);
  if (attributes.length > 0) {
    ordered[':@'] = Object.fromEntries(attributes.map(([name, value]) => [`@_${name}`, value]));
  }
  return ordered;
}

/**
 * Render entries as an XML document: a UTF-8 declaration followed by a
 * `<bibliography>` element with one child per entry, in order.
 */
export function renderXml(entries: Iterable<Entry>): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
  });

  const root: XmlNode = {
    tag: XML_ROOT,
    attributes: {},
    children: Array.from(entries, (entry) => entry.toXml()),
  };

  const body: string = builder.build([toOrdered(root)]);
  return `${XML_DECLARATION}\n${body.trim()}\n`;
}
