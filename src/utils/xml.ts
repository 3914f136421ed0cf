/**
 * XML Processing Utilities
 *
 * Reads uiautomator hierarchy dumps into a typed node tree.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

const ATTRIBUTE_PREFIX = '@_';

export interface HierarchyNode {
  attributes: Record<string, string>;
  children: HierarchyNode[];
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseAttributeValue: false,
  parseTagValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // numeric references such as &#10; in attribute values
  htmlEntities: true,
  isArray: (name: string) => name === 'node'
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function readNode(value: unknown): HierarchyNode {
  const node: HierarchyNode = { attributes: {}, children: [] };
  if (!isRecord(value)) {
    return node;
  }

  for (const [key, child] of Object.entries(value)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      if (typeof child === 'string') {
        node.attributes[key.slice(ATTRIBUTE_PREFIX.length)] = child;
      }
    } else if (key === 'node' && Array.isArray(child)) {
      node.children.push(...child.map(readNode));
    }
  }
  return node;
}

/**
 * Parse a uiautomator dump. Returns the top-level `<node>` elements in
 * document order, or null when the markup is empty or malformed.
 */
export function parseUIHierarchy(xml: string): HierarchyNode[] | null {
  if (xml.trim().length === 0 || XMLValidator.validate(xml) !== true) {
    return null;
  }

  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch {
    return null;
  }
  if (!isRecord(document)) {
    return null;
  }

  const roots: HierarchyNode[] = [];
  for (const [key, value] of Object.entries(document)) {
    if (key === 'node' && Array.isArray(value)) {
      roots.push(...value.map(readNode));
    } else if (isRecord(value)) {
      roots.push(...readNode(value).children);
    }
  }
  return roots;
}
