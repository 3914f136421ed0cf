/**
 * Element Tree Walker
 *
 * Platform-independent half of element normalization: a pre-order walk that
 * applies the class/role filter and the attribute filter, composes labels for
 * compound widgets and assigns `@eN` references. Platform adapters only
 * describe their nodes.
 *
 * Filtering never prunes: a skipped node's children are still visited.
 */

import { formatBounds, hasArea } from './bounds';
import type { Rect, UIElement } from '../../types/elements';

export const NAME_SEPARATOR = ' | ';

/**
 * What the walker needs to know about one source node
 */
export interface NodeFacts {
  /** Short class or role name */
  type: string;
  /** Class/role is a known non-semantic container */
  noise: boolean;
  /** Identifier is on the system denylist */
  system: boolean;
  text: string;
  title: string;
  id: string;
  resourceId: string;
  value: string;
  clickable: boolean;
  scrollable: boolean;
  /** Text input that accepts focus */
  editable: boolean;
  enabled: boolean;
  checked: boolean;
  selected: boolean;
  /** False when the source marks the node as not displayed */
  displayed: boolean;
  /** undefined when the source has no rectangle, null when it is unreadable */
  rect: Rect | null | undefined;
}

export interface TreeAdapter<N> {
  children(node: N): readonly N[];
  describe(node: N): NodeFacts;
  /** Build `name` from descendant text; off where labels already aggregate it */
  composeNames: boolean;
}

const hasContent = (facts: NodeFacts): boolean =>
  Boolean(facts.text || facts.id || facts.resourceId || facts.value || facts.title);

const isInteractive = (facts: NodeFacts): boolean =>
  facts.clickable || facts.scrollable || facts.editable;

/**
 * Class/role filter then attribute filter. True when the node is emitted.
 */
export function keepNode(facts: NodeFacts): boolean {
  const content = hasContent(facts);
  const interactive = isInteractive(facts);

  if (facts.noise && !content && !interactive) {
    return false;
  }

  if (!facts.displayed || facts.system) {
    return false;
  }
  if (facts.rect && !hasArea(facts.rect)) {
    return false;
  }
  return content || interactive;
}

export function normalizeNodes<N>(
  roots: readonly N[],
  adapter: TreeAdapter<N>,
  assignRefs = true
): UIElement[] {
  const factsCache = new Map<N, NodeFacts>();
  const describe = (node: N): NodeFacts => {
    let facts = factsCache.get(node);
    if (!facts) {
      facts = adapter.describe(node);
      factsCache.set(node, facts);
    }
    return facts;
  };

  // Own text plus descendant text, without crossing into clickable or hidden descendants
  const composeName = (node: N, facts: NodeFacts): string[] => {
    const parts: string[] = facts.text ? [facts.text] : [];
    const seen = new Set(parts);
    const visit = (current: N) => {
      for (const child of adapter.children(current)) {
        const childFacts = describe(child);
        if (childFacts.clickable || !childFacts.displayed) {
          continue;
        }
        if (childFacts.text && !seen.has(childFacts.text)) {
          seen.add(childFacts.text);
          parts.push(childFacts.text);
        }
        visit(child);
      }
    };
    visit(node);
    return parts;
  };

  const elements: UIElement[] = [];

  const walk = (node: N) => {
    const facts = describe(node);
    if (keepNode(facts)) {
      const nameParts = adapter.composeNames ? composeName(node, facts) : [];
      elements.push(buildElement(facts, nameParts));
    }
    for (const child of adapter.children(node)) {
      walk(child);
    }
  };

  roots.forEach(walk);

  if (assignRefs) {
    return elements.map((element, index) => ({ ref: `@e${index + 1}`, ...element }));
  }
  return elements;
}

function buildElement(facts: NodeFacts, nameParts: string[]): UIElement {
  const element: UIElement = {};

  if (facts.type) element.type = facts.type;
  if (nameParts.length > 1) {
    element.name = nameParts.join(NAME_SEPARATOR);
  } else if (facts.text) {
    element.text = facts.text;
  }
  if (facts.title) element.title = facts.title;
  if (facts.id) element.id = facts.id;
  if (facts.resourceId) element.resourceId = facts.resourceId;
  if (facts.value) element.value = facts.value;
  if (facts.clickable || facts.editable) element.clickable = true;
  if (!facts.enabled) element.enabled = false;
  if (facts.checked) element.checked = true;
  if (facts.selected) element.selected = true;
  if (facts.scrollable) element.scrollable = true;
  if (facts.rect) element.bounds = formatBounds(facts.rect);

  return element;
}
