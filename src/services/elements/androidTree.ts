/**
 * Android element extraction from uiautomator XML dumps.
 */

import { parseUIHierarchy, type HierarchyNode } from '../../utils/xml';
import { parseBounds } from './bounds';
import { normalizeNodes, type NodeFacts, type TreeAdapter } from './treeWalker';
import type { FilterLists, UIElement } from '../../types/elements';

const shortClassName = (cls: string): string => cls.slice(cls.lastIndexOf('.') + 1);

export function androidAdapter(filters: FilterLists['android']): TreeAdapter<HierarchyNode> {
  const noiseClasses = new Set(filters.noiseClasses);
  const systemIds = new Set(filters.systemResourceIds);

  return {
    composeNames: true,
    children: node => node.children,
    describe: ({ attributes: attrs }): NodeFacts => {
      const cls = attrs['class'] ?? '';
      const resourceId = attrs['resource-id'] ?? '';
      const flag = (name: string) => attrs[name] === 'true';

      return {
        type: shortClassName(cls),
        noise: noiseClasses.has(cls),
        system: systemIds.has(resourceId),
        text: (attrs['text'] ?? '').trim(),
        title: '',
        id: (attrs['content-desc'] ?? '').trim(),
        resourceId,
        value: '',
        clickable: flag('clickable'),
        scrollable: flag('scrollable'),
        editable: flag('focusable') && cls.endsWith('EditText'),
        enabled: attrs['enabled'] !== 'false',
        checked: flag('checked'),
        selected: flag('selected'),
        displayed: attrs['displayed'] !== 'false' && attrs['visible-to-user'] !== 'false',
        rect: attrs['bounds'] === undefined ? undefined : parseBounds(attrs['bounds'])
      };
    }
  };
}

/**
 * Parse a uiautomator XML dump into elements. Malformed input yields [].
 */
export function parseAndroidTree(
  xml: string,
  filters: FilterLists['android'],
  assignRefs = true
): UIElement[] {
  const roots = parseUIHierarchy(xml);
  if (!roots) {
    return [];
  }
  return normalizeNodes(roots, androidAdapter(filters), assignRefs);
}
