/**
 * iOS element extraction from AXe `describe-ui` JSON.
 *
 * Nodes carry `type`, `frame` (origin + size), `AXLabel`, `AXUniqueId` and
 * `children`; richer dumps add `role`, `role_description`, `value`, `title`
 * and `enabled`.
 */

import { rectFromFrame } from './bounds';
import { normalizeNodes, type NodeFacts, type TreeAdapter } from './treeWalker';
import type { FilterLists, UIElement } from '../../types/elements';

export type AxNode = Record<string, unknown>;

const isRecord = (value: unknown): value is AxNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const str = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
};

const num = (value: unknown): number => (typeof value === 'number' && Number.isFinite(value) ? value : 0);

const childrenOf = (node: AxNode): AxNode[] =>
  Array.isArray(node['children']) ? node['children'].filter(isRecord) : [];

export function iosAdapter(filters: FilterLists['ios']): TreeAdapter<AxNode> {
  const noiseRoles = new Set(filters.noiseRoles);
  const systemIds = new Set(filters.systemIds);

  return {
    composeNames: false,
    children: childrenOf,
    describe: (node): NodeFacts => {
      const rawType = str(node['type']);
      const role = str(node['role']) || str(node['role_description']);
      const label = str(node['AXLabel']).trim();
      const title = str(node['title']).trim();
      const id = str(node['AXUniqueId']).trim();
      const frame = node['frame'];

      return {
        type: rawType.startsWith('AX') ? rawType.slice(2) : rawType,
        noise: noiseRoles.has(rawType) || noiseRoles.has(role),
        system: id !== '' && systemIds.has(id),
        text: label,
        title: title !== label ? title : '',
        id,
        resourceId: '',
        value: (str(node['value']) || str(node['AXValue'])).trim(),
        clickable: rawType.includes('Button') || role.includes('Button'),
        scrollable: false,
        editable: rawType.includes('TextField'),
        enabled: node['enabled'] !== false,
        checked: false,
        selected: false,
        displayed: true,
        rect: isRecord(frame)
          ? rectFromFrame(num(frame['x']), num(frame['y']), num(frame['width']), num(frame['height']))
          : undefined
      };
    }
  };
}

/**
 * Parse AXe JSON (a root object or an array of roots). Invalid JSON yields [].
 */
export function parseIosTree(raw: string, filters: FilterLists['ios'], assignRefs = true): UIElement[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return [];
  }

  const roots = (Array.isArray(data) ? data : [data]).filter(isRecord);
  return normalizeNodes(roots, iosAdapter(filters), assignRefs);
}
