import { parseAndroidTree } from './androidTree';
import { parseIosTree } from './iosTree';
import { DEFAULT_FILTER_LISTS } from '../../config/environment';
import type { NormalizeOptions, PlatformName, UIElement } from '../../types/elements';

export { parseBounds, formatBounds, rectFromFrame, hasArea } from './bounds';
export { parseAndroidTree } from './androidTree';
export { parseIosTree } from './iosTree';
export { normalizeNodes, keepNode, NAME_SEPARATOR, type NodeFacts, type TreeAdapter } from './treeWalker';

/**
 * Turn a raw accessibility dump into the common element list.
 */
export function normalizeTree(
  raw: string,
  platform: PlatformName,
  options: NormalizeOptions = {}
): UIElement[] {
  const { assignRefs = true, filters = DEFAULT_FILTER_LISTS } = options;
  return platform === 'ios'
    ? parseIosTree(raw, filters.ios, assignRefs)
    : parseAndroidTree(raw, filters.android, assignRefs);
}
