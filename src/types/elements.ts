/**
 * Domain Types: UI Elements
 *
 * Common element schema produced from Android uiautomator XML dumps and
 * iOS accessibility JSON trees.
 */

export type PlatformName = 'android' | 'ios';

/**
 * UI Element - one on-screen node that survived filtering
 */
export interface UIElement {
  /** Per-snapshot reference (`@e1`, `@e2`, ...); absent when refs are disabled */
  ref?: string;
  /** Short class or role name (e.g. `Button`, `TextView`) */
  type?: string;
  /** Composite label built from several descendant text nodes */
  name?: string;
  /** Single display text */
  text?: string;
  /** iOS title when it differs from the label */
  title?: string;
  /** Accessibility identifier (content-desc / AXUniqueId) */
  id?: string;
  /** Platform resource identifier */
  resourceId?: string;
  /** iOS accessibility value */
  value?: string;
  clickable?: true;
  /** Present only when the element is disabled */
  enabled?: false;
  checked?: true;
  selected?: true;
  scrollable?: true;
  /** Pixel rectangle `[x1,y1][x2,y2]` */
  bounds?: string;
}

/**
 * Serialization order for element fields. Fingerprints depend on it.
 */
export const ELEMENT_FIELD_ORDER = [
  'ref',
  'type',
  'name',
  'text',
  'title',
  'id',
  'resourceId',
  'value',
  'clickable',
  'enabled',
  'checked',
  'selected',
  'scrollable',
  'bounds'
] as const satisfies readonly (keyof UIElement)[];

export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/**
 * Noise and denylist data used by the element filters
 */
export interface FilterLists {
  android: {
    /** Layout/container classes skipped unless they carry content or interactivity */
    noiseClasses: string[];
    /** Resource ids that are never emitted */
    systemResourceIds: string[];
  };
  ios: {
    /** Container roles skipped unless they carry content or interactivity */
    noiseRoles: string[];
    /** Identifiers that are never emitted */
    systemIds: string[];
  };
}

export interface NormalizeOptions {
  /** Assign `@eN` references (default: true) */
  assignRefs?: boolean;
  /** Override the default filter lists */
  filters?: FilterLists;
}
