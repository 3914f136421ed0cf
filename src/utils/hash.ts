/**
 * Element Hash Utilities
 *
 * Canonical serialization and SHA256 fingerprints of element lists.
 * Used for snapshot deduplication.
 */

import { createHash } from 'crypto';
import { ELEMENT_FIELD_ORDER, type UIElement } from '../types/elements';

/**
 * Copy of an element with its fields in the fixed serialization order
 */
export function canonicalElement(element: UIElement): UIElement {
  const canonical: UIElement = {};
  for (const field of ELEMENT_FIELD_ORDER) {
    if (element[field] !== undefined) {
      Object.assign(canonical, { [field]: element[field] });
    }
  }
  return canonical;
}

/**
 * Serialize elements as JSON with the fixed field order
 */
export function serializeElements(elements: readonly UIElement[], indent?: number): string {
  return JSON.stringify(elements.map(canonicalElement), null, indent);
}

/**
 * SHA256 of the canonical element JSON
 */
export function fingerprintElements(elements: readonly UIElement[]): string {
  return createHash('sha256').update(serializeElements(elements)).digest('hex');
}

