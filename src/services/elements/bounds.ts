import type { Rect } from '../../types/elements';

const BOUNDS_PATTERN = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

/**
 * Parse `[x1,y1][x2,y2]`; null when the string is not in that shape.
 */
export function parseBounds(bounds: string): Rect | null {
  const match = BOUNDS_PATTERN.exec(bounds.trim());
  if (!match) {
    return null;
  }
  return {
    x1: Number(match[1]),
    y1: Number(match[2]),
    x2: Number(match[3]),
    y2: Number(match[4])
  };
}

/**
 * Integer rectangle from an origin + size frame (fractional points are truncated).
 */
export function rectFromFrame(x: number, y: number, width: number, height: number): Rect {
  const x1 = Math.trunc(x);
  const y1 = Math.trunc(y);
  return { x1, y1, x2: x1 + Math.trunc(width), y2: y1 + Math.trunc(height) };
}

export const hasArea = (rect: Rect): boolean => rect.x2 > rect.x1 && rect.y2 > rect.y1;

export const formatBounds = (rect: Rect): string =>
  `[${rect.x1},${rect.y1}][${rect.x2},${rect.y2}]`;
