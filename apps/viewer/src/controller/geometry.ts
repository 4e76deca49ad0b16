/**
 * View Geometry
 *
 * Points used by the view state: screen-space offsets (position) and
 * content-space coordinates (rotation focus point). Both share one shape.
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Zero offset, the default initial position
 */
export const ZERO_POINT: Point = Object.freeze({ x: 0, y: 0 });

/**
 * Create a frozen point
 */
export function createPoint(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

/**
 * Structural point equality. `null` (an absent point) only equals `null`.
 */
export function pointsEqual(a: Point | null, b: Point | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.x === b.x && a.y === b.y;
}

export function isFinitePoint(point: Point): boolean {
  return Number.isFinite(point.x) && Number.isFinite(point.y);
}
