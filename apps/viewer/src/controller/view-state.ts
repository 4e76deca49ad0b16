/**
 * View State
 *
 * Immutable snapshot of the view transform. A new snapshot is built for every
 * accepted change; snapshots are never mutated in place.
 *
 * Equality is structural. It decides whether a write is a real change, so two
 * snapshots built from the same field values must compare (and hash) equal.
 *
 * @example
 * ```typescript
 * const state = createViewState({
 *   position: ZERO_POINT,
 *   scale: null,
 *   rotation: 0,
 *   rotationFocusPoint: null,
 *   scaleState: 'initial',
 * });
 * ```
 */

import { createPoint, pointsEqual, type Point } from './geometry';
import type { ScaleState } from './scale-state';

export interface ViewState {
  /** Screen-space translation of the content */
  readonly position: Point;
  /** Scale factor, or null when it should be derived from the scale state */
  readonly scale: number | null;
  /** Rotation in radians, not wrapped */
  readonly rotation: number;
  /** Rotation pivot in content coordinates, or null when absent */
  readonly rotationFocusPoint: Point | null;
  readonly scaleState: ScaleState;
}

/**
 * Build a frozen snapshot. Points are copied so the caller's objects can't
 * leak mutations into it.
 */
export function createViewState(fields: ViewState): ViewState {
  return Object.freeze({
    position: createPoint(fields.position.x, fields.position.y),
    scale: fields.scale,
    rotation: fields.rotation,
    rotationFocusPoint:
      fields.rotationFocusPoint === null
        ? null
        : createPoint(fields.rotationFocusPoint.x, fields.rotationFocusPoint.y),
    scaleState: fields.scaleState,
  });
}

export function viewStatesEqual(a: ViewState, b: ViewState): boolean {
  if (a === b) return true;
  return (
    pointsEqual(a.position, b.position) &&
    a.scale === b.scale &&
    a.rotation === b.rotation &&
    pointsEqual(a.rotationFocusPoint, b.rotationFocusPoint) &&
    a.scaleState === b.scaleState
  );
}

/**
 * djb2 hash of the canonical form. `String(-0)` is "0", so -0 and 0 hash the
 * same, as they compare equal.
 */
export function hashViewState(state: ViewState): number {
  const key = canonicalKey(state);
  let hash = 5381;
  for (let i = 0; i < key.length; i++) {
    hash = (hash * 33) ^ key.charCodeAt(i);
  }
  return hash >>> 0;
}

/**
 * Compact form for log lines
 */
export function describeViewState(state: ViewState): string {
  const focus = state.rotationFocusPoint;
  return [
    `pos=(${state.position.x}, ${state.position.y})`,
    `scale=${state.scale === null ? 'unset' : state.scale}`,
    `rot=${state.rotation}`,
    `focus=${focus === null ? 'none' : `(${focus.x}, ${focus.y})`}`,
    `state=${state.scaleState}`,
  ].join(' ');
}

function canonicalKey(state: ViewState): string {
  const { position, scale, rotation, rotationFocusPoint, scaleState } = state;
  return [
    String(position.x),
    String(position.y),
    scale === null ? '~' : String(scale),
    String(rotation),
    rotationFocusPoint === null ? '~' : `${rotationFocusPoint.x},${rotationFocusPoint.y}`,
    scaleState,
  ].join('|');
}
