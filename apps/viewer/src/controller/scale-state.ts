/**
 * Scale State
 *
 * The step of the double-tap / pinch cycle the viewer is in. Transition rules
 * live with the gesture handler; the controller only stores and compares tags.
 *
 * - initial: scale derived from the initial scale policy
 * - covering / originalSize: fixed zoom steps of the double-tap cycle
 * - zoomedIn / zoomedOut: result of a pinch past the initial scale
 * - zooming: free zoom, set together with an explicit `scale`
 */
export type ScaleState =
  | 'initial'
  | 'covering'
  | 'originalSize'
  | 'zoomedIn'
  | 'zoomedOut'
  | 'zooming';

export const SCALE_STATES: readonly ScaleState[] = Object.freeze([
  'initial',
  'covering',
  'originalSize',
  'zoomedIn',
  'zoomedOut',
  'zooming',
]);

export function isScaleState(value: unknown): value is ScaleState {
  return SCALE_STATES.some((state) => state === value);
}
