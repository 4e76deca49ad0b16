/**
 * View transform state for pan/zoom/rotate viewers.
 */

export {
  ViewController,
  type ViewControllerBase,
  type ViewControllerConfig,
  type ViewStateStream,
  type ViewStateUpdate,
} from './controller/view-controller';
export {
  createViewState,
  describeViewState,
  hashViewState,
  viewStatesEqual,
  type ViewState,
} from './controller/view-state';
export { SCALE_STATES, isScaleState, type ScaleState } from './controller/scale-state';
export { ZERO_POINT, createPoint, pointsEqual, type Point } from './controller/geometry';
export { ValueNotifier, type Equality, type SetOptions } from './controller/value-notifier';
export {
  BroadcastStream,
  type StateStream,
  type StreamListener,
} from './controller/broadcast-stream';
export { ControllerDisposedError, StreamClosedError } from './controller/errors';
export { viewStateStore } from './controller/view-state-store';
