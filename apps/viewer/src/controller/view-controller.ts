/**
 * View Controller
 *
 * Owns the view state of one viewer instance. Gesture handlers write fields
 * (or call updateMultiple for a combined pan/zoom/rotate step), the renderer
 * reads `current` and listens to `outputStateStream`.
 *
 * Every accepted write:
 * 1. moves the old snapshot to `previous`
 * 2. installs a new frozen snapshot as `current`
 * 3. publishes that snapshot once
 *
 * Field setters skip writes that don't change the field. updateMultiple and
 * reset always publish. reset restores `initial` without touching `previous`.
 *
 * A write made from inside a stream observer is published after the snapshot
 * being delivered has reached every observer.
 *
 * A controller must be disposed when its viewer unmounts. Any use after that
 * throws ControllerDisposedError.
 *
 * @example
 * ```typescript
 * const controller = new ViewController({ initialRotation: 0 });
 * const stop = controller.outputStateStream.listen((state) => repaint(state));
 *
 * // Pinch gesture: one atomic update
 * controller.updateMultiple({ position, scale, scaleState: 'zooming' });
 *
 * // On unmount
 * stop();
 * controller.dispose();
 * ```
 */

import { ZERO_POINT, isFinitePoint, type Point } from './geometry';
import type { ScaleState } from './scale-state';
import {
  createViewState,
  describeViewState,
  viewStatesEqual,
  type ViewState,
} from './view-state';
import { ValueNotifier } from './value-notifier';
import { BroadcastStream, type StateStream } from './broadcast-stream';
import { ControllerDisposedError } from './errors';

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type ViewStateStream = StateStream<ViewState>;

/**
 * Fields for updateMultiple. Omitted fields keep their current value;
 * `null` clears scale or rotationFocusPoint back to unset.
 */
export interface ViewStateUpdate {
  position?: Point;
  scale?: number | null;
  rotation?: number;
  rotationFocusPoint?: Point | null;
  scaleState?: ScaleState;
}

/**
 * Configuration for ViewController
 */
export interface ViewControllerConfig {
  /** Initial content offset (default: { x: 0, y: 0 }) */
  initialPosition?: Point;
  /** Initial rotation in radians (default: 0) */
  initialRotation?: number;
}

/**
 * Operations every view controller provides. ViewController is the default;
 * other implementations (e.g. one driven by an animation engine) implement
 * this interface directly.
 */
export interface ViewControllerBase {
  /** State the controller was created with */
  readonly initial: ViewState;
  /** State before the last field write or updateMultiple */
  readonly previous: ViewState;
  readonly current: ViewState;
  readonly outputStateStream: ViewStateStream;
  readonly isDisposed: boolean;

  position: Point;
  /**
   * Avoid setting without also setting scaleState to 'zooming'
   */
  scale: number | null;
  rotation: number;
  rotationFocusPoint: Point | null;
  scaleState: ScaleState;

  /**
   * Payload-free change notification; re-read `current` when called.
   *
   * @returns Unsubscribe function
   */
  addListener(listener: () => void): () => void;
  removeListener(listener: () => void): void;

  /** Update several fields with a single published change */
  updateMultiple(update: ViewStateUpdate): void;
  /** Restore the initial state (always publishes, keeps `previous`) */
  reset(): void;
  /** Close the stream and release all listeners */
  dispose(): void;
}

// ─────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────

export class ViewController implements ViewControllerBase {
  private readonly initialState: ViewState;
  private readonly notifier: ValueNotifier<ViewState>;
  private readonly outputCtrl = new BroadcastStream<ViewState>();
  private disposed = false;

  constructor(config: ViewControllerConfig = {}) {
    const initialPosition = config.initialPosition ?? ZERO_POINT;
    const initialRotation = config.initialRotation ?? 0;

    if (!isFinitePoint(initialPosition)) {
      throw new RangeError(
        `initialPosition must be finite, got (${initialPosition.x}, ${initialPosition.y})`
      );
    }
    if (!Number.isFinite(initialRotation)) {
      throw new RangeError(`initialRotation must be finite, got ${initialRotation}`);
    }

    // Scale stays unset: the initial scale comes from the scale state policy
    this.initialState = createViewState({
      position: initialPosition,
      scale: null,
      rotation: initialRotation,
      rotationFocusPoint: null,
      scaleState: 'initial',
    });

    this.notifier = new ValueNotifier(this.initialState, viewStatesEqual);
    this.outputCtrl.seed(this.initialState);
    this.notifier.addListener(this.changeListener);

    console.log('[ViewController] Initialized:', describeViewState(this.initialState));
  }

  // ─────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * True while anything hangs off the change notifier, the stream bridge
   * included. Only false once disposed.
   */
  get hasListeners(): boolean {
    return this.notifier.hasListeners;
  }

  get initial(): ViewState {
    this.assertActive('initial');
    return this.initialState;
  }

  get previous(): ViewState {
    this.assertActive('previous');
    return this.notifier.previous;
  }

  get current(): ViewState {
    this.assertActive('current');
    return this.notifier.value;
  }

  get outputStateStream(): ViewStateStream {
    this.assertActive('outputStateStream');
    return this.outputCtrl;
  }

  // ─────────────────────────────────────────────────────────────────
  // Field proxies
  // ─────────────────────────────────────────────────────────────────

  get position(): Point {
    return this.current.position;
  }

  set position(position: Point) {
    this.write('position', { position });
  }

  get scale(): number | null {
    return this.current.scale;
  }

  set scale(scale: number | null) {
    this.write('scale', { scale });
  }

  get rotation(): number {
    return this.current.rotation;
  }

  set rotation(rotation: number) {
    this.write('rotation', { rotation });
  }

  get rotationFocusPoint(): Point | null {
    return this.current.rotationFocusPoint;
  }

  set rotationFocusPoint(rotationFocusPoint: Point | null) {
    this.write('rotationFocusPoint', { rotationFocusPoint });
  }

  get scaleState(): ScaleState {
    return this.current.scaleState;
  }

  set scaleState(scaleState: ScaleState) {
    this.write('scaleState', { scaleState });
  }

  // ─────────────────────────────────────────────────────────────────
  // Write API
  // ─────────────────────────────────────────────────────────────────

  updateMultiple(update: ViewStateUpdate): void {
    this.assertActive('updateMultiple');
    const current = this.notifier.value;

    // No equality gate: a combined gesture step is always one published change
    this.notifier.set(
      createViewState({
        position: update.position ?? current.position,
        scale: update.scale !== undefined ? update.scale : current.scale,
        rotation: update.rotation ?? current.rotation,
        rotationFocusPoint:
          update.rotationFocusPoint !== undefined
            ? update.rotationFocusPoint
            : current.rotationFocusPoint,
        scaleState: update.scaleState ?? current.scaleState,
      }),
      { force: true }
    );
  }

  reset(): void {
    this.assertActive('reset');
    this.notifier.set(this.initialState, { force: true, keepPrevious: true });
    console.log('[ViewController] Reset to initial state');
  }

  // ─────────────────────────────────────────────────────────────────
  // Subscription
  // ─────────────────────────────────────────────────────────────────

  addListener(listener: () => void): () => void {
    this.assertActive('addListener');
    return this.notifier.addListener(listener);
  }

  removeListener(listener: () => void): void {
    this.assertActive('removeListener');
    this.notifier.removeListener(listener);
  }

  // ─────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────

  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    this.notifier.removeListener(this.changeListener);
    this.outputCtrl.close();
    this.notifier.dispose();

    console.log('[ViewController] Disposed');
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────

  /**
   * Bridge from the notifier to the stream. Runs for every accepted change.
   */
  private readonly changeListener = (): void => {
    this.outputCtrl.add(this.notifier.value);
  };

  /**
   * Single-field write. Only one field differs from `current`, so whole-state
   * equality is field equality: an unchanged field is a silent no-op.
   */
  private write(field: keyof ViewState, patch: Partial<ViewState>): void {
    this.assertActive(field);
    this.notifier.set(createViewState({ ...this.notifier.value, ...patch }));
  }

  private assertActive(operation: string): void {
    if (this.disposed) {
      throw new ControllerDisposedError('ViewController', operation);
    }
  }
}
