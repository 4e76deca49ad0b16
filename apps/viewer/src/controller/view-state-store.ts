/**
 * View State Store
 *
 * Exposes a controller's state as a Svelte readable store so render components
 * can bind to `$viewState`. The store follows the controller's output stream
 * while it has subscribers and lets go of the stream when the last one leaves.
 */

import { readable, type Readable } from 'svelte/store';
import type { ViewState } from './view-state';
import type { ViewControllerBase } from './view-controller';

export function viewStateStore(controller: ViewControllerBase): Readable<ViewState> {
  return readable(controller.current, (set) => {
    // Catch up on anything published while the store had no subscribers
    set(controller.current);
    return controller.outputStateStream.listen(set);
  });
}
