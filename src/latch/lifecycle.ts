/**
 * Lifecycle binding
 *
 * Disposes a latch when its host signals teardown. Any object with
 * EventEmitter-style `once`/`off` registration can act as the host.
 */

import type { RefreshLatch } from "./refresh-latch.js";

/**
 * Host that announces its own teardown through an event
 */
export interface LifecycleOwner {
  once(event: string, listener: () => void): unknown;
  off(event: string, listener: () => void): unknown;
}

/**
 * Handle returned for each latch bound to a host
 */
export interface LifecycleBinding {
  /** True until the host fired its teardown event or unbind() was called */
  readonly active: boolean;
  /** Stop watching the host without disposing the latch */
  unbind(): void;
}

export interface BindOptions {
  /** Teardown event name (default: "destroy") */
  event?: string;
}

/**
 * Dispose a latch when its owner is destroyed
 *
 * Several latches may bind to the same owner; each binding is independent.
 * A latch that was already disposed when the event fires is left alone.
 *
 * @example
 * ```ts
 * const screen = new EventEmitter();
 * const latch = newRefreshLatch((shown) => spinner.toggle(shown));
 * const binding = bindToLifecycle(screen, latch);
 *
 * screen.emit("destroy"); // latch.dispose() runs once
 * binding.active;         // false
 * ```
 */
export function bindToLifecycle(
  owner: LifecycleOwner,
  latch: RefreshLatch,
  options: BindOptions = {},
): LifecycleBinding {
  const event = options.event ?? "destroy";
  let active = true;

  const onTeardown = (): void => {
    if (!active) return;
    active = false;
    if (!latch.disposed) {
      latch.dispose();
    }
  };

  owner.once(event, onTeardown);

  return {
    get active() {
      return active;
    },
    unbind() {
      if (!active) return;
      active = false;
      owner.off(event, onTeardown);
    },
  };
}
