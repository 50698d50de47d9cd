/**
 * How long a binding may wait for its first commit before its view model is
 * disposed. Matches the grace period mobx-react-lite gives render-time
 * reactions.
 */
export const CLEANUP_UNCOMMITTED_AFTER_MS = 10_000;

interface Discardable {
  discard(): void;
}

// Renders React throws away (StrictMode double render, an interrupted
// concurrent render, a suspended tree) never run effects, so the bindings
// they created never mount.
const uncommitted = new Map<Discardable, number>();
let sweepTimer: ReturnType<typeof setTimeout> | undefined;

function sweep(): void {
  sweepTimer = undefined;
  const now = Date.now();
  for (const [binding, createdAt] of uncommitted) {
    if (now - createdAt >= CLEANUP_UNCOMMITTED_AFTER_MS) {
      uncommitted.delete(binding);
      binding.discard();
    }
  }
  scheduleSweep();
}

function scheduleSweep(): void {
  if (sweepTimer === undefined && uncommitted.size > 0) {
    sweepTimer = setTimeout(sweep, CLEANUP_UNCOMMITTED_AFTER_MS);
  }
}

/** Records a binding created during render. */
export function trackUncommitted(binding: Discardable): void {
  uncommitted.set(binding, Date.now());
  scheduleSweep();
}

/** The binding's view committed; it is disposed by its own unmount. */
export function markCommitted(binding: Discardable): void {
  uncommitted.delete(binding);
  if (uncommitted.size === 0 && sweepTimer !== undefined) {
    clearTimeout(sweepTimer);
    sweepTimer = undefined;
  }
}
