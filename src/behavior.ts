import { reportError, warn } from './config';

/**
 * Base class for behaviors: self-contained helpers owned by a view model
 * (prompt and notification mediators, ticker providers, your own).
 *
 * A view model field holding a Behavior is picked up by the view binding,
 * which mounts it after the view model's `init()` and unmounts it once the
 * view model is disposed.
 *
 * @example
 * ```ts
 * class OnlineStatus extends Behavior {
 *   online = navigator.onLine;
 *
 *   constructor() {
 *     super();
 *     makeObservable(this, { online: observable, update: action.bound });
 *   }
 *
 *   update() {
 *     this.online = navigator.onLine;
 *   }
 *
 *   onMount() {
 *     window.addEventListener('online', this.update);
 *     window.addEventListener('offline', this.update);
 *     return () => {
 *       window.removeEventListener('online', this.update);
 *       window.removeEventListener('offline', this.update);
 *     };
 *   }
 * }
 *
 * class StatusViewModel extends ViewModel {
 *   status = new OnlineStatus();
 * }
 * ```
 */
export abstract class Behavior {
  onMount?(): void | (() => void);
  onUnmount?(): void;
}

/** @internal */
export interface BehaviorEntry {
  instance: Behavior;
  cleanup?: () => void;
}

export function isBehavior(value: unknown): value is Behavior {
  return value instanceof Behavior;
}

/** @internal - Scan own properties of a view model for behavior instances */
export function collectBehaviors(owner: object): BehaviorEntry[] {
  const entries: BehaviorEntry[] = [];
  for (const value of Object.values(owner)) {
    if (isBehavior(value)) {
      entries.push({ instance: value });
    }
  }
  return entries;
}

/** @internal */
export function mountBehavior(behavior: BehaviorEntry): void {
  const inst = behavior.instance;
  if (!inst.onMount) return;

  try {
    const result: unknown = inst.onMount();
    if (result instanceof Promise) {
      warn(
        `${inst.constructor.name}.onMount() returned a Promise. ` +
        `Lifecycle methods must be synchronous. Use a sync onMount that ` +
        `calls an async method instead.`
      );
    } else if (typeof result === 'function') {
      behavior.cleanup = () => {
        result();
      };
    }
  } catch (e) {
    reportError(e, { phase: 'onMount', name: inst.constructor.name, isBehavior: true });
  }
}

/** @internal */
export function unmountBehavior(behavior: BehaviorEntry): void {
  const inst = behavior.instance;

  try {
    behavior.cleanup?.();
    behavior.cleanup = undefined;
  } catch (e) {
    reportError(e, { phase: 'onUnmount', name: inst.constructor.name, isBehavior: true });
  }

  try {
    inst.onUnmount?.();
  } catch (e) {
    reportError(e, { phase: 'onUnmount', name: inst.constructor.name, isBehavior: true });
  }
}
