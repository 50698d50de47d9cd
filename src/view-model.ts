import { globalConfig, reportError } from './config';
import { LifecycleError } from './errors';
import type { Repository } from './repository';
import type { Service } from './service';
import type { Key } from './token';

/**
 * What a view binding needs from a view model. Any object can be a view
 * model; these hooks are all optional.
 */
export interface ViewModelLifecycle {
  /** Called once, when the owning view is inserted into the tree. */
  init?(): void | Promise<void>;
  /** Called exactly once, after the view's reactions have been disposed. */
  dispose?(): void;
}

type LifecycleState = 'created' | 'mounted' | 'disposed';

/**
 * Convenience base class for view models.
 *
 * Fields become observable, getters computed and methods bound actions when
 * the view binds the instance (see `autoObservable`).
 *
 * @example
 * ```ts
 * class CounterViewModel extends ViewModel {
 *   constructor(private readonly counter: SharedCounter) {
 *     super();
 *   }
 *
 *   get number() {
 *     return String(this.counter.value);
 *   }
 *
 *   decrement() {
 *     this.counter.value--;
 *   }
 * }
 * ```
 */
export abstract class ViewModel implements ViewModelLifecycle {
  /** @internal */
  _state: LifecycleState = 'created';

  /** @internal */
  _disposers: Array<() => void> = [];

  /** Whether the owning view is currently in the tree. */
  get mounted(): boolean {
    return this._state === 'mounted';
  }

  get disposed(): boolean {
    return this._state === 'disposed';
  }

  init?(): void | Promise<void>;

  /** Override to release resources. Runs after the `disposeWith` disposers. */
  onDispose?(): void;

  /** Registers a cleanup to run when this view model is disposed. */
  disposeWith(disposer: () => void): void {
    if (this._state === 'disposed') {
      throw new LifecycleError(`${this.constructor.name} is already disposed; cannot register a disposer.`);
    }
    this._disposers.push(disposer);
  }

  getService<T extends Service>(key: Key<T>): T {
    return globalConfig.locator.get(key);
  }

  getRepository<T extends Repository>(key: Key<T>): T {
    return globalConfig.locator.get(key);
  }

  /** @internal - called by the view binding */
  _markMounted(): void {
    this._state = 'mounted';
  }

  /**
   * Releases everything registered with `disposeWith`, then calls
   * `onDispose`. Disposing twice is a lifecycle error.
   */
  dispose(): void {
    if (this._state === 'disposed') {
      throw new LifecycleError(`${this.constructor.name}.dispose() was called twice.`);
    }
    this._state = 'disposed';

    const context = { phase: 'onDispose', name: this.constructor.name, isBehavior: false } as const;
    for (const disposer of this._disposers.splice(0)) {
      try {
        disposer();
      } catch (e) {
        reportError(e, context);
      }
    }

    try {
      this.onDispose?.();
    } catch (e) {
      reportError(e, context);
    }
  }
}

/** Base class members that should not be made observable */
export const VIEW_MODEL_EXCLUDES: ReadonlySet<string> = new Set([
  'mounted',
  'disposed',
  'init',
  'onDispose',
  'dispose',
  'disposeWith',
  'getService',
  'getRepository',
]);
