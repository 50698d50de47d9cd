import { isObservableObject } from 'mobx';
import { type BehaviorEntry, collectBehaviors, mountBehavior, unmountBehavior } from './behavior';
import { globalConfig, reportError } from './config';
import { LifecycleError } from './errors';
import { makeModelObservable } from './observable';
import { VIEW_MODEL_EXCLUDES, ViewModel } from './view-model';

export type ReactionDisposer = () => void;

/**
 * Subscribes reactions for a freshly mounted view model. Return (or
 * `yield`, from a generator) one disposer per reaction.
 */
export type HookReactions<VM> = (vm: VM) => Iterable<ReactionDisposer> | void;

export interface BindingOptions<VM> {
  /** Used in error messages */
  name: string;
  hookReactions?: HookReactions<VM>;
  /** Whether to make ViewModel subclasses observable (default: globalConfig.autoObservable) */
  autoObservable?: boolean;
}

type BindingState = 'created' | 'mounted' | 'unmounted';

/**
 * Owns one view model for the lifetime of one mounted view.
 *
 * `mount()` runs `init()`, mounts owned behaviors and subscribes the
 * reactions from `hookReactions`. `unmount()` disposes those reactions in
 * registration order, then disposes the view model exactly once, then
 * unmounts its behaviors (so a view model can stop its tickers in
 * `onDispose` before the provider checks them).
 */
export class ViewBinding<VM extends object> {
  readonly viewModel: VM;

  private state: BindingState = 'created';
  private readonly reactionDisposers: ReactionDisposer[] = [];
  private behaviors: BehaviorEntry[] = [];

  constructor(create: () => VM, private readonly options: BindingOptions<VM>) {
    const instance = create();
    const autoObservable = options.autoObservable ?? globalConfig.autoObservable;
    if (autoObservable && instance instanceof ViewModel && !isObservableObject(instance)) {
      makeModelObservable(instance, ViewModel.prototype, VIEW_MODEL_EXCLUDES);
    }
    this.viewModel = instance;
  }

  get mounted(): boolean {
    return this.state === 'mounted';
  }

  /** True once unmount() ran; the view model is disposed and must not be reused. */
  get unmounted(): boolean {
    return this.state === 'unmounted';
  }

  /** Number of reactions currently subscribed. */
  get reactionCount(): number {
    return this.reactionDisposers.length;
  }

  mount(): void {
    if (this.state !== 'created') {
      throw new LifecycleError(`${this.options.name} cannot mount a binding that is ${this.state}.`);
    }
    this.state = 'mounted';

    const vm = this.viewModel;
    if (vm instanceof ViewModel) vm._markMounted();

    this.runInit();

    this.behaviors = collectBehaviors(vm);
    for (const behavior of this.behaviors) {
      mountBehavior(behavior);
    }

    this.hookReactions();
  }

  unmount(): void {
    if (this.state !== 'mounted') {
      throw new LifecycleError(`${this.options.name} cannot unmount a binding that is ${this.state}.`);
    }
    this.state = 'unmounted';

    for (const dispose of this.reactionDisposers.splice(0)) {
      try {
        dispose();
      } catch (e) {
        reportError(e, { phase: 'onUnmount', name: this.options.name, isBehavior: false });
      }
    }

    this.disposeViewModel();

    for (const behavior of this.behaviors) {
      unmountBehavior(behavior);
    }
    this.behaviors = [];
  }

  /**
   * Disposes the view model of a binding that was never mounted, e.g. one
   * created by a render React discarded. No-op once mounted or discarded.
   */
  discard(): void {
    if (this.state !== 'created') return;
    this.state = 'unmounted';
    this.disposeViewModel();
  }

  private disposeViewModel(): void {
    const dispose: unknown = Reflect.get(this.viewModel, 'dispose');
    if (typeof dispose === 'function') {
      try {
        dispose.call(this.viewModel);
      } catch (e) {
        reportError(e, { phase: 'onDispose', name: this.options.name, isBehavior: false });
      }
    }
  }

  private runInit(): void {
    const init: unknown = Reflect.get(this.viewModel, 'init');
    if (typeof init !== 'function') return;

    const context = { phase: 'init', name: this.options.name, isBehavior: false } as const;
    try {
      const result: unknown = init.call(this.viewModel);
      if (result instanceof Promise) {
        void result.catch((e: unknown) => reportError(e, context));
      }
    } catch (e) {
      reportError(e, context);
    }
  }

  private hookReactions(): void {
    const hook = this.options.hookReactions;
    if (!hook) return;

    try {
      const disposers = hook(this.viewModel);
      if (!disposers) return;
      for (const disposer of disposers) {
        if (typeof disposer !== 'function') {
          throw new LifecycleError(
            `${this.options.name}.hookReactions() produced ${String(disposer)} instead of a reaction disposer.`
          );
        }
        this.reactionDisposers.push(disposer);
      }
    } catch (e) {
      reportError(e, { phase: 'hookReactions', name: this.options.name, isBehavior: false });
    }
  }
}
