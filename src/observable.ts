import { action, computed, makeObservable, observable, type AnnotationMapEntry, type AnnotationsMap } from 'mobx';
import { isBehavior } from './behavior';

/**
 * Creates observable annotations for an instance of a subclass and applies
 * them. This is needed because makeAutoObservable doesn't work with
 * inheritance.
 *
 * - own fields → `observable` (`observable.ref` for behaviors, which manage
 *   their own observability)
 * - getters → `computed`
 * - methods → `action.bound`
 *
 * The prototype walk stops at `stopAt` (the library base class), and every
 * key in `excludes` or starting with `_` is left alone.
 *
 * @example
 * ```ts
 * class SharedCounter extends Service {
 *   counter = 0;
 *   constructor() {
 *     super();
 *     makeModelObservable(this, Service.prototype);
 *   }
 * }
 * ```
 */
export function makeModelObservable<T extends object>(
  instance: T,
  stopAt: object = Object.prototype,
  excludes: ReadonlySet<string> = new Set(),
): void {
  const annotations: Record<string, AnnotationMapEntry> = {};

  const skip = (key: string) => key === 'constructor' || key.startsWith('_') || excludes.has(key);

  // Collect own properties (instance state) → observable
  for (const [key, value] of Object.entries(instance)) {
    if (skip(key)) continue;

    // Skip functions (arrow-function fields stay plain)
    if (typeof value === 'function') continue;

    annotations[key] = isBehavior(value) ? observable.ref : observable;
  }

  // Walk prototype chain up to (but not including) the base class
  let proto: object | null = Object.getPrototypeOf(instance);
  while (proto && proto !== stopAt && proto !== Object.prototype) {
    for (const [key, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(proto))) {
      if (skip(key)) continue;
      if (key in annotations) continue;

      if (descriptor.get) {
        annotations[key] = computed;
      } else if (typeof descriptor.value === 'function') {
        annotations[key] = action.bound;
      }
    }

    proto = Object.getPrototypeOf(proto);
  }

  makeObservable(instance, annotations as AnnotationsMap<T, never>);
}
