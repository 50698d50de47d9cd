import { comparer, computed, type IComputedValue } from 'mobx';

/**
 * A model that can describe itself as a plain value, e.g. for storage as
 * JSON. Changes propagate through `observableRecord`, so records of nested
 * models build a tree of dependencies.
 *
 * @example
 * ```ts
 * class Settings implements Recordable<{ theme: string; editor: EditorRecord }> {
 *   theme = 'dark';
 *   editor = new EditorSettings();
 *
 *   readonly observableRecord = createRecord(() => ({
 *     theme: this.theme,
 *     editor: asRecord(this.editor),
 *   }));
 * }
 * ```
 */
export interface Recordable<T> {
  readonly observableRecord: IComputedValue<T>;
}

/** The current record value of a model. */
export function asRecord<T>(model: Recordable<T>): T {
  return model.observableRecord.get();
}

/**
 * Wraps a record derivation in a computed value. Structurally equal
 * results do not notify observers.
 */
export function createRecord<T>(derive: () => T): IComputedValue<T> {
  return computed(derive, { equals: comparer.structural });
}
