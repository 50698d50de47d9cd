/** Any class whose instances are `T`, abstract classes included. */
export type Constructor<T> = abstract new (...args: never[]) => T;

export type Resolver<T> = () => T;

/**
 * Typed key for values that have no class of their own (interfaces,
 * plain-object view models, configuration).
 *
 * A token keeps its bindings per owner, so one token can be bound in
 * several locators or scopes at once.
 *
 * @example
 * ```ts
 * interface Clock { now(): Date }
 * export const ClockToken = new Token<Clock>('Clock');
 * locator.registerSingleton(ClockToken, { now: () => new Date() });
 * ```
 */
export class Token<T> {
  private readonly bindings = new WeakMap<object, Resolver<T>>();

  constructor(readonly description: string) {}

  /** @internal */
  bind(owner: object, resolver: Resolver<T>): void {
    this.bindings.set(owner, resolver);
  }

  /** @internal */
  unbind(owner: object): boolean {
    return this.bindings.delete(owner);
  }

  /** @internal */
  resolverFor(owner: object): Resolver<T> | undefined {
    return this.bindings.get(owner);
  }

  toString(): string {
    return `Token(${this.description})`;
  }
}

export type Key<T> = Constructor<T> | Token<T>;

export function describeKey(key: Key<unknown>): string {
  return key instanceof Token ? key.description : key.name || 'anonymous class';
}
