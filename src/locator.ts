import { ServiceAlreadyRegisteredError, ServiceNotFoundError } from './errors';
import { type Constructor, type Key, type Resolver, Token, describeKey } from './token';

/**
 * Resolve-by-key registry for services and repositories.
 *
 * Class keys are checked with `instanceof` on every resolution, so a
 * registration can never hand out a value of the wrong type. Interfaces
 * go through a {@link Token}.
 */
export class ServiceLocator {
  private readonly classBindings = new Map<Constructor<unknown>, Resolver<unknown>>();
  private readonly tokens = new Set<Token<unknown>>();

  /** Registers an existing instance. */
  registerSingleton<T>(key: Key<T>, instance: T): void {
    this.bind(key, () => instance);
  }

  /** Registers a factory that runs on first resolution only. */
  registerLazySingleton<T>(key: Key<T>, factory: () => T): void {
    let created: { value: T } | undefined;
    this.bind(key, () => {
      created ??= { value: factory() };
      return created.value;
    });
  }

  /** Registers a factory that runs on every resolution. */
  registerFactory<T>(key: Key<T>, factory: () => T): void {
    this.bind(key, factory);
  }

  get<T>(key: Key<T>): T {
    if (key instanceof Token) {
      const resolve = key.resolverFor(this);
      if (!resolve) throw new ServiceNotFoundError(describeKey(key));
      return resolve();
    }

    const resolve = this.classBindings.get(key);
    if (!resolve) throw new ServiceNotFoundError(describeKey(key));
    const value = resolve();
    if (!(value instanceof key)) {
      throw new TypeError(
        `[mobx-mvvm] The registration for "${describeKey(key)}" produced a value that is not an instance of it.`
      );
    }
    return value;
  }

  isRegistered(key: Key<unknown>): boolean {
    return key instanceof Token ? key.resolverFor(this) !== undefined : this.classBindings.has(key);
  }

  unregister(key: Key<unknown>): boolean {
    if (key instanceof Token) {
      this.tokens.delete(key);
      return key.unbind(this);
    }
    return this.classBindings.delete(key);
  }

  /** Drops every registration. Mostly useful between tests. */
  reset(): void {
    this.classBindings.clear();
    for (const token of this.tokens) {
      token.unbind(this);
    }
    this.tokens.clear();
  }

  private bind<T>(key: Key<T>, resolver: Resolver<T>): void {
    if (this.isRegistered(key)) {
      throw new ServiceAlreadyRegisteredError(describeKey(key));
    }
    if (key instanceof Token) {
      key.bind(this, resolver);
      this.tokens.add(key);
    } else {
      this.classBindings.set(key, resolver);
    }
  }
}

/** Process-wide default registry. */
export const locator = new ServiceLocator();
