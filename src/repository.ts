import { action, makeObservable, observable, values } from 'mobx';
import { EntityConflictError, EntityNotFoundError } from './errors';

/** Marker base for data-access services. */
export abstract class Repository {}

/**
 * Generic CRUD access to a persistence or network backend.
 */
export interface CrudRepository<T, K> {
  readAll(): AsyncIterable<T>;
  create(entity: T): Promise<T>;
  read(id: K): Promise<T>;
  update(entity: T): Promise<T>;
  delete(entity: T): Promise<T>;
}

/**
 * Observable in-memory {@link CrudRepository}. Reading `size` or `entities`
 * inside a render or reaction tracks the store.
 */
export class MemoryRepository<T, K> extends Repository implements CrudRepository<T, K> {
  private readonly store = observable.map<K, T>(undefined, { deep: false });

  constructor(private readonly keyOf: (entity: T) => K, initial: Iterable<T> = []) {
    super();
    makeObservable<MemoryRepository<T, K>, 'put' | 'remove'>(this, {
      put: action,
      remove: action,
    });
    for (const entity of initial) {
      this.put(entity);
    }
  }

  get size(): number {
    return this.store.size;
  }

  get entities(): readonly T[] {
    return values(this.store);
  }

  async *readAll(): AsyncIterable<T> {
    for (const entity of this.entities) {
      yield entity;
    }
  }

  async create(entity: T): Promise<T> {
    const id = this.keyOf(entity);
    if (this.store.has(id)) throw new EntityConflictError(id);
    this.put(entity);
    return entity;
  }

  async read(id: K): Promise<T> {
    const entity = this.store.get(id);
    if (entity === undefined) throw new EntityNotFoundError(id);
    return entity;
  }

  async update(entity: T): Promise<T> {
    const id = this.keyOf(entity);
    if (!this.store.has(id)) throw new EntityNotFoundError(id);
    this.put(entity);
    return entity;
  }

  async delete(entity: T): Promise<T> {
    const id = this.keyOf(entity);
    const existing = this.store.get(id);
    if (existing === undefined) throw new EntityNotFoundError(id);
    this.remove(id);
    return existing;
  }

  private put(entity: T): void {
    this.store.set(this.keyOf(entity), entity);
  }

  private remove(id: K): void {
    this.store.delete(id);
  }
}
