import { action, computed, makeObservable, observable, reaction, type IReactionDisposer } from 'mobx';
import { ChannelClosedError } from './errors';

/**
 * Observable FIFO of pending requests from a view model to its view.
 *
 * Requests stay queued until a consumer takes or removes them; there is no
 * bound on the queue. Once closed, the queue is emptied and further pushes
 * throw {@link ChannelClosedError}.
 */
export class RequestChannel<T> {
  private readonly queue = observable.array<T>([], { deep: false });
  private isClosed = false;

  constructor(readonly name: string) {
    makeObservable<RequestChannel<T>, 'isClosed'>(this, {
      isClosed: observable,
      head: computed,
      size: computed,
      closed: computed,
      push: action,
      take: action,
      remove: action,
      close: action,
    });
  }

  /** Oldest queued request */
  get head(): T | undefined {
    return this.queue.length > 0 ? this.queue[0] : undefined;
  }

  get size(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Snapshot of the queued requests, oldest first. */
  get items(): readonly T[] {
    return this.queue.slice();
  }

  push(request: T): void {
    if (this.isClosed) throw new ChannelClosedError(this.name);
    this.queue.push(request);
  }

  /** Removes and returns the oldest request. */
  take(): T | undefined {
    return this.queue.shift();
  }

  remove(request: T): boolean {
    return this.queue.remove(request);
  }

  close(): void {
    this.isClosed = true;
    this.queue.clear();
  }

  /**
   * Hands every queued request, oldest first, to `handler` and keeps doing
   * so as new requests arrive. Requests are taken off the queue before the
   * handler sees them, so only one consumer should subscribe.
   */
  subscribe(handler: (request: T) => void): IReactionDisposer {
    return reaction(
      () => this.queue.length,
      (length) => {
        if (length === 0) return;
        const drained = this.queue.slice();
        this.queue.clear();
        for (const request of drained) {
          handler(request);
        }
      },
      { fireImmediately: true },
    );
  }
}
