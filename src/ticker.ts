import { Behavior } from './behavior';
import { LifecycleError } from './errors';

/** Source of animation frames. `time` is a monotonic timestamp in milliseconds. */
export interface FrameScheduler {
  request(callback: (time: number) => void): number;
  cancel(handle: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (handle) => cancelAnimationFrame(handle),
};

/** Receives the milliseconds elapsed since the ticker's first frame. */
export type TickerCallback = (elapsed: number) => void;

/**
 * Calls its callback once per animation frame while active.
 *
 * A muted ticker keeps its clock running but skips the callback, so the
 * elapsed time jumps ahead when it is unmuted again.
 */
export class Ticker {
  private active = false;
  private isMuted = false;
  private isDisposed = false;
  private startTime: number | undefined;
  private handle: number | undefined;

  constructor(
    private readonly onTick: TickerCallback,
    private readonly scheduler: FrameScheduler,
    private readonly onDispose: (ticker: Ticker) => void,
    readonly debugLabel?: string,
  ) {}

  /** Whether the ticker was started and not yet stopped, muted or not. */
  get isActive(): boolean {
    return this.active;
  }

  /** Whether the callback is currently being called. */
  get isTicking(): boolean {
    return this.active && !this.isMuted;
  }

  get muted(): boolean {
    return this.isMuted;
  }

  set muted(value: boolean) {
    if (value === this.isMuted) return;
    this.isMuted = value;
    if (value) {
      this.unscheduleTick();
    } else {
      this.scheduleTick();
    }
  }

  start(): void {
    if (this.isDisposed) {
      throw new LifecycleError(`${this.describe()} was started after being disposed.`);
    }
    if (this.active) {
      throw new LifecycleError(`${this.describe()} was started twice.`);
    }
    this.active = true;
    this.startTime = undefined;
    this.scheduleTick();
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.startTime = undefined;
    this.unscheduleTick();
  }

  dispose(): void {
    if (this.isDisposed) return;
    this.stop();
    this.isDisposed = true;
    this.onDispose(this);
  }

  private describe(): string {
    return this.debugLabel ? `Ticker "${this.debugLabel}"` : 'Ticker';
  }

  private readonly tick = (time: number): void => {
    this.handle = undefined;
    if (!this.active) return;
    this.startTime ??= time;
    if (!this.isMuted) {
      this.onTick(time - this.startTime);
    }
    this.scheduleTick();
  };

  private scheduleTick(): void {
    if (!this.active || this.handle !== undefined) return;
    if (this.isMuted && this.startTime !== undefined) return;
    this.handle = this.scheduler.request(this.tick);
  }

  private unscheduleTick(): void {
    if (this.handle === undefined) return;
    this.scheduler.cancel(this.handle);
    this.handle = undefined;
  }
}

/**
 * Makes a view model a source of {@link Ticker}s for its animations.
 * Every ticker must be stopped or disposed before the view unmounts.
 *
 * @example
 * ```ts
 * class SpinnerViewModel extends ViewModel {
 *   tickers = new TickerProvider();
 *   angle = 0;
 *   private ticker = this.tickers.createTicker((elapsed) => this.rotate(elapsed));
 *
 *   rotate(elapsed: number) {
 *     this.angle = (elapsed / 1000) * 360;
 *   }
 *
 *   onDispose() {
 *     this.ticker.dispose();
 *   }
 * }
 * ```
 */
export class TickerProvider extends Behavior {
  private readonly tickers = new Set<Ticker>();
  private isMuted = false;

  constructor(private readonly scheduler: FrameScheduler = animationFrameScheduler) {
    super();
  }

  get tickerCount(): number {
    return this.tickers.size;
  }

  /** Mutes or unmutes every ticker this provider vended. */
  get muted(): boolean {
    return this.isMuted;
  }

  set muted(value: boolean) {
    this.isMuted = value;
    for (const ticker of this.tickers) {
      ticker.muted = value;
    }
  }

  createTicker(onTick: TickerCallback, debugLabel?: string): Ticker {
    const ticker = new Ticker(onTick, this.scheduler, (t) => this.tickers.delete(t), debugLabel);
    ticker.muted = this.isMuted;
    this.tickers.add(ticker);
    return ticker;
  }

  onUnmount(): void {
    const active = [...this.tickers].filter((ticker) => ticker.isActive);
    for (const ticker of active) {
      ticker.stop();
    }
    if (active.length > 0) {
      const labels = active.map((ticker) => ticker.debugLabel ?? 'unnamed').join(', ');
      throw new LifecycleError(
        `${this.constructor.name} was unmounted with ${active.length} active Ticker(s): ${labels}. ` +
        `Dispose or stop every Ticker before its view unmounts, otherwise it leaks.`
      );
    }
  }
}
