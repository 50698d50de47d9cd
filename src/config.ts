import { ServiceLocator, locator } from './locator';

/**
 * Where a reported error was thrown.
 */
export interface MvvmErrorContext {
  phase: 'init' | 'hookReactions' | 'onMount' | 'onUnmount' | 'onDispose' | 'prompt' | 'notification';
  /** Class or view name of the thrower */
  name: string;
  isBehavior: boolean;
}

/**
 * Global configuration options for mobx-mvvm
 */
export interface MvvmConfig {
  /** Whether to automatically make ViewModel instances observable (default: true) */
  autoObservable?: boolean;
  /** Receives errors thrown from lifecycle hooks and handlers. Defaults to console.error. */
  onError?: (error: unknown, context: MvvmErrorContext) => void;
  /** Registry used by getService() / getRepository() */
  locator?: ServiceLocator;
}

export const globalConfig: MvvmConfig & { autoObservable: boolean; locator: ServiceLocator } = {
  autoObservable: true,
  locator,
};

/**
 * Configure global defaults for mobx-mvvm.
 * Settings can still be overridden per-view in createView options.
 *
 * `autoObservable` and `locator` always hold a value, so `undefined` leaves
 * them as they are; `onError: undefined` restores console logging.
 */
export function configure(config: MvvmConfig): void {
  if (config.autoObservable !== undefined) globalConfig.autoObservable = config.autoObservable;
  if (config.locator !== undefined) globalConfig.locator = config.locator;
  if ('onError' in config) globalConfig.onError = config.onError;
}

export function reportError(error: unknown, context: MvvmErrorContext): void {
  if (globalConfig.onError) {
    globalConfig.onError(error, context);
    return;
  }
  const kind = context.isBehavior ? 'Behavior' : 'View';
  console.error(`[mobx-mvvm] ${kind} ${context.name}.${context.phase}() threw:`, error);
}

/** Development-only warning; silent in production builds. */
export function warn(message: string): void {
  if (process.env.NODE_ENV !== 'production') {
    console.warn(`[mobx-mvvm] ${message}`);
  }
}
