// Re-export config utilities
export { configure, reportError, type MvvmConfig, type MvvmErrorContext } from './config';

export * from './errors';
export { Token, type Key, type Constructor } from './token';
export { ServiceLocator, locator } from './locator';

export { Behavior } from './behavior';
export { makeModelObservable } from './observable';
export { ViewModel, type ViewModelLifecycle } from './view-model';
export { Service } from './service';
export { Repository, MemoryRepository, type CrudRepository } from './repository';
export { asRecord, createRecord, type Recordable } from './record';

export { ViewBinding, type BindingOptions, type HookReactions, type ReactionDisposer } from './binding';
export { ViewModelScope, useViewModel, useOptionalViewModel } from './scope';
export { createView, createViewFragment, ViewModelProvider, type ViewDefinition, type ViewModelProviderProps } from './view';

export { RequestChannel } from './channel';
export {
  Prompt,
  PromptMediator,
  PromptOutlet,
  DefaultPromptDialog,
  reactToPrompts,
  type PromptOptions,
  type PromptStatus,
  type PromptOutletProps,
} from './prompt';
export {
  Notification,
  NotificationMediator,
  NotificationOutlet,
  DefaultNotificationBar,
  reactToNotifications,
  type NotificationOptions,
  type NotificationCloseReason,
  type NotificationOutletProps,
} from './notification';
export {
  Ticker,
  TickerProvider,
  animationFrameScheduler,
  type FrameScheduler,
  type TickerCallback,
} from './ticker';
