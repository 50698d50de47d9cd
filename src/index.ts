export {
  // Views
  createView,
  createViewFragment,
  ViewModelProvider,

  // Scoped lookup
  useViewModel,
  useOptionalViewModel,
  ViewModelScope,

  // Models
  ViewModel,
  Service,
  Repository,
  MemoryRepository,
  Behavior,
  ViewBinding,
  makeModelObservable,
  asRecord,
  createRecord,

  // Mediators
  Prompt,
  PromptMediator,
  PromptOutlet,
  DefaultPromptDialog,
  reactToPrompts,
  Notification,
  NotificationMediator,
  NotificationOutlet,
  DefaultNotificationBar,
  reactToNotifications,
  RequestChannel,
  Ticker,
  TickerProvider,
  animationFrameScheduler,

  // Services
  ServiceLocator,
  locator,
  Token,

  // Config
  configure,
  reportError,

  // Errors
  MvvmError,
  ViewModelNotFoundError,
  LifecycleError,
  ChannelClosedError,
  ServiceNotFoundError,
  ServiceAlreadyRegisteredError,
  EntityNotFoundError,
  EntityConflictError,
} from './mvvm';

export type {
  ViewDefinition,
  ViewModelProviderProps,
  ViewModelLifecycle,
  CrudRepository,
  HookReactions,
  ReactionDisposer,
  BindingOptions,
  Recordable,
  PromptOptions,
  PromptStatus,
  PromptOutletProps,
  NotificationOptions,
  NotificationCloseReason,
  NotificationOutletProps,
  FrameScheduler,
  TickerCallback,
  Key,
  Constructor,
  MvvmConfig,
  MvvmErrorContext,
} from './mvvm';
