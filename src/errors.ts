const PREFIX = '[mobx-mvvm]';

/**
 * Base class for developer-facing failures raised by the library.
 * These point at wiring defects, not at conditions the user can fix.
 */
export class MvvmError extends Error {
  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = new.target.name;
  }
}

/** No enclosing View publishes a view model for the requested key. */
export class ViewModelNotFoundError extends MvvmError {
  constructor(readonly key: string, readonly requester: string) {
    super(
      `${requester} cannot find "${key}" in the current context. ` +
      `Make sure it is rendered below a View that provides "${key}".`
    );
  }
}

/** A lifecycle contract was broken (double dispose, active ticker on unmount, ...). */
export class LifecycleError extends MvvmError {}

/** A request was pushed onto a channel after its owner was disposed. */
export class ChannelClosedError extends MvvmError {
  constructor(readonly channel: string) {
    super(`Cannot add a request to "${channel}": the channel is closed.`);
  }
}

export class ServiceNotFoundError extends MvvmError {
  constructor(readonly key: string) {
    super(`No service is registered for "${key}".`);
  }
}

export class ServiceAlreadyRegisteredError extends MvvmError {
  constructor(readonly key: string) {
    super(`A service is already registered for "${key}". Unregister it first.`);
  }
}

export class EntityNotFoundError extends MvvmError {
  constructor(readonly id: unknown) {
    super(`No entity with id "${String(id)}".`);
  }
}

export class EntityConflictError extends MvvmError {
  constructor(readonly id: unknown) {
    super(`An entity with id "${String(id)}" already exists.`);
  }
}
