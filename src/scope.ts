import { createContext, useContext } from 'react';
import { ViewModelNotFoundError } from './errors';
import { type Key, Token, describeKey } from './token';

/**
 * One link in the chain of published view models. Each View adds a link
 * around its subtree; lookups walk from the innermost link outwards.
 */
export class ViewModelScope {
  constructor(
    readonly viewModel: object,
    readonly parent: ViewModelScope | null,
  ) {}

  /**
   * Creates a link and binds the view model under `token` for this link only.
   */
  static publish<VM extends object>(
    viewModel: VM,
    parent: ViewModelScope | null,
    token?: Token<VM>,
  ): ViewModelScope {
    const scope = new ViewModelScope(viewModel, parent);
    token?.bind(scope, () => viewModel);
    return scope;
  }

  /** Nearest view model matching `key`, starting at this link. */
  lookup<T>(key: Key<T>): T | undefined {
    for (let scope: ViewModelScope | null = this; scope; scope = scope.parent) {
      if (key instanceof Token) {
        const resolve = key.resolverFor(scope);
        if (resolve) return resolve();
      } else if (scope.viewModel instanceof key) {
        return scope.viewModel;
      }
    }
    return undefined;
  }
}

/** @internal */
export const ViewModelScopeContext = createContext<ViewModelScope | null>(null);
ViewModelScopeContext.displayName = 'ViewModelScope';

/**
 * Get a view model of the given type that was published above in the tree.
 * Throws when there is none; that is a wiring defect, not a runtime condition.
 */
export function useViewModel<T>(key: Key<T>, requester = 'useViewModel'): T {
  const found = useOptionalViewModel(key);
  if (found === undefined) {
    throw new ViewModelNotFoundError(describeKey(key), requester);
  }
  return found;
}

/** Like {@link useViewModel}, but returns undefined when nothing matches. */
export function useOptionalViewModel<T>(key: Key<T>): T | undefined {
  const scope = useContext(ViewModelScopeContext);
  return scope?.lookup(key);
}
