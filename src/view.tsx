import { memo, useContext, useEffect, useMemo, useRef, useState, type ReactNode } from 'react';
import { observer } from 'mobx-react-lite';
import { type HookReactions, ViewBinding } from './binding';
import { ViewModelScope, ViewModelScopeContext, useViewModel } from './scope';
import { type Key, type Token, describeKey } from './token';
import { markCommitted, trackUncommitted } from './uncommitted';

export interface ViewDefinition<VM extends object, P extends object> {
  /** Display name, also used in error messages (default: "View") */
  name?: string;
  /** Builds the view model when the view mounts. */
  create: (props: P) => VM;
  /** Runs inside an observer: re-renders whenever an observable it read changes. */
  render: (vm: VM, props: P) => ReactNode;
  /**
   * Subscribes reactions once per mount; yield a disposer for each. Runs in
   * the mount effect, so after the first render and after the effects of
   * child views.
   */
  hookReactions?: HookReactions<VM>;
  /** Also publish the view model under this token, for lookups by interface. */
  provides?: Token<VM>;
  /** Whether to make ViewModel subclasses observable (default: global config) */
  autoObservable?: boolean;
}

/**
 * Creates a View: a component that owns exactly one view model, publishes
 * it to its descendants and disposes it when it unmounts.
 *
 * @example
 * ```tsx
 * export const CounterView = createView({
 *   name: 'CounterView',
 *   create: () => new CounterViewModel(locator.get(SharedCounter)),
 *   render: (vm) => (
 *     <button onClick={vm.decrement}>{vm.number}</button>
 *   ),
 * });
 * ```
 */
export function createView<VM extends object, P extends object = {}>(definition: ViewDefinition<VM, P>) {
  const name = definition.name ?? 'View';
  const bindingOptions = {
    name,
    hookReactions: definition.hookReactions,
    autoObservable: definition.autoObservable,
  };

  // Only the render call is tracked by MobX.
  const Body = observer(function ViewBody({ vm, props }: { vm: VM; props: P }) {
    return <>{definition.render(vm, props)}</>;
  });
  Body.displayName = `${name}.render`;

  // Render may run more often than it commits; bindings that never reach
  // the mount effect are discarded after a grace period.
  function createBinding(props: P): ViewBinding<VM> {
    const binding = new ViewBinding(() => definition.create(props), bindingOptions);
    trackUncommitted(binding);
    return binding;
  }

  function BoundView(props: P) {
    const parent = useContext(ViewModelScopeContext);
    const propsRef = useRef(props);
    propsRef.current = props;

    const [binding, setBinding] = useState(() => createBinding(props));

    useEffect(() => {
      // StrictMode runs effects twice; the first cleanup already disposed this
      // view model, so bind a fresh one rather than revive it. The same goes
      // for a binding discarded while it waited for its first commit.
      if (binding.unmounted) {
        setBinding(createBinding(propsRef.current));
        return undefined;
      }
      markCommitted(binding);
      binding.mount();
      return () => binding.unmount();
    }, [binding]);

    // A new scope only when the view model (or an outer one) changes, so
    // consumers are never notified for interior mutation.
    const scope = useMemo(
      () => ViewModelScope.publish(binding.viewModel, parent, definition.provides),
      [binding, parent]
    );

    return (
      <ViewModelScopeContext.Provider value={scope}>
        <Body vm={binding.viewModel} props={props} />
      </ViewModelScopeContext.Provider>
    );
  }
  BoundView.displayName = name;

  // Skip re-renders when the parent re-renders but props haven't changed.
  return memo(BoundView);
}

/**
 * Creates a ViewFragment: a component that depends on a view model published
 * by an enclosing View but doesn't provide one.
 *
 * @example
 * ```tsx
 * const CounterLabel = createViewFragment(CounterViewModel, (vm) => <span>{vm.number}</span>);
 * ```
 */
export function createViewFragment<VM, P extends object = {}>(
  key: Key<VM>,
  render: (vm: VM, props: P) => ReactNode,
  name = `ViewFragment(${describeKey(key)})`,
) {
  const Fragment = observer(function ViewFragment(props: P) {
    const vm = useViewModel(key, `The ViewFragment "${name}"`);
    return <>{render(vm, props)}</>;
  });
  Fragment.displayName = name;
  return Fragment;
}

export interface ViewModelProviderProps<VM extends object> {
  viewModel: VM;
  provides?: Token<VM>;
  children?: ReactNode;
}

/**
 * Publishes a view model the caller owns (no lifecycle management).
 * Useful for stories, tests and view models that outlive a single view.
 */
export function ViewModelProvider<VM extends object>({ viewModel, provides, children }: ViewModelProviderProps<VM>) {
  const parent = useContext(ViewModelScopeContext);
  const scope = useMemo(() => ViewModelScope.publish(viewModel, parent, provides), [viewModel, parent, provides]);
  return <ViewModelScopeContext.Provider value={scope}>{children}</ViewModelScopeContext.Provider>;
}
