import { describe, it, expect, vi, afterEach } from 'vitest';
import { StrictMode, act, type ReactNode } from 'react';
import { observable, reaction } from 'mobx';
import {
  Service,
  Token,
  ViewModel,
  ViewModelNotFoundError,
  ViewModelProvider,
  createView,
  createViewFragment,
  makeModelObservable,
  useOptionalViewModel,
} from '../src';
import { CLEANUP_UNCOMMITTED_AFTER_MS } from '../src/uncommitted';
import { CatchErrors, button, click, render } from './render';

class SharedCounter extends Service {
  counter = 0;

  constructor() {
    super();
    makeModelObservable(this, Service.prototype);
  }
}

class MainViewModel extends ViewModel {
  constructor(private readonly shared: SharedCounter) {
    super();
  }

  get number() {
    return String(this.shared.counter);
  }

  decrement() {
    this.shared.counter--;
  }
}

function createMainView(shared: SharedCounter) {
  return createView({
    name: 'MainView',
    create: () => new MainViewModel(shared),
    render: (vm) => (
      <div>
        <span className="number">{vm.number}</span>
        <button type="button" onClick={vm.decrement}>
          Decrement
        </button>
      </div>
    ),
  });
}

class ThemeViewModel extends ViewModel {
  constructor(readonly color: string) {
    super();
  }
}

interface ThemeProps {
  color: string;
  children?: ReactNode;
}

const ThemeView = createView<ThemeViewModel, ThemeProps>({
  name: 'ThemeView',
  create: (props) => new ThemeViewModel(props.color),
  render: (_vm, props) => <>{props.children}</>,
});

const Swatch = createViewFragment(ThemeViewModel, (vm) => <i>{vm.color}</i>);

afterEach(() => {
  vi.useRealTimers();
});

describe('createView', () => {
  it('re-renders when an action changes observed state', () => {
    const shared = new SharedCounter();
    const MainView = createMainView(shared);
    const { container } = render(<MainView />);

    click(button(container, 'Decrement'));
    click(button(container, 'Decrement'));

    expect(container.querySelector('.number')?.textContent).toBe('-2');
  });

  it('keeps every view bound to shared service state in sync', () => {
    const shared = new SharedCounter();
    const First = createMainView(shared);
    const Second = createMainView(shared);
    const { container } = render(
      <>
        <First />
        <Second />
      </>
    );

    click(button(container, 'Decrement'));

    const numbers = [...container.querySelectorAll('.number')].map((n) => n.textContent);
    expect(numbers).toEqual(['-1', '-1']);
  });

  it('disposes the view model on unmount, after its reactions', () => {
    const calls: string[] = [];
    const shared = new SharedCounter();
    let created: MainViewModel | undefined;

    const View = createView({
      name: 'Tracked',
      create: () => {
        created = new MainViewModel(shared);
        created.disposeWith(() => calls.push('dispose'));
        return created;
      },
      hookReactions: (vm) => [
        reaction(
          () => vm.number,
          (n) => calls.push(`number ${n}`)
        ),
        () => calls.push('reaction disposed'),
      ],
      render: (vm) => (
        <button type="button" onClick={vm.decrement}>
          Decrement
        </button>
      ),
    });

    const { container, unmount } = render(<View />);
    click(button(container, 'Decrement'));
    click(button(container, 'Decrement'));
    unmount();

    expect(calls).toEqual(['number -1', 'number -2', 'reaction disposed', 'dispose']);
    expect(created?.disposed).toBe(true);
    // Committed state stays readable after disposal.
    expect(created?.number).toBe('-2');
  });

  it('passes props to create and render, and re-renders on prop changes', () => {
    const create = vi.fn((props: { greeting: string }) => new ThemeViewModel(props.greeting));
    const View = createView({
      create,
      render: (vm: ThemeViewModel, props: { greeting: string }) => (
        <p>
          {vm.color} / {props.greeting}
        </p>
      ),
    });

    const { container, rerender } = render(<View greeting="hello" />);
    rerender(<View greeting="bye" />);

    expect(container.textContent).toBe('hello / bye');
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('binds a fresh view model when StrictMode remounts the view', () => {
    vi.useFakeTimers();
    const instances: MainViewModel[] = [];
    const shared = new SharedCounter();
    const View = createView({
      name: 'Strict',
      create: () => {
        const vm = new MainViewModel(shared);
        instances.push(vm);
        return vm;
      },
      render: (vm) => (
        <button type="button" onClick={vm.decrement}>
          {vm.disposed ? 'disposed' : vm.number}
        </button>
      ),
    });

    const { container, unmount } = render(
      <StrictMode>
        <View />
      </StrictMode>
    );

    const live = instances.filter((vm) => vm.mounted);
    expect(live).toHaveLength(1);
    expect(container.textContent).toBe('0');

    unmount();
    expect(live[0].disposed).toBe(true);

    // View models from renders that never committed go after a grace period.
    act(() => {
      vi.advanceTimersByTime(CLEANUP_UNCOMMITTED_AFTER_MS);
    });
    expect(instances.length).toBeGreaterThan(1);
    expect(instances.filter((vm) => !vm.disposed)).toEqual([]);
  });

  it('keeps a committed view model when the grace period passes', () => {
    vi.useFakeTimers();
    const instances: MainViewModel[] = [];
    const shared = new SharedCounter();
    const View = createView({
      name: 'Slow',
      create: () => {
        const vm = new MainViewModel(shared);
        instances.push(vm);
        return vm;
      },
      render: (vm) => <span>{vm.number}</span>,
    });

    const { container, unmount } = render(<View />);
    act(() => {
      vi.advanceTimersByTime(CLEANUP_UNCOMMITTED_AFTER_MS);
    });

    expect(instances).toHaveLength(1);
    expect(instances[0].mounted).toBe(true);
    expect(container.textContent).toBe('0');
    unmount();
    expect(instances[0].disposed).toBe(true);
  });
});

describe('scoped lookup', () => {
  it('resolves the nearest enclosing view model of the requested type', () => {
    const { container } = render(
      <ThemeView color="red">
        <Swatch />
        <ThemeView color="blue">
          <Swatch />
        </ThemeView>
      </ThemeView>
    );

    expect(container.textContent).toBe('redblue');
  });

  it('fails loudly when no enclosing view publishes the type', () => {
    const errors: unknown[] = [];
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    render(
      <CatchErrors onError={(e) => errors.push(e)}>
        <Swatch />
      </CatchErrors>
    );

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ViewModelNotFoundError);
    expect(String(errors[0])).toContain(
      'The ViewFragment "ViewFragment(ThemeViewModel)" cannot find "ThemeViewModel" in the current context.'
    );
    vi.restoreAllMocks();
  });

  it('finds plain-object view models through a token', () => {
    interface Greeting {
      text: string;
    }
    const GreetingToken = new Token<Greeting>('Greeting');

    const GreetingView = createView<Greeting, { children?: ReactNode }>({
      create: () => observable({ text: 'hi' }),
      provides: GreetingToken,
      render: (_vm, props) => <>{props.children}</>,
    });
    const Text = createViewFragment(GreetingToken, (vm) => <b>{vm.text}</b>);

    const { container } = render(
      <GreetingView>
        <ThemeView color="green">
          <Text />
        </ThemeView>
      </GreetingView>
    );

    expect(container.textContent).toBe('hi');
  });

  it('returns undefined from useOptionalViewModel outside any view', () => {
    let found: ThemeViewModel | undefined = new ThemeViewModel('unset');
    function Lookup() {
      found = useOptionalViewModel(ThemeViewModel);
      return null;
    }

    render(<Lookup />);

    expect(found).toBeUndefined();
  });

  it('publishes a caller-owned view model with ViewModelProvider', () => {
    const vm = new ThemeViewModel('teal');
    const { container, unmount } = render(
      <ViewModelProvider viewModel={vm}>
        <Swatch />
      </ViewModelProvider>
    );

    expect(container.textContent).toBe('teal');
    unmount();
    expect(vm.disposed).toBe(false);
  });
});
