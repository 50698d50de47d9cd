import { Service, ViewModel, createView, createViewFragment, locator, makeModelObservable } from '../src';

// Two views over one shared service: clicking in either updates both.

export class SharedCounter extends Service {
  counter = 0;

  constructor() {
    super();
    makeModelObservable(this, Service.prototype);
  }
}

export class MainViewModel extends ViewModel {
  constructor(private readonly shared: SharedCounter) {
    super();
  }

  get number() {
    return String(this.shared.counter);
  }

  increment() {
    this.shared.counter++;
  }

  decrement() {
    this.shared.counter--;
  }
}

class SubViewModel extends ViewModel {
  constructor(
    readonly label: string,
    private readonly shared: SharedCounter,
  ) {
    super();
  }

  get number() {
    return String(this.shared.counter);
  }

  increment() {
    this.shared.counter++;
  }
}

const CounterLabel = createViewFragment(MainViewModel, (vm) => <strong>{vm.number}</strong>, 'CounterLabel');

function createSubView(label: string) {
  return createView({
    name: `SubView${label}`,
    create: () => new SubViewModel(label, locator.get(SharedCounter)),
    render: (vm) => (
      <div className="sub-view">
        <span>
          {vm.label}: {vm.number} (main says <CounterLabel />)
        </span>
        <button type="button" onClick={vm.increment}>
          +1 from {vm.label}
        </button>
      </div>
    ),
  });
}

const SubViewA = createSubView('A');
const SubViewB = createSubView('B');

export const MainView = createView({
  name: 'MainView',
  create: () => new MainViewModel(locator.get(SharedCounter)),
  render: (vm) => (
    <section className="main-view">
      <h2>Shared counter: {vm.number}</h2>
      <button type="button" onClick={vm.decrement}>
        −1
      </button>
      <button type="button" onClick={vm.increment}>
        +1
      </button>
      <SubViewA />
      <SubViewB />
    </section>
  ),
});
