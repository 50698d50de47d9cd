import { afterEach } from 'vitest';
import { configure, locator } from '../src';

// Lets React flush updates synchronously inside act().
Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true);

afterEach(() => {
  configure({ autoObservable: true, onError: undefined, locator });
  locator.reset();
  document.body.innerHTML = '';
});
