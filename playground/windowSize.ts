import { action, computed, makeObservable, observable } from 'mobx';
import { Behavior } from '../src';

/**
 * Example Behavior: tracks window size reactively.
 */
export class WindowSize extends Behavior {
  width = window.innerWidth;
  height = window.innerHeight;

  constructor(readonly breakpoint = 768) {
    super();
    makeObservable(this, {
      width: observable,
      height: observable,
      isMobile: computed,
      handleResize: action.bound,
    });
  }

  get isMobile() {
    return this.width < this.breakpoint;
  }

  handleResize() {
    this.width = window.innerWidth;
    this.height = window.innerHeight;
  }

  onMount() {
    window.addEventListener('resize', this.handleResize);
    return () => window.removeEventListener('resize', this.handleResize);
  }
}
