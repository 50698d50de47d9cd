import { describe, it, expect, vi, afterEach } from 'vitest';
import { act } from 'react';
import {
  LifecycleError,
  Notification,
  NotificationMediator,
  NotificationOutlet,
  reactToNotifications,
  type NotificationCloseReason,
} from '../src';
import { button, click, render } from './render';

afterEach(() => {
  vi.useRealTimers();
});

describe('Notification', () => {
  it('fires onVisible and onClosed once each', () => {
    const onVisible = vi.fn();
    const onClosed = vi.fn<[NotificationCloseReason], void>();
    const notification = new Notification('Saved', { onVisible, onClosed });

    expect(notification.markVisible()).toBe(true);
    expect(notification.markVisible()).toBe(false);
    expect(notification.close('dismiss')).toBe(true);
    expect(notification.close('timeout')).toBe(false);

    expect(onVisible).toHaveBeenCalledTimes(1);
    expect(onClosed.mock.calls).toEqual([['dismiss']]);
    expect(notification.closeReason).toBe('dismiss');
  });

  it('runs the action and closes with reason "action"', () => {
    const action = vi.fn();
    const onClosed = vi.fn<[NotificationCloseReason], void>();
    const notification = new Notification('Archived', { actionLabel: 'Undo', action, onClosed });

    notification.triggerAction();
    notification.triggerAction();

    expect(action).toHaveBeenCalledTimes(1);
    expect(onClosed.mock.calls).toEqual([['action']]);
  });
});

describe('NotificationMediator', () => {
  it('requires action and actionLabel together', () => {
    const mediator = new NotificationMediator();

    expect(() => mediator.notifyUser('x', { action: () => undefined })).toThrow(
      '[mobx-mvvm] An "action" is defined but no "actionLabel" was provided.'
    );
    expect(() => mediator.notifyUser('x', { actionLabel: 'Undo' })).toThrow(LifecycleError);
    expect(mediator.requests.size).toBe(0);
  });

  it('queues notifications in order and drops closed ones', () => {
    const mediator = new NotificationMediator();
    const first = mediator.notifyUser('one');
    mediator.notifyUser('two');

    expect(mediator.current).toBe(first);
    first.close('dismiss');
    expect(mediator.current?.message).toBe('two');
  });

  it('hides the current notification', () => {
    const mediator = new NotificationMediator();
    const onClosed = vi.fn<[NotificationCloseReason], void>();
    mediator.notifyUser('one', { onClosed });

    mediator.hideCurrent();

    expect(onClosed).toHaveBeenCalledWith('hide');
    expect(mediator.current).toBeUndefined();
  });

  it('closes queued notifications with reason "remove" when closed', () => {
    const mediator = new NotificationMediator();
    const onClosed = vi.fn<[NotificationCloseReason], void>();
    mediator.notifyUser('one', { onClosed });
    mediator.notifyUser('two', { onClosed });

    mediator.onUnmount();

    expect(onClosed.mock.calls).toEqual([['remove'], ['remove']]);
    expect(mediator.requests.closed).toBe(true);
  });
});

describe('reactToNotifications', () => {
  it('hands over every notification, oldest first', () => {
    const mediator = new NotificationMediator();
    mediator.notifyUser('queued early');
    const seen: string[] = [];

    const dispose = reactToNotifications(mediator, (n) => seen.push(n.message));
    mediator.notifyUser('later');
    dispose();
    mediator.notifyUser('after dispose');

    expect(seen).toEqual(['queued early', 'later']);
  });
});

describe('NotificationOutlet', () => {
  it('shows one notification at a time and closes it on timeout', () => {
    vi.useFakeTimers();
    const mediator = new NotificationMediator();
    const onVisible = vi.fn();
    const onClosed = vi.fn<[NotificationCloseReason], void>();
    mediator.notifyUser('first', { onVisible, onClosed });
    mediator.notifyUser('second');

    const { container } = render(<NotificationOutlet mediator={mediator} duration={1000} />);
    expect(container.querySelector('[role="status"] span')?.textContent).toBe('first');
    expect(onVisible).toHaveBeenCalledTimes(1);

    act(() => {
      vi.advanceTimersByTime(1000);
    });

    expect(onClosed).toHaveBeenCalledWith('timeout');
    expect(container.querySelector('[role="status"] span')?.textContent).toBe('second');
  });

  it('runs the action from its button', () => {
    const mediator = new NotificationMediator();
    const action = vi.fn();
    mediator.notifyUser('Archived', { actionLabel: 'Undo', action });

    const { container } = render(<NotificationOutlet mediator={mediator} duration={null} />);
    click(button(container, 'Undo'));

    expect(action).toHaveBeenCalledTimes(1);
    expect(container.querySelector('[role="status"]')).toBeNull();
  });

  it('dismisses from the close button', () => {
    const mediator = new NotificationMediator();
    const onClosed = vi.fn<[NotificationCloseReason], void>();
    mediator.notifyUser('Saved', { onClosed });

    const { container } = render(<NotificationOutlet mediator={mediator} />);
    click(button(container, 'Close'));

    expect(onClosed).toHaveBeenCalledWith('dismiss');
    expect(container.innerHTML).toBe('');
  });

  it('uses a custom renderer', () => {
    const mediator = new NotificationMediator();
    mediator.notifyUser('Custom');

    const { container } = render(
      <NotificationOutlet mediator={mediator} render={(n) => <em>{n.message.toUpperCase()}</em>} />
    );

    expect(container.innerHTML).toBe('<em>CUSTOM</em>');
  });
});
