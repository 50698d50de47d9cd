import { useEffect, type ReactNode } from 'react';
import { action, computed, makeObservable, observable, type IReactionDisposer } from 'mobx';
import { observer } from 'mobx-react-lite';
import { Behavior } from './behavior';
import { RequestChannel } from './channel';
import { reportError } from './config';
import { LifecycleError } from './errors';

/** Why a notification went away */
export type NotificationCloseReason = 'action' | 'dismiss' | 'hide' | 'remove' | 'timeout';

export interface NotificationOptions {
  actionLabel?: string;
  action?: () => void;
  onVisible?: () => void;
  onClosed?: (reason: NotificationCloseReason) => void;
}

export class Notification {
  readonly message: string;
  readonly actionLabel: string;
  readonly action?: () => void;
  readonly onVisible?: () => void;
  readonly onClosed?: (reason: NotificationCloseReason) => void;

  visible = false;
  closeReason: NotificationCloseReason | undefined = undefined;

  private readonly closedListeners: Array<() => void> = [];

  constructor(message: string, options: NotificationOptions = {}) {
    this.message = message;
    this.actionLabel = options.actionLabel ?? '';
    this.action = options.action;
    this.onVisible = options.onVisible;
    this.onClosed = options.onClosed;

    makeObservable(this, {
      visible: observable,
      closeReason: observable,
      closed: computed,
      markVisible: action,
      close: action,
    });
  }

  get closed(): boolean {
    return this.closeReason !== undefined;
  }

  /** Fires `onVisible` the first time the notification is shown. */
  markVisible(): boolean {
    if (this.visible || this.closed) return false;
    this.visible = true;
    this.onVisible?.();
    return true;
  }

  /** Fires `onClosed` once; later calls are ignored. */
  close(reason: NotificationCloseReason): boolean {
    if (this.closed) return false;
    this.closeReason = reason;
    this.onClosed?.(reason);
    for (const listener of this.closedListeners.splice(0)) {
      listener();
    }
    return true;
  }

  triggerAction(): void {
    if (this.closed) return;
    this.action?.();
    this.close('action');
  }

  /** @internal */
  _whenClosed(listener: () => void): void {
    this.closedListeners.push(listener);
  }
}

/**
 * Lets a view model show notifications to the user.
 *
 * @example
 * ```ts
 * class InboxViewModel extends ViewModel {
 *   notifications = new NotificationMediator();
 *
 *   async archive(mail: Mail) {
 *     await this.mails.delete(mail);
 *     this.notifications.notifyUser('Archived', {
 *       actionLabel: 'Undo',
 *       action: () => void this.mails.create(mail),
 *     });
 *   }
 * }
 * ```
 *
 * Show them with `<NotificationOutlet mediator={vm.notifications} />`, or
 * hand them to your own toaster with {@link reactToNotifications}.
 */
export class NotificationMediator extends Behavior {
  readonly requests = new RequestChannel<Notification>('notifications');

  constructor() {
    super();
    makeObservable(this, {
      current: computed,
      notifyUser: action,
      hideCurrent: action,
      close: action,
    });
  }

  get current(): Notification | undefined {
    return this.requests.head;
  }

  /** Requests the view to display a notification. */
  notifyUser(message: string, options: NotificationOptions = {}): Notification {
    const hasLabel = (options.actionLabel ?? '') !== '';
    if (options.action && !hasLabel) {
      throw new LifecycleError('An "action" is defined but no "actionLabel" was provided.');
    }
    if (!options.action && hasLabel) {
      throw new LifecycleError('An "actionLabel" is defined but no "action" was provided.');
    }

    const notification = new Notification(message, options);
    this.requests.push(notification);
    notification._whenClosed(() => {
      this.requests.remove(notification);
    });
    return notification;
  }

  /** Closes the notification on display, if any, with reason `hide`. */
  hideCurrent(): void {
    this.current?.close('hide');
  }

  /** Closes the channel; queued notifications close with reason `remove`. */
  close(): void {
    const queued = this.requests.items;
    this.requests.close();
    for (const notification of queued) {
      notification.close('remove');
    }
  }

  onUnmount(): void {
    this.close();
  }
}

/**
 * Hands every notification of `mediator`, oldest first, to `handler`.
 * The handler owns them from then on: it should call `markVisible()` and
 * `close()` as its UI shows and hides them.
 */
export function reactToNotifications(
  mediator: NotificationMediator,
  handler: (notification: Notification) => void,
): IReactionDisposer {
  return mediator.requests.subscribe((notification) => {
    try {
      handler(notification);
    } catch (e) {
      reportError(e, { phase: 'notification', name: 'reactToNotifications', isBehavior: false });
    }
  });
}

export interface NotificationOutletProps {
  mediator: NotificationMediator;
  /** Milliseconds until a notification closes with `timeout`; `null` keeps it open (default: 4000) */
  duration?: number | null;
  /** Override to build a custom notification bar. */
  render?: (notification: Notification) => ReactNode;
}

/**
 * Shows the mediator's notifications one at a time.
 */
export const NotificationOutlet = observer(function NotificationOutlet({
  mediator,
  duration = 4000,
  render,
}: NotificationOutletProps) {
  const notification = mediator.current;

  useEffect(() => {
    if (!notification) return undefined;
    notification.markVisible();
    if (duration === null) return undefined;
    const timer = setTimeout(() => notification.close('timeout'), duration);
    return () => clearTimeout(timer);
  }, [notification, duration]);

  if (!notification) return null;
  return <>{render ? render(notification) : <DefaultNotificationBar notification={notification} />}</>;
});

export function DefaultNotificationBar({ notification }: { notification: Notification }) {
  return (
    <div role="status" className="mvvm-notification">
      <span className="mvvm-notification-message">{notification.message}</span>
      {notification.action && (
        <button type="button" onClick={() => notification.triggerAction()}>
          {notification.actionLabel}
        </button>
      )}
      <button type="button" aria-label="Close" onClick={() => notification.close('dismiss')}>
        ×
      </button>
    </div>
  );
}
