import type { ReactNode } from 'react';
import { action, computed, makeObservable, observable, type IReactionDisposer } from 'mobx';
import { observer } from 'mobx-react-lite';
import { Behavior } from './behavior';
import { RequestChannel } from './channel';
import { reportError } from './config';
import { ChannelClosedError, LifecycleError } from './errors';

export type PromptStatus = 'idle' | 'requested' | 'resolved';

export interface PromptOptions<R> {
  message: string;
  /** Label → value, in display order */
  choices: Record<string, R>;
  title?: string;
  /** Whether the user may close the prompt without choosing (default: false) */
  isDismissible?: boolean;
}

interface Completer<R> {
  complete(value: R | undefined): void;
}

/**
 * A pending question for the user. Extend it to carry extra data and
 * branch on the subclass in your prompt renderer.
 *
 * The response resolves once. Later `respond()` / `dismiss()` calls are
 * ignored and return false.
 */
export class Prompt<R> {
  readonly title?: string;
  readonly message: string;
  readonly isDismissible: boolean;
  readonly choices: ReadonlyMap<string, R>;

  /** The response may be `undefined` if the prompt is dismissible. */
  readonly response: Promise<R | undefined>;

  status: PromptStatus = 'idle';

  private readonly completer: Completer<R>;
  private readonly resolvedListeners: Array<() => void> = [];

  constructor(options: PromptOptions<R>) {
    this.title = options.title;
    this.message = options.message;
    this.isDismissible = options.isDismissible ?? false;
    this.choices = new Map(Object.entries(options.choices));

    let complete: (value: R | undefined) => void = () => undefined;
    this.response = new Promise<R | undefined>((resolve) => {
      complete = resolve;
    });
    this.completer = { complete };

    makeObservable<Prompt<R>, 'settle'>(this, {
      status: observable,
      settle: action,
      _markRequested: action,
    });
  }

  get resolved(): boolean {
    return this.status === 'resolved';
  }

  respond(value: R): boolean {
    return this.settle(value);
  }

  /** Closes the prompt without a choice. Only dismissible prompts may be dismissed. */
  dismiss(): boolean {
    if (!this.isDismissible) {
      throw new LifecycleError(`The prompt "${this.message}" is not dismissible.`);
    }
    return this.settle(undefined);
  }

  /** @internal */
  _markRequested(): void {
    if (this.status !== 'idle') {
      throw new LifecycleError(`The prompt "${this.message}" was already requested.`);
    }
    this.status = 'requested';
  }

  /** @internal */
  _whenResolved(listener: () => void): void {
    this.resolvedListeners.push(listener);
  }

  private settle(value: R | undefined): boolean {
    if (this.status === 'resolved') return false;
    this.status = 'resolved';
    this.completer.complete(value);
    for (const listener of this.resolvedListeners.splice(0)) {
      listener();
    }
    return true;
  }
}

/**
 * Lets a view model ask the user for input and await the answer.
 *
 * @example
 * ```ts
 * class EditorViewModel extends ViewModel {
 *   prompts = new PromptMediator();
 *
 *   async close() {
 *     const save = await this.prompts.promptUserInput({
 *       message: 'Save changes?',
 *       choices: { Yes: true, No: false },
 *     });
 *     if (save) await this.save();
 *   }
 * }
 * ```
 *
 * Render its prompts with `<PromptOutlet mediator={vm.prompts} />`, or
 * handle them imperatively with {@link reactToPrompts} in `hookReactions`.
 */
export class PromptMediator extends Behavior {
  /** Prompts waiting to be shown, oldest first */
  readonly requests = new RequestChannel<Prompt<unknown>>('prompts');

  private readonly unresolved = observable.array<Prompt<unknown>>([], { deep: false });

  constructor() {
    super();
    makeObservable(this, {
      current: computed,
      pending: computed,
      promptUserInput: action,
    });
  }

  /** The prompt a view should show now */
  get current(): Prompt<unknown> | undefined {
    return this.requests.head;
  }

  /**
   * Every requested prompt that has no response yet, including those a
   * handler already took off the queue. Prompts outstanding when the
   * mediator closes stay here, unresolved.
   */
  get pending(): readonly Prompt<unknown>[] {
    return this.unresolved.slice();
  }

  /**
   * Requests input from the view.
   *
   * Returns the response. This is the same as the `Prompt.response` property.
   */
  promptUserInput<R>(request: Prompt<R> | PromptOptions<R>): Promise<R | undefined> {
    const prompt = request instanceof Prompt ? request : new Prompt(request);
    if (this.requests.closed) throw new ChannelClosedError(this.requests.name);
    prompt._markRequested();
    prompt._whenResolved(
      action(() => {
        this.requests.remove(prompt);
        this.unresolved.remove(prompt);
      })
    );
    this.unresolved.push(prompt);
    this.requests.push(prompt);
    return prompt.response;
  }

  close(): void {
    this.requests.close();
  }

  onUnmount(): void {
    this.close();
  }
}

/**
 * Hands each prompt of `mediator` to `handler` and responds with what it
 * returns. `undefined` dismisses a dismissible prompt and leaves any other
 * pending, for the handler to `respond()` to later. A handler that throws
 * or rejects is reported and leaves its prompt pending.
 *
 * Returns the reaction disposer, ready to `yield` from `hookReactions`.
 */
export function reactToPrompts(
  mediator: PromptMediator,
  handler: (prompt: Prompt<unknown>) => unknown,
): IReactionDisposer {
  const fail = (e: unknown) => reportError(e, { phase: 'prompt', name: 'reactToPrompts', isBehavior: false });

  return mediator.requests.subscribe((prompt) => {
    const answer = (value: unknown) => {
      if (prompt.resolved) return;
      if (value !== undefined) {
        prompt.respond(value);
      } else if (prompt.isDismissible) {
        prompt.dismiss();
      }
      // A non-dismissible prompt stays pending: the handler answers it later.
    };

    try {
      const result = handler(prompt);
      if (result instanceof Promise) {
        void result.then(answer, fail);
      } else {
        answer(result);
      }
    } catch (e) {
      fail(e);
    }
  });
}

export interface PromptOutletProps {
  mediator: PromptMediator;
  /** Override to build a custom prompt dialog. */
  render?: (prompt: Prompt<unknown>) => ReactNode;
}

/**
 * Renders the mediator's current prompt, one at a time.
 */
export const PromptOutlet = observer(function PromptOutlet({ mediator, render }: PromptOutletProps) {
  const prompt = mediator.current;
  if (!prompt) return null;
  return <>{render ? render(prompt) : <DefaultPromptDialog prompt={prompt} />}</>;
});

export function DefaultPromptDialog({ prompt }: { prompt: Prompt<unknown> }) {
  return (
    <div role="dialog" aria-modal="true" aria-label={prompt.title ?? prompt.message} className="mvvm-prompt">
      {prompt.title !== undefined && <h2 className="mvvm-prompt-title">{prompt.title}</h2>}
      <p className="mvvm-prompt-message">{prompt.message}</p>
      <div className="mvvm-prompt-actions">
        {[...prompt.choices].map(([label, value]) => (
          <button key={label} type="button" onClick={() => prompt.respond(value)}>
            {label}
          </button>
        ))}
        {prompt.isDismissible && (
          <button type="button" onClick={() => prompt.dismiss()}>
            Dismiss
          </button>
        )}
      </div>
    </div>
  );
}
