import { reaction } from 'mobx';
import {
  MemoryRepository,
  NotificationMediator,
  NotificationOutlet,
  PromptMediator,
  PromptOutlet,
  ViewModel,
  createView,
} from '../src';
import { WindowSize } from './windowSize';

export interface TodoItem {
  id: number;
  text: string;
  done: boolean;
}

export class TodoRepository extends MemoryRepository<TodoItem, number> {
  constructor(initial: TodoItem[] = []) {
    super((todo) => todo.id, initial);
  }
}

interface TodoProps {
  title: string;
  onCountChange?: (count: number) => void;
}

class TodoViewModel extends ViewModel {
  todos: TodoItem[] = [];
  input = '';
  windowSize = new WindowSize(768);
  prompts = new PromptMediator();
  notifications = new NotificationMediator();

  private readonly repository = this.getRepository(TodoRepository);

  constructor(readonly onCountChange?: (count: number) => void) {
    super();
  }

  get completedCount() {
    return this.todos.filter((t) => t.done).length;
  }

  async init() {
    const todos: TodoItem[] = [];
    for await (const todo of this.repository.readAll()) {
      todos.push(todo);
    }
    this.setTodos(todos);
  }

  setTodos(todos: TodoItem[]) {
    this.todos = todos;
  }

  setInput(value: string) {
    this.input = value;
  }

  async add() {
    const text = this.input.trim();
    if (!text) return;
    this.setInput('');
    await this.repository.create({ id: Date.now(), text, done: false });
    await this.init();
  }

  async toggle(todo: TodoItem) {
    await this.repository.update({ ...todo, done: !todo.done });
    await this.init();
  }

  async remove(todo: TodoItem) {
    const confirmed = await this.prompts.promptUserInput({
      title: 'Delete todo',
      message: `Delete "${todo.text}"?`,
      choices: { Delete: true, Keep: false },
      isDismissible: true,
    });
    if (!confirmed || this.disposed) return;

    await this.repository.delete(todo);
    await this.init();
    this.notifications.notifyUser(`Deleted "${todo.text}"`, {
      actionLabel: 'Undo',
      action: () => void this.restore(todo),
    });
  }

  async restore(todo: TodoItem) {
    await this.repository.create(todo);
    await this.init();
  }
}

export const Todo = createView({
  name: 'Todo',
  create: (props: TodoProps) => new TodoViewModel(props.onCountChange),
  *hookReactions(vm) {
    yield reaction(
      () => vm.completedCount,
      (count) => vm.onCountChange?.(count)
    );
  },
  render: (vm, props) => (
    <div className="todo-container">
      <h2>{props.title}</h2>
      <form
        onSubmit={(e) => {
          e.preventDefault();
          void vm.add();
        }}
      >
        <input value={vm.input} onChange={(e) => vm.setInput(e.target.value)} placeholder="Add a todo..." />
        <button type="submit">Add</button>
      </form>
      <ul>
        {vm.todos.map((todo) => (
          <li key={todo.id} className={todo.done ? 'done' : ''}>
            <span className="checkbox" onClick={() => void vm.toggle(todo)}>
              {todo.done ? '✓' : '○'}
            </span>
            <span className="text">{todo.text}</span>
            <button type="button" onClick={() => void vm.remove(todo)}>
              Delete
            </button>
          </li>
        ))}
      </ul>
      <p className="count">
        {vm.completedCount} of {vm.todos.length} done
      </p>
      <p className="window-size">
        {vm.windowSize.width}×{vm.windowSize.height}
        {vm.windowSize.isMobile && ' (mobile)'}
      </p>
      <PromptOutlet mediator={vm.prompts} />
      <NotificationOutlet mediator={vm.notifications} />
    </div>
  ),
});
