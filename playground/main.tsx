import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { configure, locator } from '../src';
import { MainView, SharedCounter } from './Counter';
import { Todo, TodoRepository } from './Todo';

configure({
  onError: (error, { phase, name }) => console.error(`[playground] ${name}.${phase}() failed`, error),
});

locator.registerLazySingleton(SharedCounter, () => new SharedCounter());
locator.registerSingleton(
  TodoRepository,
  new TodoRepository([
    { id: 1, text: 'Learn mobx-mvvm', done: false },
    { id: 2, text: 'Build something great', done: false },
  ])
);

function App() {
  return (
    <div className="app">
      <h1>mobx-mvvm playground</h1>
      <MainView />
      <Todo title="My Tasks" onCountChange={(count) => console.log(`Completed: ${count}`)} />
    </div>
  );
}

const container = document.getElementById('root');
if (container) {
  createRoot(container).render(
    <StrictMode>
      <App />
    </StrictMode>
  );
}
