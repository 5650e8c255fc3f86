import type { Todo } from './types.js';

export function isWorking(todo: Todo): boolean {
  return todo.timer.kind === 'running';
}

/**
 * Open a session at `now`. A session that is already open is replaced
 * without crediting its elapsed time.
 */
export function startWork(todo: Todo, now: number): Todo {
  return { ...todo, timer: { kind: 'running', since: now } };
}

export function endWork(todo: Todo, now: number): Todo {
  if (todo.timer.kind !== 'running') return todo;

  const since = todo.timer.since;
  // A clock that stepped backwards must not shrink the total.
  const elapsed = Math.max(0, now - since);
  return {
    ...todo,
    totalDuration: todo.totalDuration + elapsed,
    timer: { kind: 'idle', lastSession: { start: since, end: now } },
  };
}

export function toggleWork(todo: Todo, now: number): Todo {
  return isWorking(todo) ? endWork(todo, now) : startWork(todo, now);
}

/**
 * Flip `completed`. Completing a todo whose timer is running closes the
 * session first.
 */
export function toggleTodoCompleted(todo: Todo, now: number): Todo {
  const stopped = isWorking(todo) && !todo.completed ? endWork(todo, now) : todo;
  return { ...stopped, completed: !stopped.completed };
}
