import type { StoredAppData, StoredTodo } from '../schema/index.js';
import type { AppData, TimerState, Todo } from '../model/types.js';

function timerFromStored(start: number | null, end: number | null): TimerState {
  if (start === null) return { kind: 'idle', lastSession: null };
  if (end === null) return { kind: 'running', since: start };
  return { kind: 'idle', lastSession: { start, end } };
}

function timerToStored(timer: TimerState): Pick<StoredTodo, 'start_time' | 'end_time'> {
  if (timer.kind === 'running') {
    return { start_time: timer.since, end_time: null };
  }
  return {
    start_time: timer.lastSession?.start ?? null,
    end_time: timer.lastSession?.end ?? null,
  };
}

export function todoFromStored(stored: StoredTodo): Todo {
  return {
    title: stored.title,
    description: stored.description,
    completed: stored.completed,
    timer: timerFromStored(stored.start_time, stored.end_time),
    totalDuration: stored.total_duration,
  };
}

export function todoToStored(todo: Todo): StoredTodo {
  return {
    title: todo.title,
    description: todo.description,
    completed: todo.completed,
    ...timerToStored(todo.timer),
    total_duration: todo.totalDuration,
  };
}

export function appDataFromStored(stored: StoredAppData): AppData {
  return {
    projects: stored.projects.map((p) => ({ name: p.name, todos: p.todos.map(todoFromStored) })),
  };
}

export function appDataToStored(data: AppData): StoredAppData {
  return {
    projects: data.projects.map((p) => ({ name: p.name, todos: p.todos.map(todoToStored) })),
  };
}
