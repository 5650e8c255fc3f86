import type { Project, Todo } from './types.js';

export function createTodo(title: string): Todo {
  return {
    title,
    description: '',
    completed: false,
    timer: { kind: 'idle', lastSession: null },
    totalDuration: 0,
  };
}

export function createProject(name: string, todos: Todo[] = []): Project {
  return { name, todos };
}

/** Seed data used when nothing has been persisted yet. */
export function createDefaultProjects(): Project[] {
  return [
    createProject('Work', [createTodo('Finish the report')]),
    createProject('Learning', [createTodo('Learn TypeScript')]),
  ];
}

export function addProject(projects: readonly Project[], name: string): Project[] {
  return [...projects, createProject(name)];
}

export function renameProject(projects: readonly Project[], index: number, name: string): Project[] {
  return projects.map((p, i) => (i === index ? { ...p, name } : p));
}

export function removeProject(projects: readonly Project[], index: number): Project[] {
  return projects.filter((_, i) => i !== index);
}

function updateProjectTodos(
  projects: readonly Project[],
  projectIndex: number,
  update: (todos: readonly Todo[]) => Todo[]
): Project[] {
  return projects.map((p, i) => (i === projectIndex ? { ...p, todos: update(p.todos) } : p));
}

export function addTodo(projects: readonly Project[], projectIndex: number, title: string): Project[] {
  return updateProjectTodos(projects, projectIndex, (todos) => [...todos, createTodo(title)]);
}

export function updateTodo(
  projects: readonly Project[],
  projectIndex: number,
  todoIndex: number,
  update: (todo: Todo) => Todo
): Project[] {
  return updateProjectTodos(projects, projectIndex, (todos) =>
    todos.map((t, i) => (i === todoIndex ? update(t) : t))
  );
}

export function renameTodo(
  projects: readonly Project[],
  projectIndex: number,
  todoIndex: number,
  title: string
): Project[] {
  return updateTodo(projects, projectIndex, todoIndex, (t) => ({ ...t, title }));
}

export function removeTodo(projects: readonly Project[], projectIndex: number, todoIndex: number): Project[] {
  return updateProjectTodos(projects, projectIndex, (todos) => todos.filter((_, i) => i !== todoIndex));
}

export function getTodo(projects: readonly Project[], projectIndex: number | null, todoIndex: number | null): Todo | null {
  if (projectIndex === null || todoIndex === null) return null;
  return projects[projectIndex]?.todos[todoIndex] ?? null;
}
