import type { Project } from '../model/types.js';

export type Panel = 'projects' | 'todos';
export type Direction = 'next' | 'previous';

export interface Selection {
  project: number | null;
  todo: number | null;
}

export const EMPTY_SELECTION: Selection = { project: null, todo: null };

export function selectProject(selection: Selection, index: number | null): Selection {
  return { ...selection, project: index };
}

export function selectTodo(selection: Selection, index: number | null): Selection {
  return { ...selection, todo: index };
}

function firstTodoIndex(project: Project | undefined): number | null {
  return project && project.todos.length > 0 ? 0 : null;
}

function step(current: number | null, direction: Direction, length: number): number {
  if (current === null) return 0;
  if (direction === 'next') return current >= length - 1 ? 0 : current + 1;
  return current <= 0 ? length - 1 : current - 1;
}

/**
 * Cyclic move through the projects. The todo selection follows the newly
 * selected project.
 */
export function moveProject(selection: Selection, direction: Direction, projects: readonly Project[]): Selection {
  if (projects.length === 0) return selection;
  const project = step(selection.project, direction, projects.length);
  return { project, todo: firstTodoIndex(projects[project]) };
}

export function moveTodo(selection: Selection, direction: Direction, todoCount: number): Selection {
  if (todoCount === 0) return selection;
  return { ...selection, todo: step(selection.todo, direction, todoCount) };
}

/**
 * Selection after removing `deletedIndex` from a list that now has
 * `newLength` items. The index keeps its position (so it points at the next
 * item) unless the tail was removed.
 */
export function reindexAfterDelete(deletedIndex: number, newLength: number): number | null {
  if (newLength <= 0) return null;
  if (deletedIndex >= newLength) return newLength - 1;
  return deletedIndex;
}

function clampIndex(index: number | null, length: number): number | null {
  if (length === 0) return null;
  if (index === null) return 0;
  return Math.min(Math.max(index, 0), length - 1);
}

/** Bring both indices back within the current lists. */
export function normalizeSelection(selection: Selection, projects: readonly Project[]): Selection {
  const project = clampIndex(selection.project, projects.length);
  const todos = project === null ? [] : projects[project]?.todos ?? [];
  return { project, todo: clampIndex(selection.todo, todos.length) };
}

export function initialSelection(projects: readonly Project[]): Selection {
  return normalizeSelection(EMPTY_SELECTION, projects);
}

export function currentProject(selection: Selection, projects: readonly Project[]): Project | null {
  if (selection.project === null) return null;
  return projects[selection.project] ?? null;
}

/** Default an unset selection on the panel being entered. */
export function ensurePanelSelection(selection: Selection, panel: Panel, projects: readonly Project[]): Selection {
  if (panel === 'todos') {
    const todoCount = currentProject(selection, projects)?.todos.length ?? 0;
    if (selection.todo === null && todoCount > 0) return selectTodo(selection, 0);
    return selection;
  }
  if (selection.project === null && projects.length > 0) {
    return { project: 0, todo: firstTodoIndex(projects[0]) };
  }
  return selection;
}
