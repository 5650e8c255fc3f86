import type { Project } from '../model/types.js';
import {
  addProject,
  addTodo,
  getTodo,
  removeProject,
  removeTodo,
  renameProject,
  renameTodo,
  updateTodo,
} from '../model/projects.js';
import { toggleTodoCompleted, toggleWork } from '../model/timer.js';
import { resolveEntryCommand, resolveNormalCommand } from './key-policy.js';
import {
  currentProject,
  ensurePanelSelection,
  initialSelection,
  moveProject,
  moveTodo,
  normalizeSelection,
  reindexAfterDelete,
  selectProject,
  selectTodo,
  type Panel,
  type Selection,
} from './selection.js';
import { applyTextInputKey, createTextInput, type TextInputState } from './text-input.js';

export type InputMode = 'normal' | 'addingProject' | 'addingTodo' | 'renamingProject' | 'renamingTodo';

export interface AppState {
  projects: Project[];
  selection: Selection;
  panel: Panel;
  mode: InputMode;
  /** Text buffer; only meaningful outside normal mode. */
  input: TextInputState;
}

/**
 * What the caller must do after a key: nothing, write the data, or write the
 * data and exit.
 */
export type KeyEffect = 'none' | 'persist' | 'quit';

export interface KeyOutcome {
  state: AppState;
  effect: KeyEffect;
}

export function createAppState(projects: Project[]): AppState {
  return {
    projects,
    selection: initialSelection(projects),
    panel: 'projects',
    mode: 'normal',
    input: createTextInput(''),
  };
}

function unchanged(state: AppState): KeyOutcome {
  return { state, effect: 'none' };
}

function persisted(state: AppState): KeyOutcome {
  return { state, effect: 'persist' };
}

function backToNormal(state: AppState): AppState {
  return { ...state, mode: 'normal', input: createTextInput('') };
}

function currentTodoCount(state: AppState): number {
  return currentProject(state.selection, state.projects)?.todos.length ?? 0;
}

function switchPanel(state: AppState): AppState {
  const panel: Panel = state.panel === 'projects' ? 'todos' : 'projects';
  return { ...state, panel, selection: ensurePanelSelection(state.selection, panel, state.projects) };
}

function move(state: AppState, direction: 'next' | 'previous'): AppState {
  const selection =
    state.panel === 'projects'
      ? moveProject(state.selection, direction, state.projects)
      : moveTodo(state.selection, direction, currentTodoCount(state));
  return { ...state, selection };
}

function toggleComplete(state: AppState, now: number): KeyOutcome {
  const { project, todo } = state.selection;
  if (state.panel !== 'todos' || project === null || todo === null) return unchanged(state);
  if (!getTodo(state.projects, project, todo)) return unchanged(state);
  return persisted({
    ...state,
    projects: updateTodo(state.projects, project, todo, (t) => toggleTodoCompleted(t, now)),
  });
}

function toggleTimer(state: AppState, now: number): KeyOutcome {
  const { project, todo } = state.selection;
  if (state.panel !== 'todos' || project === null || todo === null) return unchanged(state);
  if (!getTodo(state.projects, project, todo)) return unchanged(state);
  return persisted({
    ...state,
    projects: updateTodo(state.projects, project, todo, (t) => toggleWork(t, now)),
  });
}

function beginAdd(state: AppState): AppState {
  return {
    ...state,
    mode: state.panel === 'projects' ? 'addingProject' : 'addingTodo',
    input: createTextInput(''),
  };
}

function beginRename(state: AppState): AppState {
  if (state.panel === 'projects') {
    const project = currentProject(state.selection, state.projects);
    if (!project) return state;
    return { ...state, mode: 'renamingProject', input: createTextInput(project.name) };
  }

  const todo = getTodo(state.projects, state.selection.project, state.selection.todo);
  if (!todo) return state;
  return { ...state, mode: 'renamingTodo', input: createTextInput(todo.title) };
}

function deleteSelected(state: AppState): KeyOutcome {
  const { project, todo } = state.selection;

  if (state.panel === 'projects') {
    if (project === null || project >= state.projects.length) return unchanged(state);
    const projects = removeProject(state.projects, project);
    const next = selectProject(state.selection, reindexAfterDelete(project, projects.length));
    // The todo index now belongs to whichever project moved into this slot.
    const selection = normalizeSelection(selectTodo(next, 0), projects);
    return persisted({ ...state, projects, selection });
  }

  if (project === null || todo === null) return unchanged(state);
  if (!getTodo(state.projects, project, todo)) return unchanged(state);
  const projects = removeTodo(state.projects, project, todo);
  const remaining = projects[project]?.todos.length ?? 0;
  return persisted({
    ...state,
    projects,
    selection: selectTodo(state.selection, reindexAfterDelete(todo, remaining)),
  });
}

function handleNormalKey(state: AppState, name: string, now: number): KeyOutcome {
  switch (resolveNormalCommand(name)) {
    case 'quit':
      return { state, effect: 'quit' };
    case 'save':
      return persisted(state);
    case 'switchPanel':
      return unchanged(switchPanel(state));
    case 'down':
      return unchanged(move(state, 'next'));
    case 'up':
      return unchanged(move(state, 'previous'));
    case 'toggleComplete':
      return toggleComplete(state, now);
    case 'add':
      return unchanged(beginAdd(state));
    case 'toggleTimer':
      return toggleTimer(state, now);
    case 'rename':
      return unchanged(beginRename(state));
    case 'delete':
      return deleteSelected(state);
    case null:
      return unchanged(state);
  }
}

function commitEntry(state: AppState): KeyOutcome {
  const text = state.input.value;
  const done = backToNormal(state);
  if (text.length === 0) return unchanged(done);

  const { project, todo } = state.selection;

  switch (state.mode) {
    case 'addingProject': {
      const projects = addProject(state.projects, text);
      return persisted({ ...done, projects, selection: { project: projects.length - 1, todo: null } });
    }
    case 'addingTodo': {
      if (project === null || !state.projects[project]) return unchanged(done);
      const projects = addTodo(state.projects, project, text);
      const count = projects[project]?.todos.length ?? 0;
      return persisted({ ...done, projects, selection: selectTodo(state.selection, count - 1) });
    }
    case 'renamingProject': {
      if (project === null || !state.projects[project]) return unchanged(done);
      return persisted({ ...done, projects: renameProject(state.projects, project, text) });
    }
    case 'renamingTodo': {
      if (project === null || todo === null || !getTodo(state.projects, project, todo)) return unchanged(done);
      return persisted({ ...done, projects: renameTodo(state.projects, project, todo, text) });
    }
    case 'normal':
      return unchanged(done);
  }
}

function handleEntryKey(state: AppState, name: string): KeyOutcome {
  const command = resolveEntryCommand(name);
  if (command === 'cancel') return unchanged(backToNormal(state));
  if (command === 'commit') return commitEntry(state);

  const input = applyTextInputKey(state.input, name);
  if (!input) return unchanged(state);
  return unchanged({ ...state, input });
}

/**
 * Advance the interactive state by one key press. `now` is the current
 * Unix-epoch second, used by the timer keys.
 */
export function handleKey(state: AppState, name: string, now: number): KeyOutcome {
  if (state.mode === 'normal') return handleNormalKey(state, name, now);
  return handleEntryKey(state, name);
}
