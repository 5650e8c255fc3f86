import type { Project, Todo } from '../model/types.js';
import { formatDuration } from '../model/duration.js';
import { isWorking } from '../model/timer.js';
import { Canvas } from './canvas.js';
import { computeLayout, computePopupRect, NARROW_WIDTH, type Rect } from './layout.js';
import { fitInputField } from './input-render.js';
import { KEY_HELP } from './key-policy.js';
import { currentProject } from './selection.js';
import { textWidth, truncateByWidth } from './text-width.js';
import type { AppState, InputMode } from './state-machine.js';

export const HIGHLIGHT_SYMBOL = '>> ';
const UNSELECTED_PREFIX = '   ';

export interface Screen {
  canvas: Canvas;
  /** Where the terminal cursor belongs (0-based), when text is being entered. */
  cursor: { x: number; y: number } | null;
}

export function formatProjectLabel(project: Project, panelWidth: number): string {
  if (panelWidth < 20) return project.name;
  return `${project.name} (${project.todos.length})`;
}

export function formatTodoLabel(todo: Todo, panelWidth: number): string {
  const status = todo.completed ? '[x] ' : '[ ] ';
  const timer = isWorking(todo) ? '* ' : '';
  const time = todo.totalDuration > 0 ? ` [${formatDuration(todo.totalDuration)}]` : '';

  if (panelWidth < 30) {
    const maxLen = Math.max(0, panelWidth - 12);
    if (textWidth(todo.title) > maxLen) {
      return `${status}${timer}${truncateByWidth(todo.title, maxLen)}...`;
    }
  }
  return `${status}${timer}${todo.title}${time}`;
}

/** First row to draw so that `selected` stays within `rows` visible rows. */
export function scrollOffset(selected: number | null, rows: number): number {
  if (selected === null || rows <= 0) return 0;
  return Math.max(0, selected - rows + 1);
}

export function joinHelpChunks(chunks: readonly string[], width: number): string {
  if (width <= 0) return '';
  const sep = '  ';
  let out = '';
  let used = 0;

  for (const chunk of chunks) {
    const next = out ? `${out}${sep}${chunk}` : chunk;
    if (textWidth(next) > width) break;
    out = next;
    used++;
  }

  if (used < chunks.length && out && textWidth(out + '…') <= width) out += '…';
  return truncateByWidth(out || (chunks[0] ?? ''), width);
}

export function popupTitle(mode: InputMode): string {
  switch (mode) {
    case 'addingProject':
      return 'Add project';
    case 'addingTodo':
      return 'Add todo';
    case 'renamingProject':
      return 'Rename project';
    case 'renamingTodo':
      return 'Rename todo';
    case 'normal':
      return '';
  }
}

function drawList(
  canvas: Canvas,
  rect: Rect,
  title: string,
  active: boolean,
  labels: string[],
  selected: number | null
): void {
  canvas.box(rect, title, active ? 'accent' : 'plain');

  const inner: Rect = { x: rect.x + 1, y: rect.y + 1, width: rect.width - 2, height: rect.height - 2 };
  if (inner.width <= 0 || inner.height <= 0) return;

  const offset = scrollOffset(selected, inner.height);
  labels.slice(offset, offset + inner.height).forEach((label, row) => {
    const isSelected = offset + row === selected;
    const y = inner.y + row;
    if (isSelected) canvas.fill({ x: inner.x, y, width: inner.width, height: 1 }, 'inverse');
    const prefix = isSelected ? HIGHLIGHT_SYMBOL : UNSELECTED_PREFIX;
    canvas.write(inner.x, y, prefix + label, isSelected ? 'inverse' : 'plain', inner.width);
  });
}

function panelTitle(name: string, active: boolean, narrow: boolean): string {
  if (!narrow) return name;
  return active ? `${name} [active]` : name;
}

/** Draw the whole screen for the current state. Pure; painting is separate. */
export function buildScreen(state: AppState, width: number, height: number): Screen {
  const canvas = new Canvas(width, height);
  const layout = computeLayout(width, height);
  const narrow = width < NARROW_WIDTH;

  drawList(
    canvas,
    layout.projects,
    panelTitle('Projects', state.panel === 'projects', narrow),
    state.panel === 'projects',
    state.projects.map((p) => formatProjectLabel(p, layout.projects.width - 2)),
    state.selection.project
  );

  if (layout.todos) {
    const project = currentProject(state.selection, state.projects);
    const title = narrow
      ? panelTitle('Todos', state.panel === 'todos', true)
      : `Todos - ${project?.name ?? '(no project)'}`;
    drawList(
      canvas,
      layout.todos,
      title,
      state.panel === 'todos',
      (project?.todos ?? []).map((t) => formatTodoLabel(t, layout.todos?.width ?? 0)),
      state.selection.todo
    );
  }

  if (layout.help) {
    canvas.write(layout.help.x, layout.help.y, joinHelpChunks(KEY_HELP, layout.help.width), 'dim');
  }

  if (state.mode === 'normal') {
    return { canvas, cursor: null };
  }

  const popup = computePopupRect(width, height);
  canvas.fill(popup);
  canvas.box(popup, popupTitle(state.mode), 'bold');
  const field = fitInputField(state.input, popup.width - 2);
  canvas.write(popup.x + 1, popup.y + 1, field.text, 'plain', popup.width - 2);

  return { canvas, cursor: { x: popup.x + 1 + field.cursorCol, y: popup.y + 1 } };
}
