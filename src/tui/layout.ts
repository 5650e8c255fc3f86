export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ScreenLayout {
  /** Narrow terminals stack the panels instead of placing them side by side. */
  stacked: boolean;
  projects: Rect;
  todos: Rect | null;
  help: Rect | null;
}

export const NARROW_WIDTH = 80;
export const MEDIUM_WIDTH = 120;
export const MEDIUM_PROJECTS_WIDTH = 25;
export const MIN_TODOS_WIDTH = 10;
export const POPUP_HEIGHT = 3;

export function computeLayout(width: number, height: number): ScreenLayout {
  const help: Rect | null = height > 5 ? { x: 0, y: height - 1, width, height: 1 } : null;
  const bodyHeight = help ? height - 1 : height;

  if (width < NARROW_WIDTH) {
    const projectsHeight = Math.floor(bodyHeight * 0.4);
    const todos: Rect = { x: 0, y: projectsHeight, width, height: bodyHeight - projectsHeight };
    return {
      stacked: true,
      projects: { x: 0, y: 0, width, height: projectsHeight },
      todos: todos.width > MIN_TODOS_WIDTH ? todos : null,
      help,
    };
  }

  const projectsWidth = width < MEDIUM_WIDTH ? MEDIUM_PROJECTS_WIDTH : Math.floor(width * 0.3);
  return {
    stacked: false,
    projects: { x: 0, y: 0, width: projectsWidth, height: bodyHeight },
    todos: { x: projectsWidth, y: 0, width: width - projectsWidth, height: bodyHeight },
    help,
  };
}

/** Centered single-line input popup (bordered, so three rows tall). */
export function computePopupRect(width: number, height: number): Rect {
  const percent = width < 60 ? 90 : 60;
  const popupWidth = Math.floor((width * percent) / 100);
  return {
    x: Math.floor((width - popupWidth) / 2),
    y: Math.max(0, Math.floor((height - POPUP_HEIGHT) / 2)),
    width: popupWidth,
    height: Math.min(POPUP_HEIGHT, height),
  };
}
