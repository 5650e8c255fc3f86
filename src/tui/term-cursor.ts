export interface CursorControl {
  hideCursor(hide?: boolean): unknown;
  moveTo(x: number, y: number): unknown;
}

export function setCursorVisible(term: CursorControl, visible: boolean): void {
  // terminal-kit shows the cursor via hideCursor(false).
  term.hideCursor(!visible);
}

/** Place the real cursor at a 0-based cell, or hide it when there is none. */
export function placeCursor(term: CursorControl, position: { x: number; y: number } | null): void {
  if (!position) {
    setCursorVisible(term, false);
    return;
  }
  term.moveTo(position.x + 1, position.y + 1);
  setCursorVisible(term, true);
}
