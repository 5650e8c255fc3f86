import { isPrintableKeyName, isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCursor(value: string, cursor: number): number {
  const len = toChars(value).length;
  return Math.max(0, Math.min(cursor, len));
}

export function createTextInput(initial: string): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

function withCursor(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

function insertAt(state: TextInputState, text: string): TextInputState {
  const chars = toChars(state.value);
  const insertChars = toChars(text);
  const cursor = clampCursor(state.value, state.cursor);
  chars.splice(cursor, 0, ...insertChars);
  return { value: chars.join(''), cursor: cursor + insertChars.length };
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(start, chars.length));
  const to = Math.max(0, Math.min(end, chars.length));
  if (to <= from) return withCursor(state, state.cursor);
  chars.splice(from, to - from);
  return { value: chars.join(''), cursor: from };
}

/**
 * Apply an editing key. Returns null for keys that are not editing keys
 * (submit and cancel are handled by callers).
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputState | null {
  const cursor = clampCursor(state.value, state.cursor);

  if (name === 'BACKSPACE') {
    if (cursor <= 0) return withCursor(state, cursor);
    return deleteRange(state, cursor - 1, cursor);
  }

  if (isSpaceKeyName(name)) return insertAt(state, ' ');
  if (isPrintableKeyName(name)) return insertAt(state, name);

  return null;
}
