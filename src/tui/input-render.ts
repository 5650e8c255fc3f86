import type { TextInputState } from './text-input.js';
import { textWidth, truncateStartByWidth } from './text-width.js';

export interface VisibleInput {
  text: string;
  /** Column of the insertion point relative to the start of `text`. */
  cursorCol: number;
}

/**
 * Window of the input value that fits in `width` columns while keeping the
 * cursor visible. A long value is cut from the start so the end being typed
 * stays in view.
 */
export function fitInputField(input: TextInputState, width: number): VisibleInput {
  if (width <= 0) return { text: '', cursorCol: 0 };

  const chars = Array.from(input.value);
  const cursor = Math.max(0, Math.min(input.cursor, chars.length));
  const before = chars.slice(0, cursor).join('');

  // One column is kept free so a cursor at the end has somewhere to sit.
  if (textWidth(input.value) < width) {
    return { text: input.value, cursorCol: textWidth(before) };
  }

  const shownBefore = truncateStartByWidth(before, width - 1);
  let used = textWidth(shownBefore);
  let text = shownBefore;
  for (const ch of chars.slice(cursor)) {
    const w = textWidth(ch);
    if (used + w > width) break;
    text += ch;
    used += w;
  }
  return { text, cursorCol: textWidth(shownBefore) };
}
