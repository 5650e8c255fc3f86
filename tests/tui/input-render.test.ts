import { describe, expect, it } from 'vitest';
import { fitInputField } from '../../src/tui/input-render.js';

describe('fitInputField', () => {
  it('shows short values whole', () => {
    expect(fitInputField({ value: 'abc', cursor: 3 }, 10)).toEqual({ text: 'abc', cursorCol: 3 });
  });

  it('cuts long values from the start to keep the cursor visible', () => {
    expect(fitInputField({ value: 'abcdefgh', cursor: 8 }, 5)).toEqual({ text: 'efgh', cursorCol: 4 });
  });

  it('keeps the start when the cursor is near it', () => {
    expect(fitInputField({ value: 'abcdefgh', cursor: 1 }, 5)).toEqual({ text: 'abcde', cursorCol: 1 });
  });

  it('returns nothing for a zero-width field', () => {
    expect(fitInputField({ value: 'abc', cursor: 3 }, 0)).toEqual({ text: '', cursorCol: 0 });
  });

  it('measures wide characters in columns', () => {
    expect(fitInputField({ value: '学习', cursor: 2 }, 10)).toEqual({ text: '学习', cursorCol: 4 });
    expect(fitInputField({ value: '学习学习学', cursor: 5 }, 6)).toEqual({ text: '习学', cursorCol: 4 });
    expect(fitInputField({ value: '学习学习学', cursor: 1 }, 6)).toEqual({ text: '学习学', cursorCol: 2 });
  });
});
