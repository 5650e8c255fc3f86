import { describe, expect, it } from 'vitest';
import { textWidth, truncateByWidth, truncateStartByWidth } from '../../src/tui/text-width.js';

describe('text width', () => {
  it('counts CJK characters as two columns', () => {
    expect(textWidth('abc')).toBe(3);
    expect(textWidth('学习')).toBe(4);
  });

  it('cuts from the end without splitting a wide character', () => {
    expect(truncateByWidth('abc', 5)).toBe('abc');
    expect(truncateByWidth('学习abc', 3)).toBe('学');
    expect(truncateByWidth('学习', 0)).toBe('');
  });

  it('cuts from the start keeping the tail', () => {
    expect(truncateStartByWidth('abc学习', 5)).toBe('c学习');
    expect(truncateStartByWidth('学习', 3)).toBe('习');
  });
});
