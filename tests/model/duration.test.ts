import { describe, expect, it } from 'vitest';
import { formatDuration, splitDuration } from '../../src/model/duration.js';

describe('formatDuration', () => {
  it('returns an empty label for zero', () => {
    expect(formatDuration(0)).toBe('');
  });

  it('shows seconds alone', () => {
    expect(formatDuration(45)).toBe('45s');
  });

  it('pairs minutes with seconds', () => {
    expect(formatDuration(125)).toBe('2m 5s');
    expect(formatDuration(120)).toBe('2m');
  });

  it('pairs hours with minutes and drops seconds', () => {
    expect(formatDuration(3665)).toBe('1h 1m');
  });

  it('pairs hours with seconds when minutes are zero', () => {
    expect(formatDuration(3605)).toBe('1h 5s');
    expect(formatDuration(7200)).toBe('2h');
  });

  it('pairs days with hours', () => {
    expect(formatDuration(90000)).toBe('1d 1h');
  });

  it('pairs days with minutes when hours are zero, never seconds', () => {
    expect(formatDuration(86_400 + 120 + 7)).toBe('1d 2m');
    expect(formatDuration(86_400 + 7)).toBe('1d');
  });

  it('uses a 30-day month', () => {
    expect(formatDuration(2_700_000)).toBe('1mo 1d');
    expect(formatDuration(2_592_000)).toBe('1mo');
    expect(formatDuration(2_592_000 + 3_600 * 5 + 59)).toBe('1mo 5h');
  });

  it('never shows minutes once months are present', () => {
    expect(formatDuration(2_592_000 + 600)).toBe('1mo');
  });
});

describe('splitDuration', () => {
  it('splits by successive division', () => {
    expect(splitDuration(2_700_000 + 3_661)).toEqual({
      months: 1,
      days: 1,
      hours: 7,
      minutes: 1,
      seconds: 1,
    });
  });
});
