import { describe, expect, it } from 'vitest';
import { computeLayout, computePopupRect } from '../../src/tui/layout.js';

describe('tui layout', () => {
  it('stacks the panels on narrow terminals', () => {
    expect(computeLayout(60, 21)).toEqual({
      stacked: true,
      projects: { x: 0, y: 0, width: 60, height: 8 },
      todos: { x: 0, y: 8, width: 60, height: 12 },
      help: { x: 0, y: 20, width: 60, height: 1 },
    });
  });

  it('gives the projects panel a fixed width on medium terminals', () => {
    const layout = computeLayout(100, 30);
    expect(layout.stacked).toBe(false);
    expect(layout.projects).toEqual({ x: 0, y: 0, width: 25, height: 29 });
    expect(layout.todos).toEqual({ x: 25, y: 0, width: 75, height: 29 });
  });

  it('splits 30/70 on wide terminals', () => {
    const layout = computeLayout(150, 40);
    expect(layout.projects.width).toBe(45);
    expect(layout.todos).toEqual({ x: 45, y: 0, width: 105, height: 39 });
  });

  it('drops the help row on very short terminals', () => {
    const layout = computeLayout(120, 5);
    expect(layout.help).toBe(null);
    expect(layout.projects.height).toBe(5);
  });

  it('hides the todos panel when there is no room for it', () => {
    expect(computeLayout(10, 20).todos).toBe(null);
  });
});

describe('computePopupRect', () => {
  it('centers a 60% wide popup', () => {
    expect(computePopupRect(100, 31)).toEqual({ x: 20, y: 14, width: 60, height: 3 });
  });

  it('widens to 90% on narrow terminals', () => {
    expect(computePopupRect(50, 20)).toEqual({ x: 2, y: 8, width: 45, height: 3 });
  });
});
