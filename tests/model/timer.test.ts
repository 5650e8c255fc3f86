import { describe, expect, it } from 'vitest';
import { createTodo } from '../../src/model/projects.js';
import { endWork, isWorking, startWork, toggleTodoCompleted, toggleWork } from '../../src/model/timer.js';

describe('time tracking', () => {
  it('starts idle with nothing tracked', () => {
    const todo = createTodo('Write tests');
    expect(isWorking(todo)).toBe(false);
    expect(todo.totalDuration).toBe(0);
    expect(todo.timer).toEqual({ kind: 'idle', lastSession: null });
  });

  it('credits a closed session to the total', () => {
    const started = startWork(createTodo('Write tests'), 1_000);
    expect(isWorking(started)).toBe(true);

    const stopped = endWork(started, 1_090);
    expect(isWorking(stopped)).toBe(false);
    expect(stopped.totalDuration).toBe(90);
    expect(stopped.timer).toEqual({ kind: 'idle', lastSession: { start: 1_000, end: 1_090 } });
  });

  it('ignores endWork when no session is open', () => {
    const todo = createTodo('Write tests');
    expect(endWork(todo, 5_000)).toBe(todo);

    const closed = endWork(startWork(todo, 100), 160);
    expect(endWork(closed, 10_000).totalDuration).toBe(60);
  });

  it('restarting a running session discards the unclosed time', () => {
    const first = startWork(createTodo('Write tests'), 100);
    const restarted = startWork(first, 400);
    expect(restarted.timer).toEqual({ kind: 'running', since: 400 });
    expect(endWork(restarted, 410).totalDuration).toBe(10);
  });

  it('two toggles from idle equal one start/stop cycle', () => {
    const todo = createTodo('Write tests');
    const viaToggle = toggleWork(toggleWork(todo, 200), 260);
    const viaCalls = endWork(startWork(todo, 200), 260);
    expect(viaToggle).toEqual(viaCalls);
  });

  it('accumulates several sessions and never decreases', () => {
    let todo = createTodo('Write tests');
    const totals: number[] = [];
    for (const [start, end] of [
      [0, 30],
      [100, 145],
      [500, 500],
      [900, 1_000],
    ] as const) {
      todo = toggleWork(todo, start);
      todo = toggleWork(todo, end);
      totals.push(todo.totalDuration);
    }
    expect(totals).toEqual([30, 75, 75, 175]);
  });

  it('does not go negative when the clock steps backwards', () => {
    const todo = endWork(startWork(createTodo('Write tests'), 500), 400);
    expect(todo.totalDuration).toBe(0);
  });

  it('stops a running timer when completing', () => {
    const running = startWork(createTodo('Write tests'), 1_000);
    const done = toggleTodoCompleted(running, 1_300);
    expect(done.completed).toBe(true);
    expect(isWorking(done)).toBe(false);
    expect(done.totalDuration).toBe(300);
  });

  it('un-completing leaves the timer alone', () => {
    const done = { ...startWork(createTodo('Write tests'), 1_000), completed: true };
    const reopened = toggleTodoCompleted(done, 1_300);
    expect(reopened.completed).toBe(false);
    expect(isWorking(reopened)).toBe(true);
    expect(reopened.totalDuration).toBe(0);
  });
});
