import { describe, expect, it } from 'vitest';
import { createProject, createTodo } from '../../src/model/projects.js';
import { Session } from '../../src/tui/session.js';
import { createMemoryStore, fixedClock } from '../helpers/memory-store.js';

function setup() {
  const store = createMemoryStore({ projects: [createProject('Work', [createTodo('Report')])] });
  const clock = fixedClock(10_000);
  const session = new Session({ store, clock: clock.now });
  return { store, clock, session };
}

describe('Session', () => {
  it('loads the initial state from the store', () => {
    const { session } = setup();
    expect(session.state.projects.map((p) => p.name)).toEqual(['Work']);
    expect(session.state.selection).toEqual({ project: 0, todo: 0 });
  });

  it('saves after mutating keys only', () => {
    const { store, session } = setup();
    session.dispatch('TAB');
    session.dispatch('j');
    expect(store.saved).toHaveLength(0);

    session.dispatch('SPACE');
    expect(store.saved).toHaveLength(1);
    expect(store.saved[0]?.projects[0]?.todos[0]?.completed).toBe(true);
  });

  it('saves on the save key and on quit', () => {
    const { store, session } = setup();
    expect(session.dispatch('s')).toBe('persist');
    expect(session.dispatch('q')).toBe('quit');
    expect(store.saved).toHaveLength(2);
  });

  it('stamps timer sessions with the injected clock', () => {
    const { store, clock, session } = setup();
    session.dispatch('TAB');
    session.dispatch('t');
    clock.advance(3_665);
    session.dispatch('t');

    const todo = store.saved[store.saved.length - 1]?.projects[0]?.todos[0];
    expect(todo?.totalDuration).toBe(3_665);
    expect(todo?.timer).toEqual({ kind: 'idle', lastSession: { start: 10_000, end: 13_665 } });
  });

  it('does not save while typing', () => {
    const { store, session } = setup();
    for (const key of ['a', 'N', 'e', 'w']) session.dispatch(key);
    expect(store.saved).toHaveLength(0);

    session.dispatch('ENTER');
    expect(store.saved).toHaveLength(1);
    expect(session.toAppData().projects.map((p) => p.name)).toEqual(['Work', 'New']);
  });
});
