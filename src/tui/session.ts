import { systemClock, type AppData, type Clock } from '../model/types.js';
import type { DataStore } from '../store/data-file.js';
import { createAppState, handleKey, type AppState, type KeyEffect } from './state-machine.js';

export interface SessionOptions {
  store: DataStore;
  clock?: Clock;
}

/**
 * Holds the current state between key presses and carries out the effects
 * `handleKey` asks for.
 */
export class Session {
  private current: AppState;
  private readonly store: DataStore;
  private readonly clock: Clock;

  constructor(options: SessionOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.current = createAppState(this.store.load().projects);
  }

  get state(): AppState {
    return this.current;
  }

  toAppData(): AppData {
    return { projects: this.current.projects };
  }

  save(): void {
    this.store.save(this.toAppData());
  }

  dispatch(name: string): KeyEffect {
    const { state, effect } = handleKey(this.current, name, this.clock());
    this.current = state;
    if (effect !== 'none') this.save();
    return effect;
  }
}
