export interface WorkSession {
  start: number;
  end: number;
}

/**
 * Timer state of a todo. Timestamps are Unix-epoch seconds.
 *
 * `idle` keeps the last closed session so it survives a save/load cycle.
 */
export type TimerState =
  | { kind: 'idle'; lastSession: WorkSession | null }
  | { kind: 'running'; since: number };

export interface Todo {
  title: string;
  description: string;
  completed: boolean;
  timer: TimerState;
  /** Accumulated seconds of all closed sessions. */
  totalDuration: number;
}

export interface Project {
  name: string;
  todos: Todo[];
}

export interface AppData {
  projects: Project[];
}

/** Returns the current Unix-epoch second. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
