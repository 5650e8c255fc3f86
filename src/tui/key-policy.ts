export type NormalCommand =
  | 'quit'
  | 'save'
  | 'switchPanel'
  | 'down'
  | 'up'
  | 'toggleComplete'
  | 'add'
  | 'rename'
  | 'toggleTimer'
  | 'delete';

export type EntryCommand = 'commit' | 'cancel';

const NORMAL_KEYS: Readonly<Record<string, NormalCommand>> = {
  q: 'quit',
  s: 'save',
  TAB: 'switchPanel',
  j: 'down',
  DOWN: 'down',
  k: 'up',
  UP: 'up',
  ' ': 'toggleComplete',
  SPACE: 'toggleComplete',
  a: 'add',
  r: 'rename',
  t: 'toggleTimer',
  d: 'delete',
};

/** Key bindings in normal mode. Unbound keys resolve to null. */
export function resolveNormalCommand(name: string): NormalCommand | null {
  return Object.hasOwn(NORMAL_KEYS, name) ? NORMAL_KEYS[name] ?? null : null;
}

export function resolveEntryCommand(name: string): EntryCommand | null {
  if (name === 'ENTER' || name === 'KP_ENTER') return 'commit';
  if (name === 'ESCAPE') return 'cancel';
  return null;
}

export const KEY_HELP = [
  '[Tab] switch',
  '[j/k] move',
  '[Space] done',
  '[a] add',
  '[r] rename',
  '[t] timer',
  '[d] delete',
  '[s] save',
  '[q] quit',
] as const;
