import terminalKit from 'terminal-kit';
import type { AppData } from '../model/types.js';
import type { DataStore } from '../store/data-file.js';
import type { CellStyle, Segment } from './canvas.js';
import { Session } from './session.js';
import { placeCursor, setCursorVisible } from './term-cursor.js';
import { buildScreen } from './view.js';

type Term = typeof terminalKit.terminal;

interface TuiOptions {
  store: DataStore;
  colorsDisabled: boolean;
}

function styleWriter(term: Term, style: CellStyle, colorsDisabled: boolean): (s: string) => void {
  if (colorsDisabled) return (s: string) => term(s);
  switch (style) {
    case 'accent':
      return (s: string) => term.yellow(s);
    case 'inverse':
      return (s: string) => term.inverse(s);
    case 'dim':
      return (s: string) => term.dim(s);
    case 'bold':
      return (s: string) => term.bold(s);
    case 'plain':
      return (s: string) => term(s);
  }
}

function paintSegments(term: Term, segments: Segment[], colorsDisabled: boolean): void {
  for (const segment of segments) {
    styleWriter(term, segment.style, colorsDisabled)(segment.text);
    term.styleReset();
  }
}

function render(term: Term, session: Session, colorsDisabled: boolean): void {
  const width: number = term.width || process.stdout.columns || 80;
  const height: number = term.height || process.stdout.rows || 24;
  const { canvas, cursor } = buildScreen(session.state, width, height);

  setCursorVisible(term, false);
  for (let y = 0; y < canvas.height; y++) {
    term.moveTo(1, y + 1);
    paintSegments(term, canvas.segments(y), colorsDisabled);
  }
  placeCursor(term, cursor);
}

/**
 * Full-screen session. Resolves with the final data once the user quits;
 * the data has already been written through the store by then.
 */
export async function runInteractiveTui(options: TuiOptions): Promise<AppData> {
  const term: Term = terminalKit.terminal;
  const session = new Session({ store: options.store });

  let resolveExit: (() => void) | null = null;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const onKey = (name: string): void => {
    const effect = session.dispatch(name);
    if (effect === 'quit') {
      resolveExit?.();
      return;
    }
    render(term, session, options.colorsDisabled);
  };

  const onResize = (): void => {
    term.clear();
    render(term, session, options.colorsDisabled);
  };

  term.fullscreen(true);
  term.grabInput(true);
  process.stdout.on('resize', onResize);
  term.on('key', onKey);

  try {
    term.clear();
    render(term, session, options.colorsDisabled);
    await exitPromise;
  } finally {
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    term.grabInput(false);
    term.fullscreen(false);
    setCursorVisible(term, true);
    term.styleReset();
  }

  return session.toAppData();
}
