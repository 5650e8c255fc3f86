import type { Rect } from './layout.js';
import { textWidth } from './text-width.js';

export type CellStyle = 'plain' | 'accent' | 'inverse' | 'dim' | 'bold';

export interface Segment {
  text: string;
  style: CellStyle;
}

interface Cell {
  /** Empty on the second column of a double-width character. */
  ch: string;
  style: CellStyle;
}

const BORDER = { tl: '┌', tr: '┐', bl: '└', br: '┘', h: '─', v: '│' } as const;

/**
 * Fixed-size character grid the view draws into. A double-width character
 * takes its own cell plus an empty one after it; writes outside the grid are
 * clipped.
 */
export class Canvas {
  private readonly rows: Cell[][];

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.rows = Array.from({ length: Math.max(0, height) }, () =>
      Array.from({ length: Math.max(0, width) }, (): Cell => ({ ch: ' ', style: 'plain' }))
    );
  }

  private set(x: number, y: number, ch: string, style: CellStyle): void {
    const row = this.rows[y];
    if (!row || x < 0 || x >= row.length) return;

    // Overwriting half of a wide character blanks the other half.
    const current = row[x];
    if (current?.ch === '') {
      const head = row[x - 1];
      if (head) row[x - 1] = { ch: ' ', style: head.style };
    }
    const next = row[x + 1];
    if (next?.ch === '') {
      row[x + 1] = { ch: ' ', style: next.style };
    }

    row[x] = { ch, style };
  }

  /** Write `text` from (x, y), stopping after `maxWidth` columns. */
  write(x: number, y: number, text: string, style: CellStyle = 'plain', maxWidth: number = this.width): void {
    let col = 0;
    for (const ch of Array.from(text)) {
      const w = textWidth(ch);
      if (w === 0) continue;
      if (col + w > maxWidth) break;

      const at = x + col;
      if (w > 1 && (at < 0 || at + 1 >= this.width)) {
        // Half of it would fall outside the grid.
        this.set(at, y, ' ', style);
        this.set(at + 1, y, ' ', style);
      } else {
        this.set(at, y, ch, style);
        if (w > 1) this.set(at + 1, y, '', style);
      }
      col += w;
    }
  }

  fill(rect: Rect, style: CellStyle = 'plain'): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.set(x, y, ' ', style);
      }
    }
  }

  box(rect: Rect, title: string, style: CellStyle = 'plain'): void {
    if (rect.width < 2 || rect.height < 2) return;
    const right = rect.x + rect.width - 1;
    const bottom = rect.y + rect.height - 1;

    for (let x = rect.x + 1; x < right; x++) {
      this.set(x, rect.y, BORDER.h, style);
      this.set(x, bottom, BORDER.h, style);
    }
    for (let y = rect.y + 1; y < bottom; y++) {
      this.set(rect.x, y, BORDER.v, style);
      this.set(right, y, BORDER.v, style);
    }
    this.set(rect.x, rect.y, BORDER.tl, style);
    this.set(right, rect.y, BORDER.tr, style);
    this.set(rect.x, bottom, BORDER.bl, style);
    this.set(right, bottom, BORDER.br, style);

    this.write(rect.x + 1, rect.y, title, style, rect.width - 2);
  }

  /** Consecutive cells of one style merged into segments. */
  segments(y: number): Segment[] {
    const out: Segment[] = [];
    for (const cell of this.rows[y] ?? []) {
      const last = out[out.length - 1];
      if (last && last.style === cell.style) {
        last.text += cell.ch;
      } else {
        out.push({ text: cell.ch, style: cell.style });
      }
    }
    return out;
  }

  lines(): string[] {
    return this.rows.map((row) => row.map((c) => c.ch).join(''));
  }
}
