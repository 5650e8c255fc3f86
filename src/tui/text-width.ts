import terminalKit from 'terminal-kit';

/** Columns `text` takes on the terminal (CJK and emoji count double). */
export function textWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

export function truncateByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (textWidth(text) <= maxWidth) return text;

  let width = 0;
  const out: string[] = [];
  for (const ch of Array.from(text)) {
    const w = textWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }
  return out.join('');
}

/** Keeps the end of `text`, dropping characters from the start. */
export function truncateStartByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (textWidth(text) <= maxWidth) return text;

  const chars = Array.from(text);
  let width = 0;
  const out: string[] = [];

  for (let idx = chars.length - 1; idx >= 0; idx--) {
    const ch = chars[idx];
    if (ch === undefined) break;
    const w = textWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }

  return out.reverse().join('');
}
