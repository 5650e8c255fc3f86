export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/** terminal-kit reports printable input as the character itself. */
export function isPrintableKeyName(name: string): boolean {
  if (isSpaceKeyName(name)) return true;
  const chars = Array.from(name);
  if (chars.length !== 1) return false;
  const code = chars[0]?.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}
