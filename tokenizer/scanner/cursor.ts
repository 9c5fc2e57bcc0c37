/**
 * Cursor over the template source: peek, advance and match-ahead without
 * slicing the source.
 */

export interface Cursor {
  readonly source: string;

  /** Current offset into the source. */
  readonly pos: number;

  eof(): boolean;

  /** Character code at `pos + offset`, or -1 past either end. */
  peek(offset?: number): number;

  /** Character at `pos + offset`, or '' past either end. */
  char(offset?: number): string;

  advance(count?: number): void;

  /** Move to an absolute offset (clamped to the source). */
  seek(pos: number): void;

  /** True when `text` occurs at `pos + offset`. */
  matches(text: string, offset?: number): boolean;
}

export function createCursor(source: string): Cursor {
  const end = source.length;
  let pos = 0;

  function eof(): boolean {
    return pos >= end;
  }

  function peek(offset = 0): number {
    const at = pos + offset;
    if (at < 0 || at >= end) return -1;
    return source.charCodeAt(at);
  }

  function char(offset = 0): string {
    const at = pos + offset;
    if (at < 0 || at >= end) return '';
    return source.charAt(at);
  }

  function advance(count = 1): void {
    pos = Math.min(pos + count, end);
  }

  function seek(to: number): void {
    pos = Math.max(0, Math.min(to, end));
  }

  // ASCII-style matching without allocation
  function matches(text: string, offset = 0): boolean {
    const at = pos + offset;
    const len = text.length;
    if (at < 0 || at + len > end) return false;
    for (let i = 0; i < len; i++) {
      if (source.charCodeAt(at + i) !== text.charCodeAt(i)) return false;
    }
    return true;
  }

  return {
    source,
    get pos() { return pos; },
    eof,
    peek,
    char,
    advance,
    seek,
    matches,
  };
}
