/**
 * Scanner error types
 */

import { isLineBreak, CharacterCodes } from './character-codes.js';
import { ScannerErrorCode } from './token-types.js';

export type ErrorCallback = (start: number, end: number, code: ScannerErrorCode, message: string) => void;

export class ScannerError extends Error {
  code: ScannerErrorCode;
  start: number;
  end: number;
  line: number;
  column: number;

  constructor(message: string, code: ScannerErrorCode, source: string, start: number, end: number) {
    const { line, column } = getLineAndColumn(source, start);
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'ScannerError';
    this.code = code;
    this.start = start;
    this.end = end;
    this.line = line;
    this.column = column;
  }
}

/** Raised for bad construction options or a bad delimiter override, before any scanning. */
export class ScannerConfigurationError extends Error {
  code: ScannerErrorCode;

  constructor(message: string, code: ScannerErrorCode) {
    super(message);
    this.name = 'ScannerConfigurationError';
    this.code = code;
  }
}

/**
 * 1-based line and column of `pos`. CRLF counts as a single line break.
 */
export function getLineAndColumn(source: string, pos: number): { line: number, column: number } {
  let line = 1;
  let lastLineStart = 0;
  const limit = Math.min(pos, source.length);
  for (let i = 0; i < limit; i++) {
    const ch = source.charCodeAt(i);
    if (!isLineBreak(ch)) continue;
    if (ch === CharacterCodes.carriageReturn &&
        i + 1 < limit &&
        source.charCodeAt(i + 1) === CharacterCodes.lineFeed) {
      i++;
    }
    line++;
    lastLineStart = i + 1;
  }
  return { line, column: pos - lastLineStart + 1 };
}
