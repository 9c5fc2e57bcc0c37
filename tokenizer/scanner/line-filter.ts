/**
 * Standalone-line trimming.
 *
 * A line holding only non-interpolating tags and whitespace disappears from
 * the output: its text tokens are removed and no newline token is written.
 * Whitespace in front of a partial on such a line becomes that partial's
 * `indent`.
 *
 * Removal shifts positions: indices into the token list taken before a
 * filter pass do not survive it.
 */

import { hasNonWhiteSpace } from './character-codes.js';
import {
  INTERPOLATING_KINDS,
  PARTIAL_KINDS,
  TokenKind,
  type Token
} from './token-types.js';

export const NEWLINE_TOKEN_VALUE = '\n';

export function isWhitespaceLine(tokens: readonly Token[], lineStart: number): boolean {
  for (let i = lineStart; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind === TokenKind.Text) {
      if (hasNonWhiteSpace(token.value)) return false;
    } else if (INTERPOLATING_KINDS.has(token.kind)) {
      return false;
    }
  }
  return true;
}

/**
 * Close the line that started at `lineStart`. `tagSeen` is whether any tag
 * (a delimiter change included) opened on it; `endOfInput` suppresses the
 * trailing newline token.
 */
export function filterLine(tokens: Token[], lineStart: number, tagSeen: boolean, endOfInput: boolean): void {
  if (tagSeen && isWhitespaceLine(tokens, lineStart)) {
    let write = lineStart;
    for (let read = lineStart; read < tokens.length; read++) {
      const token = tokens[read];
      if (token.kind !== TokenKind.Text) {
        tokens[write++] = token;
        continue;
      }

      const next = tokens[read + 1];
      if (next && next.kind !== TokenKind.Text && PARTIAL_KINDS.has(next.kind)) {
        next.indent = token.value;
      }
    }
    tokens.length = write;
  } else if (!endOfInput) {
    tokens.push({ kind: TokenKind.Text, value: NEWLINE_TOKEN_VALUE });
  }
}
