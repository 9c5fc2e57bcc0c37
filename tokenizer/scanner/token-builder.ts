import { isWhiteSpace } from './character-codes.js';
import type { DelimiterPair } from './delimiters.js';
import {
  PARAMETERIZED_KINDS,
  PLURAL_KEYWORD,
  TokenKind,
  type TagKind,
  type TagToken
} from './token-types.js';

export interface TagContext {
  /** Kind detected from the sigil (Escaped when there was none). */
  kind: TagKind;

  /** Raw buffered tag body. */
  body: string;

  delimiters: DelimiterPair;

  /** Offset of the tag's open delimiter. */
  tagStart: number;

  /** Offset where the close delimiter matched. */
  closeStart: number;

  pluralTranslation: boolean;
}

/**
 * Split at the first whitespace run. `args` is empty when there is none.
 */
export function splitNameAndArgs(text: string): { name: string, args: string } {
  const trimmed = text.trim();
  let runStart = 0;
  while (runStart < trimmed.length && !isWhiteSpace(trimmed.charCodeAt(runStart))) runStart++;

  let runEnd = runStart;
  while (runEnd < trimmed.length && isWhiteSpace(trimmed.charCodeAt(runEnd))) runEnd++;

  return { name: trimmed.substring(0, runStart), args: trimmed.substring(runEnd) };
}

/**
 * Body after the `ngettext` keyword, or undefined when the body does not start
 * with the keyword followed by whitespace.
 */
export function matchPluralKeyword(body: string): string | undefined {
  const trimmed = body.trim();
  if (!trimmed.startsWith(PLURAL_KEYWORD)) return undefined;
  if (!isWhiteSpace(trimmed.charCodeAt(PLURAL_KEYWORD.length))) return undefined;
  return trimmed.substring(PLURAL_KEYWORD.length);
}

export function buildTagToken(context: TagContext): TagToken {
  const { delimiters, tagStart, closeStart } = context;
  let kind = context.kind;
  let body = context.body;

  if (context.pluralTranslation && kind === TokenKind.Escaped) {
    const pluralBody = matchPluralKeyword(body);
    if (pluralBody !== undefined) {
      kind = TokenKind.PluralGettext;
      body = pluralBody;
    }
  }

  let name: string;
  let args: string | undefined;
  if (PARAMETERIZED_KINDS.has(kind)) {
    ({ name, args } = splitNameAndArgs(body));
  } else {
    name = body.trim();
  }

  // {{{ name }}} under custom delimiters: the closing brace lands in the body
  if (kind === TokenKind.Unescaped &&
      delimiters.close !== '}}' &&
      name.endsWith('}')) {
    name = name.substring(0, name.length - 1).trim();
  }

  const token: TagToken = {
    kind,
    name,
    openDelimiter: delimiters.open,
    closeDelimiter: delimiters.close,
    sourceIndex: kind === TokenKind.EndSection ? tagStart : closeStart + delimiters.close.length,
  };
  if (args !== undefined) token.args = args;
  return token;
}
