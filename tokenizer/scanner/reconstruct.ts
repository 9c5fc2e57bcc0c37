/**
 * Write a token list back out as template text.
 *
 * The output scans back to the same kinds, names, args, values and
 * delimiters. Offsets are not preserved (tag bodies are written without their
 * inner padding), and neither are lines that standalone trimming removed.
 */

import {
  DEFAULT_CLOSE_DELIMITER,
  DEFAULT_OPEN_DELIMITER,
  type DelimiterPair
} from './delimiters.js';
import {
  ESCAPE_CHAR,
  PLURAL_KEYWORD,
  PLURAL_SIGILS,
  TokenKind,
  type TagKind,
  type TagToken,
  type Token
} from './token-types.js';

const sigilByKind = new Map<TokenKind, string>();
for (const [sigil, kind] of PLURAL_SIGILS) sigilByKind.set(kind, sigil);

function escapeText(text: string, open: string): string {
  const first = open.charAt(0);
  if (!text.includes(first)) return text;
  return text.split(first).join(ESCAPE_CHAR + first);
}

function writeTagBody(token: TagToken): string {
  const args = token.args ? ' ' + token.args : '';
  switch (token.kind) {
    case TokenKind.Escaped:
      // A leading sigil character would be read back as a different kind
      return PLURAL_SIGILS.has(token.name.charAt(0)) ? ' ' + token.name : token.name;
    case TokenKind.PluralGettext:
      return PLURAL_KEYWORD + ' ' + token.name + args;
    case TokenKind.Unescaped:
      return '{' + token.name + '}';
    default:
      return sigilOf(token.kind) + token.name + args;
  }
}

function sigilOf(kind: TagKind): string {
  const sigil = sigilByKind.get(kind);
  if (sigil === undefined) throw new Error(`No sigil for token kind ${TokenKind[kind]}`);
  return sigil;
}

/**
 * @param delimiters Pair active at the start, as passed to scan(). Defaults to `{{ }}`.
 */
export function reconstructSource(tokens: readonly Token[], delimiters?: DelimiterPair): string {
  let open = delimiters?.open ?? DEFAULT_OPEN_DELIMITER;
  let close = delimiters?.close ?? DEFAULT_CLOSE_DELIMITER;
  const parts: string[] = [];

  for (const token of tokens) {
    if (token.kind === TokenKind.Text) {
      parts.push(escapeText(token.value, open));
      continue;
    }

    if (token.openDelimiter !== open || token.closeDelimiter !== close) {
      parts.push(open + '=' + token.openDelimiter + ' ' + token.closeDelimiter + '=' + close);
      open = token.openDelimiter;
      close = token.closeDelimiter;
    }
    parts.push(open + writeTagBody(token) + close);
  }

  return parts.join('');
}
