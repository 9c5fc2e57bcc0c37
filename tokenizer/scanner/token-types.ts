/**
 * Token types for the template scanner.
 *
 * A scan produces a flat, source-ordered list of tokens: plain text runs and
 * tags. Tag tokens freeze the delimiter pair that was active when they were
 * produced, since delimiters can change mid-template.
 */

export enum TokenKind {
  Text,                     // plain text run (one newline token per kept line break)

  // Interpolation
  Escaped,                  // {{name}}
  Unescaped,                // {{{name}}}
  UnescapedAmpersand,       // {{&name}}

  // Blocks
  Section,                  // {{#name args}}
  InvertedSection,          // {{^name}}
  EndSection,               // {{/name}}

  Comment,                  // {{!text}}
  Partial,                  // {{>name args}}
  PartialAlt,               // {{<name args}}
  DelimiterChange,          // {{=<% %>=}} (consumed by the scanner, never emitted)

  // Translation extension
  Gettext,                  // {{_ text}}
  PluralGettext,            // {{ngettext singular plural}}
}

/** Every kind a tag token may carry. */
export type TagKind = Exclude<TokenKind, TokenKind.Text | TokenKind.DelimiterChange>;

export interface TextToken {
  kind: TokenKind.Text;
  value: string;
}

export interface TagToken {
  kind: TagKind;

  /** Trimmed tag body, or the part before the first whitespace run for kinds that take args. */
  name: string;

  openDelimiter: string;
  closeDelimiter: string;

  /**
   * For EndSection: offset of this tag's open delimiter (where the enclosing
   * section's content ends). For every other kind: offset just past the close delimiter.
   */
  sourceIndex: number;

  /** Leading whitespace of a standalone partial line. */
  indent?: string;

  /** Raw parameter text; present (possibly empty) only for kinds that take args. */
  args?: string;
}

export type Token = TextToken | TagToken;

/**
 * Scanner error codes, reported through the error callback or thrown as ScannerError
 */
export enum ScannerErrorCode {
  UnterminatedTag,
  MalformedDelimiterChange,
  InvalidDelimiters,
  InvalidOption,
}

// Handlebars-style tags can be escaped: \{{
export const ESCAPE_CHAR = '\\';

export const PLURAL_KEYWORD = 'ngettext';

/** Kinds reachable through a one-character sigil right after the open delimiter. */
export type SigilKind = TagKind | TokenKind.DelimiterChange;

export const BASE_SIGILS: ReadonlyMap<string, SigilKind> = new Map<string, SigilKind>([
  ['#', TokenKind.Section],
  ['^', TokenKind.InvertedSection],
  ['/', TokenKind.EndSection],
  ['!', TokenKind.Comment],
  ['>', TokenKind.Partial],
  ['<', TokenKind.PartialAlt],
  ['=', TokenKind.DelimiterChange],
  ['{', TokenKind.Unescaped],
  ['&', TokenKind.UnescapedAmpersand],
]);

export const PLURAL_SIGILS: ReadonlyMap<string, SigilKind> = new Map<string, SigilKind>([
  ...BASE_SIGILS,
  ['_', TokenKind.Gettext],
]);

export const INTERPOLATING_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenKind.Escaped,
  TokenKind.Unescaped,
  TokenKind.UnescapedAmpersand,
  TokenKind.Gettext,
  TokenKind.PluralGettext,
]);

// Sections (helpers), partials and ngettext accept parameters
export const PARAMETERIZED_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenKind.Section,
  TokenKind.Partial,
  TokenKind.PartialAlt,
  TokenKind.PluralGettext,
]);

export const PARTIAL_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenKind.Partial,
  TokenKind.PartialAlt,
]);

export function isTagToken(token: Token): token is TagToken {
  return token.kind !== TokenKind.Text;
}
