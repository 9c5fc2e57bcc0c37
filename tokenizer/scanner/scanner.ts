import { CharacterCodes } from './character-codes.js';
import { createCursor, type Cursor } from './cursor.js';
import { createDelimiterManager } from './delimiters.js';
import {
  ScannerConfigurationError,
  ScannerError,
  type ErrorCallback
} from './errors.js';
import { filterLine } from './line-filter.js';
import { resolveScanInput, type ScanInput } from './source.js';
import { createSpanBuffer, type SpanBuffer, type SpanBufferDebugState } from './span-buffer.js';
import { buildTagToken } from './token-builder.js';
import {
  BASE_SIGILS,
  PLURAL_SIGILS,
  ScannerErrorCode,
  TokenKind,
  type TagKind,
  type Token
} from './token-types.js';

export interface ScannerOptions {
  /** Recognise `{{_ text}}` and `{{ngettext singular plural}}` tags. */
  enablePluralTranslation?: boolean;
}

export interface Scanner {
  /**
   * Tokenize a whole template. All state (delimiters included) is reset on
   * every call, so one scanner can be reused sequentially.
   *
   * @param delimiters Optional `"OPEN CLOSE"` pair replacing `{{ }}` for this scan.
   * In-template delimiter changes still apply on top of it.
   */
  scan(input: ScanInput, delimiters?: string): Token[];

  /**
   * Receive recoverable errors instead of having scan() throw them. The scan
   * then carries on best-effort.
   */
  setOnError(onError: ErrorCallback | undefined): void;

  /** Fill a caller-owned diagnostics state object. */
  fillDebugState(state: ScannerDebugState): void;
}

/** Finite-state machine states. */
const enum ScannerState {
  /** Plain text, watching for the open delimiter. */
  Text = 0,

  /** Positioned on an open delimiter, about to read the sigil. */
  TagSniff = 1,

  /** Buffering the tag body until the close delimiter. */
  InTag = 2,
}

const ScannerStateNames: readonly string[] = ['Text', 'TagSniff', 'InTag'];

/**
 * Debug state interface for diagnostics
 */
export interface ScannerDebugState {
  /** FSM state name. */
  state: string;

  /** Current absolute position (index) in the source. */
  pos: number;

  openDelimiter: string;
  closeDelimiter: string;

  tokenCount: number;

  /** Index of the first token of the line being accumulated. */
  lineStart: number;

  /** Characters waiting in the text/tag buffer. */
  bufferLength: number;

  /** Separate source spans those characters are kept in. */
  bufferSpanCount: number;

  /** Errors reported by the most recent scan. */
  errorCount: number;
}

function readPluralOption(options: ScannerOptions): boolean {
  const value: unknown = options.enablePluralTranslation;
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw new ScannerConfigurationError(
      `Scanner option "enablePluralTranslation" must be a boolean, got ${typeof value}`,
      ScannerErrorCode.InvalidOption);
  }
  return value;
}

/**
 * Template scanner with closure-based architecture
 */
export function createScanner(options: ScannerOptions = {}): Scanner {
  const pluralTranslation = readPluralOption(options);
  const sigils = pluralTranslation ? PLURAL_SIGILS : BASE_SIGILS;

  let onError: ErrorCallback | undefined = undefined;

  // Per-scan state - reset at the top of scan()
  let cursor: Cursor = createCursor('');
  let buffer: SpanBuffer = createSpanBuffer({ source: '' });
  const delimiters = createDelimiterManager();
  let state = ScannerState.Text;
  let tagKind: TagKind = TokenKind.Escaped;
  let tagStart = -1;
  let tagSeen = false;
  let tokens: Token[] = [];
  let lineStart = 0;
  let errorCount = 0;

  function reset(source: string, override: string | undefined): void {
    delimiters.reset(override);
    cursor = createCursor(source);
    buffer = createSpanBuffer({ source });
    state = ScannerState.Text;
    tagKind = TokenKind.Escaped;
    tagStart = -1;
    tagSeen = false;
    tokens = [];
    lineStart = 0;
    errorCount = 0;
  }

  function setOnError(cb: ErrorCallback | undefined): void {
    onError = cb;
  }

  function emitError(code: ScannerErrorCode, message: string, start: number, end: number): void {
    errorCount++;
    if (!onError) throw new ScannerError(message, code, cursor.source, start, end);
    onError(start, end, code, message);
  }

  function flushBuffer(): void {
    if (!buffer.length) return;
    tokens.push({ kind: TokenKind.Text, value: buffer.materialize() });
    buffer.clear();
  }

  function closeLine(endOfInput: boolean): void {
    flushBuffer();
    filterLine(tokens, lineStart, tagSeen, endOfInput);
    tagSeen = false;
    lineStart = tokens.length;
  }

  function scanText(): void {
    const pos = cursor.pos;
    const ch = cursor.peek();

    // \{{ is a literal open delimiter: keep the next character, drop the backslash
    if (ch === CharacterCodes.backslash && cursor.peek(1) === delimiters.open.charCodeAt(0)) {
      buffer.addSpan(pos + 1, pos + 2);
      cursor.advance(2);
      return;
    }

    if (cursor.matches(delimiters.open)) {
      flushBuffer();
      state = ScannerState.TagSniff;
      return;
    }

    if (ch === CharacterCodes.lineFeed) {
      closeLine(false);
    } else {
      buffer.addSpan(pos, pos + 1);
    }
    cursor.advance();
  }

  function sniffTag(): void {
    tagStart = cursor.pos;
    tagSeen = true;
    cursor.advance(delimiters.open.length);

    const sigilKind = sigils.get(cursor.char());
    if (sigilKind === TokenKind.DelimiterChange) {
      const result = delimiters.change(cursor.source, cursor.pos + 1);
      if (!result.ok) {
        emitError(ScannerErrorCode.MalformedDelimiterChange, result.message, tagStart, result.resumeAt);
      }
      cursor.seek(result.resumeAt);
      state = ScannerState.Text;
      return;
    }

    if (sigilKind === undefined) {
      tagKind = TokenKind.Escaped;
    } else {
      tagKind = sigilKind;
      cursor.advance();
    }
    state = ScannerState.InTag;
  }

  function scanTagBody(): void {
    const pos = cursor.pos;
    if (!cursor.matches(delimiters.close)) {
      buffer.addSpan(pos, pos + 1);
      cursor.advance();
      return;
    }

    tokens.push(buildTagToken({
      kind: tagKind,
      body: buffer.materialize(),
      delimiters: delimiters.current(),
      tagStart,
      closeStart: pos,
      pluralTranslation,
    }));
    buffer.clear();
    cursor.advance(delimiters.close.length);

    // {{{name}}}: the sniff step consumed only one of the three opening braces
    if (tagKind === TokenKind.Unescaped && delimiters.close === '}}') {
      cursor.advance();
    }
    state = ScannerState.Text;
  }

  function scan(input: ScanInput, override?: string): Token[] {
    reset(resolveScanInput(input), override);

    while (!cursor.eof()) {
      switch (state) {
        case ScannerState.Text:
          scanText();
          break;
        case ScannerState.TagSniff:
          sniffTag();
          break;
        case ScannerState.InTag:
          scanTagBody();
          break;
      }
    }

    if (state === ScannerState.InTag) {
      emitError(ScannerErrorCode.UnterminatedTag, 'Unterminated tag', tagStart, cursor.source.length);
      buffer.clear();
      state = ScannerState.Text;
    }

    closeLine(true);
    return tokens;
  }

  function fillDebugState(debugState: ScannerDebugState): void {
    debugState.state = ScannerStateNames[state];
    debugState.pos = cursor.pos;
    debugState.openDelimiter = delimiters.open;
    debugState.closeDelimiter = delimiters.close;
    debugState.tokenCount = tokens.length;
    debugState.lineStart = lineStart;
    const bufferState: Partial<SpanBufferDebugState> = {};
    buffer.fillDebugState(bufferState);
    debugState.bufferLength = bufferState.charCount ?? 0;
    debugState.bufferSpanCount = bufferState.spanCount ?? 0;
    debugState.errorCount = errorCount;
  }

  return {
    scan,
    setOnError,
    fillDebugState,
  };
}
