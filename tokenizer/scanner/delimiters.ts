import { isWhiteSpace } from './character-codes.js';
import { ScannerConfigurationError } from './errors.js';
import { ScannerErrorCode } from './token-types.js';

export const DEFAULT_OPEN_DELIMITER = '{{';
export const DEFAULT_CLOSE_DELIMITER = '}}';

export interface DelimiterPair {
  open: string;
  close: string;
}

export type DelimiterChangeResult =
  | { ok: true, pair: DelimiterPair, resumeAt: number }
  | { ok: false, message: string, resumeAt: number };

export interface DelimiterManager {
  readonly open: string;
  readonly close: string;

  /** Back to `{{`/`}}`, or to the `"OPEN CLOSE"` override when one is given. */
  reset(override?: string): void;

  /**
   * Apply an inline `=NEWOPEN NEWCLOSE=` directive whose body starts at
   * `contentStart` (just after the `=` sigil). The active pair only changes
   * when the directive is well formed.
   */
  change(source: string, contentStart: number): DelimiterChangeResult;

  /** Snapshot of the active pair. */
  current(): DelimiterPair;
}

/**
 * Split `"OPEN CLOSE"` on its whitespace run. Undefined unless it yields
 * exactly two non-empty parts.
 */
export function splitDelimiterPair(text: string): DelimiterPair | undefined {
  const parts: string[] = [];
  let partStart = -1;
  for (let i = 0; i <= text.length; i++) {
    const inPart = i < text.length && !isWhiteSpace(text.charCodeAt(i));
    if (inPart && partStart < 0) {
      partStart = i;
    } else if (!inPart && partStart >= 0) {
      parts.push(text.substring(partStart, i));
      partStart = -1;
    }
  }

  if (parts.length !== 2) return undefined;
  return { open: parts[0], close: parts[1] };
}

export function createDelimiterManager(): DelimiterManager {
  let open = DEFAULT_OPEN_DELIMITER;
  let close = DEFAULT_CLOSE_DELIMITER;

  function reset(override?: string): void {
    open = DEFAULT_OPEN_DELIMITER;
    close = DEFAULT_CLOSE_DELIMITER;

    const trimmed = override?.trim();
    if (!trimmed) return;

    const pair = splitDelimiterPair(trimmed);
    if (!pair) {
      throw new ScannerConfigurationError(
        `Delimiters must be two non-empty strings separated by whitespace, got ${JSON.stringify(override)}`,
        ScannerErrorCode.InvalidDelimiters);
    }
    open = pair.open;
    close = pair.close;
  }

  function change(source: string, contentStart: number): DelimiterChangeResult {
    const terminator = '=' + close;
    const closeIndex = source.indexOf(terminator, contentStart);
    if (closeIndex < 0) {
      return {
        ok: false,
        message: `Delimiter change is missing its '${terminator}' terminator`,
        resumeAt: source.length
      };
    }

    const resumeAt = closeIndex + terminator.length;
    const pair = splitDelimiterPair(source.substring(contentStart, closeIndex));
    if (!pair) {
      return {
        ok: false,
        message: 'Delimiter change must name exactly two non-empty delimiters',
        resumeAt
      };
    }

    open = pair.open;
    close = pair.close;
    return { ok: true, pair, resumeAt };
  }

  return {
    get open() { return open; },
    get close() { return close; },
    reset,
    change,
    current: () => ({ open, close }),
  };
}
