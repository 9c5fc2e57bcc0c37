/**
 * SpanBuffer - span accumulator for the scanner's text and tag-body buffer.
 * Characters are recorded as [start, end) ranges of the source and only turned
 * into a string when the buffer is flushed into a token.
 */

export interface SpanBuffer {
  // second parameter is end index (exclusive)
  addSpan(start: number, end: number): void;
  clear(): void;
  materialize(): string;
  /** Number of buffered characters. */
  readonly length: number;
  fillDebugState(state: Partial<SpanBufferDebugState>): void;
}

export interface SpanBufferDebugState {
  spanCount: number;
  spanCapacity: number;
  charCount: number;
}

// Reusable parts array for materialization
const stringParts: string[] = [];

export function createSpanBuffer({ source }: { source: string }): SpanBuffer {
  // Backing storage: pairs of [start, end) - end is exclusive. Grow-only.
  const spans: number[] = [];
  let spanCount = 0;
  let charCount = 0;

  function addSpan(start: number, end: number): void {
    if (end <= start) return;
    charCount += end - start;

    // Contiguous with the previous span: extend it. An escaped tag start
    // skips the escape character, so it begins a new span.
    if (spanCount > 0 && spans[(spanCount - 1) * 2 + 1] === start) {
      spans[(spanCount - 1) * 2 + 1] = end;
      return;
    }

    spans[spanCount * 2] = start;
    spans[spanCount * 2 + 1] = end;
    spanCount++;
  }

  function clear(): void {
    spanCount = 0;
    charCount = 0;
  }

  function materialize(): string {
    if (spanCount === 0) return '';
    if (spanCount === 1) return source.substring(spans[0], spans[1]);

    stringParts.length = 0;
    for (let i = 0; i < spanCount; i++) {
      stringParts.push(source.substring(spans[i * 2], spans[i * 2 + 1]));
    }
    return stringParts.join('');
  }

  function fillDebugState(state: Partial<SpanBufferDebugState>): void {
    state.spanCount = spanCount;
    state.spanCapacity = spans.length / 2;
    state.charCount = charCount;
  }

  return {
    addSpan,
    clear,
    materialize,
    get length() { return charCount; },
    fillDebugState,
  };
}
