/**
 * Tests for scanner error handling and callback semantics
 */

import { beforeEach, describe, expect, test } from 'vitest';

import { ScannerError, getLineAndColumn } from '../../scanner/errors.js';
import { createScanner, type Scanner, type ScannerDebugState } from '../../scanner/scanner.js';
import { ScannerErrorCode } from '../../scanner/token-types.js';
import { scanTokensWithErrors } from '../utils.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Scanner Error Handling', () => {
  let scanner: Scanner;

  beforeEach(() => {
    scanner = createScanner();
  });

  describe('without an error callback', () => {
    test('unterminated tag throws with its position', () => {
      const error = captureError(() => scanner.scan('ab{{name'));
      expect(error).toBeInstanceOf(ScannerError);
      expect(error).toMatchObject({
        code: ScannerErrorCode.UnterminatedTag,
        start: 2,
        end: 8,
        line: 1,
        column: 3,
        message: 'Unterminated tag at line 1, column 3',
      });
    });

    test('position is reported on later lines', () => {
      const error = captureError(() => scanner.scan('a\nb\n  {{#x'));
      expect(error).toMatchObject({ start: 6, line: 3, column: 3 });
    });

    test('delimiter change without terminator throws', () => {
      const error = captureError(() => scanner.scan('{{=<% %>'));
      expect(error).toBeInstanceOf(ScannerError);
      expect(error).toMatchObject({ code: ScannerErrorCode.MalformedDelimiterChange, start: 0, end: 8 });
    });
  });

  describe('with an error callback', () => {
    test('unterminated tag content is discarded', () => {
      expect(scanTokensWithErrors('hi {{oops')).toEqual({
        tokens: ['"hi " Text'],
        errors: [{ start: 3, end: 9, code: 'UnterminatedTag' }],
      });
    });

    test('delimiter change without terminator drops the rest of the input', () => {
      expect(scanTokensWithErrors('a{{=<% %>b')).toEqual({
        tokens: ['a Text'],
        errors: [{ start: 1, end: 10, code: 'MalformedDelimiterChange' }],
      });
    });

    test('malformed delimiter pair keeps the old delimiters', () => {
      expect(scanTokensWithErrors('{{=<%=}}{{x}}')).toEqual({
        tokens: ['x Escaped'],
        errors: [{ start: 0, end: 8, code: 'MalformedDelimiterChange' }],
      });
    });

    test('callback exceptions propagate', () => {
      scanner.setOnError(() => {
        throw new Error('stop');
      });
      expect(() => scanner.scan('{{x')).toThrow('stop');
    });

    test('removing the callback restores throwing', () => {
      scanner.setOnError(() => { });
      expect(scanner.scan('{{x')).toEqual([]);
      scanner.setOnError(undefined);
      expect(() => scanner.scan('{{x')).toThrow(ScannerError);
    });
  });

  function emptyDebugState(): ScannerDebugState {
    return {
      state: '',
      pos: -1,
      openDelimiter: '',
      closeDelimiter: '',
      tokenCount: -1,
      lineStart: -1,
      bufferLength: -1,
      bufferSpanCount: -1,
      errorCount: -1,
    };
  }

  test('debug state after a recovered error', () => {
    scanner.setOnError(() => { });
    scanner.scan('a {{b');

    const state = emptyDebugState();
    scanner.fillDebugState(state);
    expect(state).toEqual({
      state: 'Text',
      pos: 5,
      openDelimiter: '{{',
      closeDelimiter: '}}',
      tokenCount: 1,
      lineStart: 1,
      bufferLength: 0,
      bufferSpanCount: 0,
      errorCount: 1,
    });
  });

  test('debug state seen from the error callback includes the buffered tag body', () => {
    const state = emptyDebugState();
    scanner.setOnError(() => scanner.fillDebugState(state));
    scanner.scan('x {{ab');

    expect(state).toEqual({
      state: 'InTag',
      pos: 6,
      openDelimiter: '{{',
      closeDelimiter: '}}',
      tokenCount: 1,
      lineStart: 0,
      bufferLength: 2,
      bufferSpanCount: 1,
      errorCount: 1,
    });
  });

  test('every error code is one the scanner can report', () => {
    expect(Object.values(ScannerErrorCode).filter(v => typeof v === 'string')).toEqual([
      'UnterminatedTag',
      'MalformedDelimiterChange',
      'InvalidDelimiters',
      'InvalidOption',
    ]);
  });

  describe('getLineAndColumn', () => {
    test('start of input', () => {
      expect(getLineAndColumn('abc', 0)).toEqual({ line: 1, column: 1 });
    });

    test('CRLF is one line break', () => {
      expect(getLineAndColumn('a\r\nb', 3)).toEqual({ line: 2, column: 1 });
    });

    test('lone CR and LF', () => {
      expect(getLineAndColumn('a\rb\nc', 5)).toEqual({ line: 3, column: 2 });
    });
  });
});
