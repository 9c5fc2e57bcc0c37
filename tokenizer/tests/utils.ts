import { createScanner, type Scanner } from '../scanner/scanner.js';
import { ScannerErrorCode, TokenKind, type Token } from '../scanner/token-types.js';

export function tokenString(token: Token): string {
  if (token.kind === TokenKind.Text) return quote(token.value) + ' Text';

  let text = quote(token.name) + ' ' + TokenKind[token.kind];
  if (token.args !== undefined) text += ' args=' + JSON.stringify(token.args);
  if (token.indent !== undefined) text += ' indent=' + JSON.stringify(token.indent);
  return text;
}

export function scanTokensStrings(input: string, scanner: Scanner = createScanner(), delimiters?: string): string[] {
  return scanner.scan(input, delimiters).map(tokenString);
}

export function scanTokensWithErrors(input: string, scanner: Scanner = createScanner()) {
  const errors: { start: number, end: number, code: string }[] = [];
  scanner.setOnError((start, end, code) => {
    errors.push({ start, end, code: ScannerErrorCode[code] });
  });
  const tokens = scanner.scan(input).map(tokenString);
  return { tokens, errors };
}

function quote(text: string): string {
  return !text || /\s/.test(text) || JSON.stringify(text) !== '"' + text + '"' ?
    JSON.stringify(text) :
    text;
}
