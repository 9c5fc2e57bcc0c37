export { createScanner } from './scanner/scanner.js';
export type { Scanner, ScannerOptions, ScannerDebugState } from './scanner/scanner.js';

export * from './scanner/token-types.js';
export { ScannerError, ScannerConfigurationError, getLineAndColumn } from './scanner/errors.js';
export type { ErrorCallback } from './scanner/errors.js';
export { TemplateString } from './scanner/source.js';
export type { ScanInput, TextProvider } from './scanner/source.js';
export { DEFAULT_OPEN_DELIMITER, DEFAULT_CLOSE_DELIMITER } from './scanner/delimiters.js';
export type { DelimiterPair } from './scanner/delimiters.js';
export { reconstructSource } from './scanner/reconstruct.js';
