/** Anything that can hand the scanner its template text. */
export interface TextProvider {
  getText(): string;
}

export type ScanInput = string | TextProvider;

/**
 * Template text wrapped as a value, for callers that pass templates around
 * alongside other strings.
 */
export class TemplateString implements TextProvider {
  private readonly text: string;

  constructor(text: string) {
    this.text = text;
  }

  getText(): string {
    return this.text;
  }

  toString(): string {
    return this.text;
  }
}

export function resolveScanInput(input: ScanInput): string {
  return typeof input === 'string' ? input : input.getText();
}
