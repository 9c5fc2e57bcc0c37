/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  nextLine = 0x0085,

  // Control characters
  tab = 0x09,
  verticalTab = 0x0B,
  formFeed = 0x0C,

  space = 0x20,
  backslash = 0x5C,             // \

  // Unicode categories
  nonBreakingSpace = 0x00A0,
  enQuad = 0x2000,
  zeroWidthSpace = 0x200B,
  narrowNoBreakSpace = 0x202F,
  ideographicSpace = 0x3000,
  mathematicalSpace = 0x205F,
  ogham = 0x1680,
  byteOrderMark = 0xFEFF,
}

/**
 * Check if character is a line break
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn ||
         ch === CharacterCodes.lineSeparator ||
         ch === CharacterCodes.paragraphSeparator ||
         ch === CharacterCodes.nextLine;
}

/**
 * Check if character is whitespace (excluding line breaks)
 */
export function isWhiteSpaceSingleLine(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.verticalTab ||
         ch === CharacterCodes.formFeed ||
         ch === CharacterCodes.nonBreakingSpace ||
         ch === CharacterCodes.ogham ||
         ch === CharacterCodes.narrowNoBreakSpace ||
         ch === CharacterCodes.mathematicalSpace ||
         ch === CharacterCodes.ideographicSpace ||
         ch === CharacterCodes.byteOrderMark ||
         (ch >= CharacterCodes.enQuad && ch < CharacterCodes.zeroWidthSpace);
}

/**
 * Check if character is any whitespace (including line breaks)
 */
export function isWhiteSpace(ch: number): boolean {
  return isWhiteSpaceSingleLine(ch) || isLineBreak(ch);
}

/** True when `text` has at least one character that is not whitespace. */
export function hasNonWhiteSpace(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (!isWhiteSpace(text.charCodeAt(i))) return true;
  }
  return false;
}
