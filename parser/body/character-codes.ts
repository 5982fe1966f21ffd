/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  // Control characters
  tab = 0x09,
  carriageReturn = 0x0D,        // \r

  // Information separators (FS, GS, RS, US)
  fileSeparator = 0x1C,
  unitSeparator = 0x1F,

  space = 0x20,

  // Unicode categories
  ogham = 0x1680,
  enQuad = 0x2000,
  figureSpace = 0x2007,
  hairSpace = 0x200A,
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  mathematicalSpace = 0x205F,
  ideographicSpace = 0x3000,
}

/**
 * Check if character is whitespace that a right trim removes.
 * No-break spaces (U+00A0, U+2007, U+202F) and NEL (U+0085) are not trimmed.
 */
export function isWhiteSpace(ch: number): boolean {
  if (ch <= CharacterCodes.space) {
    return ch === CharacterCodes.space ||
           (ch >= CharacterCodes.tab && ch <= CharacterCodes.carriageReturn) ||
           (ch >= CharacterCodes.fileSeparator && ch <= CharacterCodes.unitSeparator);
  }

  return ch === CharacterCodes.ogham ||
         (ch >= CharacterCodes.enQuad && ch <= CharacterCodes.hairSpace && ch !== CharacterCodes.figureSpace) ||
         ch === CharacterCodes.lineSeparator ||
         ch === CharacterCodes.paragraphSeparator ||
         ch === CharacterCodes.mathematicalSpace ||
         ch === CharacterCodes.ideographicSpace;
}
