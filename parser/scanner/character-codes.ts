/**
 * Character code constants and classification functions
 */

export const enum CharacterCodes {
  tab = 0x09,
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  space = 0x20,

  exclamation = 0x21,           // !
  hash = 0x23,                  // #
  asterisk = 0x2A,              // *
  plus = 0x2B,                  // +
  comma = 0x2C,                 // ,
  minus = 0x2D,                 // -
  slash = 0x2F,                 // /

  _0 = 0x30,
  _9 = 0x39,

  lessThan = 0x3C,              // <
  equals = 0x3D,                // =
  greaterThan = 0x3E,           // >
  at = 0x40,                    // @

  A = 0x41,
  Z = 0x5A,

  openBracket = 0x5B,           // [
  closeBracket = 0x5D,          // ]
  caret = 0x5E,                 // ^
  underscore = 0x5F,            // _

  a = 0x61,
  z = 0x7A,

  openBrace = 0x7B,             // {
  bar = 0x7C,                   // |
  closeBrace = 0x7D,            // }
  tilde = 0x7E,                 // ~
}

export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed || ch === CharacterCodes.carriageReturn;
}

/** Space or tab: the whitespace that can appear inside a line. */
export function isWhiteSpaceSingleLine(ch: number): boolean {
  return ch === CharacterCodes.space || ch === CharacterCodes.tab;
}

export function isWhiteSpace(ch: number): boolean {
  return isWhiteSpaceSingleLine(ch) || isLineBreak(ch);
}

export function isAsciiLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
    (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._9;
}

export function isAsciiAlphaNumeric(ch: number): boolean {
  return isAsciiLetter(ch) || isDigit(ch);
}

/**
 * Characters that take part in markup. One that forms no token on its own
 * becomes a single-character Other token instead of joining a text run.
 */
export function isDelimiterCharacter(ch: number): boolean {
  switch (ch) {
    case CharacterCodes.asterisk:
    case CharacterCodes.slash:
    case CharacterCodes.caret:
    case CharacterCodes.comma:
    case CharacterCodes.openBrace:
    case CharacterCodes.closeBrace:
    case CharacterCodes.at:
    case CharacterCodes.hash:
    case CharacterCodes.tilde:
    case CharacterCodes.minus:
    case CharacterCodes.bar:
    case CharacterCodes.underscore:
    case CharacterCodes.greaterThan:
    case CharacterCodes.openBracket:
    case CharacterCodes.closeBracket:
    case CharacterCodes.equals:
      return true;
    default:
      return false;
  }
}
