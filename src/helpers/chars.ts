/**
 * PDF character constants (ISO 32000-1 7.2.2)
 *
 * Reusable byte values and sets for writing PDF syntax.
 */

// Line endings
export const LF = 0x0a; // Line Feed
export const CR = 0x0d; // Carriage Return

// Common whitespace
export const SPACE = 0x20;
export const TAB = 0x09;
export const NUL = 0x00;
export const FF = 0x0c; // Form Feed

/**
 * PDF whitespace characters: NUL, TAB, LF, FF, CR, SPACE
 */
export const WHITESPACE = new Set([NUL, TAB, LF, FF, CR, SPACE]);

// Delimiters
export const PARENTHESIS_OPEN = 0x28; // (
export const PARENTHESIS_CLOSE = 0x29; // )
export const ANGLE_BRACKET_OPEN = 0x3c; // <
export const ANGLE_BRACKET_CLOSE = 0x3e; // >
export const SQUARE_BRACKET_OPEN = 0x5b; // [
export const SQUARE_BRACKET_CLOSE = 0x5d; // ]
export const CURLY_BRACE_OPEN = 0x7b; // {
export const CURLY_BRACE_CLOSE = 0x7d; // }
export const SLASH = 0x2f; // /
export const PERCENT = 0x25; // %
export const BACKSLASH = 0x5c; // \

/**
 * PDF delimiter characters: ( ) < > [ ] { } / %
 */
export const DELIMITERS = new Set([
  PARENTHESIS_OPEN,
  PARENTHESIS_CLOSE,
  ANGLE_BRACKET_OPEN,
  ANGLE_BRACKET_CLOSE,
  SQUARE_BRACKET_OPEN,
  SQUARE_BRACKET_CLOSE,
  CURLY_BRACE_OPEN,
  CURLY_BRACE_CLOSE,
  SLASH,
  PERCENT,
]);

export const CHAR_HASH = 0x23; // #

/**
 * Byte mask for limiting values to a single byte (0-255).
 */
export const SINGLE_BYTE_MASK = 0xff;

/**
 * Value of a hex digit byte, or -1 if the byte is not a hex digit.
 */
export function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) {
    return byte - 0x30;
  }

  if (byte >= 0x41 && byte <= 0x46) {
    return byte - 0x37;
  }

  if (byte >= 0x61 && byte <= 0x66) {
    return byte - 0x57;
  }

  return -1;
}
