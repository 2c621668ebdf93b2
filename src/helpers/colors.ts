/**
 * Device color values for fill and stroke paint.
 *
 * Only device color spaces are emitted; no ICC profiles or color management.
 */

/**
 * RGB color with values in the 0-1 range.
 */
export interface RGB {
  type: "RGB";
  red: number;
  green: number;
  blue: number;
}

/**
 * Grayscale color with value in the 0-1 range.
 * 0 = black, 1 = white.
 */
export interface Grayscale {
  type: "Grayscale";
  gray: number;
}

/**
 * CMYK color with values in the 0-1 range.
 */
export interface CMYK {
  type: "CMYK";
  cyan: number;
  magenta: number;
  yellow: number;
  black: number;
}

export type Color = RGB | Grayscale | CMYK;

export function rgb(r: number, g: number, b: number): RGB {
  return { type: "RGB", red: r, green: g, blue: b };
}

export function grayscale(gray: number): Grayscale {
  return { type: "Grayscale", gray };
}

export function cmyk(c: number, m: number, y: number, k: number): CMYK {
  return { type: "CMYK", cyan: c, magenta: m, yellow: y, black: k };
}

/** Initial fill and stroke color of every content stream. */
export const black: Grayscale = grayscale(0);

/**
 * Convert a Color to the operand list of its color operator.
 */
export function colorToArray(color: Color): number[] {
  switch (color.type) {
    case "RGB":
      return [color.red, color.green, color.blue];
    case "Grayscale":
      return [color.gray];
    case "CMYK":
      return [color.cyan, color.magenta, color.yellow, color.black];
  }
}

/**
 * Non-stroking color operator for a color: `g`, `rg` or `k`.
 * The stroking variant is the upper-case form.
 */
export function fillColorOperator(color: Color): "g" | "rg" | "k" {
  switch (color.type) {
    case "RGB":
      return "rg";
    case "Grayscale":
      return "g";
    case "CMYK":
      return "k";
  }
}

/**
 * Structural equality of two colors.
 */
export function colorsEqual(a: Color, b: Color): boolean {
  if (a.type !== b.type) {
    return false;
  }

  const left = colorToArray(a);
  const right = colorToArray(b);

  return left.every((value, i) => value === right[i]);
}
