/**
 * PDF formatting utilities.
 */

/**
 * Default number of decimal places for object-level numbers.
 */
export const DEFAULT_PRECISION = 5;

/**
 * Largest magnitude a PDF reader is required to handle (ISO 32000-1 Annex C).
 */
export const MAX_PDF_NUMBER = 3.403e38;

/**
 * Format a number for PDF output.
 *
 * - Integers are written without decimal point
 * - Reals are rounded to `precision` decimal places, then trailing zeros are trimmed
 * - Negative zero is written as `0`
 * - Numbers never use exponent notation, which PDF has no syntax for
 *
 * The same value and precision always yield the same string, which keeps
 * repeated builds byte-identical.
 */
export function formatPdfNumber(value: number, precision: number = DEFAULT_PRECISION): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot format non-finite number: ${value}`);
  }

  if (Math.abs(value) > MAX_PDF_NUMBER) {
    throw new Error(`Number is out of PDF range: ${value}`);
  }

  if (Number.isInteger(value)) {
    // toString switches to exponent notation from 1e21
    return value === 0 ? "0" : BigInt(value).toString();
  }

  let str = value.toFixed(precision);

  // Remove trailing zeros and unnecessary decimal point
  if (str.includes(".")) {
    str = str.replace(/\.?0+$/, "");
  }

  // Rounded away to nothing (e.g. -0.00001 at 4 places)
  if (str === "" || str === "-" || str === "-0") {
    return "0";
  }

  return str;
}

/**
 * Format a date as a PDF date string: `D:YYYYMMDDHHmmSSZ`.
 *
 * Always written in UTC so output does not depend on the host time zone.
 */
export function formatPdfDate(date: Date): string {
  const pad = (n: number, width = 2) => n.toString().padStart(width, "0");

  return (
    `D:${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}
