/**
 * Factories for content stream operators.
 */

import { Operator, type TextArrayItem } from "#src/content/operators";
import type { Matrix } from "#src/content/instructions";
import { type Color, colorToArray, fillColorOperator } from "#src/helpers/colors";
import { PdfName } from "#src/objects/pdf-name";
import type { PdfString } from "#src/objects/pdf-string";

// Graphics state

export const pushGraphicsState = (): Operator => Operator.of("q");

export const popGraphicsState = (): Operator => Operator.of("Q");

export const concatMatrix = (matrix: Matrix): Operator => Operator.of("cm", ...matrix);

export const setLineWidth = (width: number): Operator => Operator.of("w", width);

/**
 * Apply a named ExtGState from the resources: `/GS1 gs`.
 */
export const setGraphicsState = (name: string): Operator => Operator.of("gs", PdfName.of(name));

// Color

export const setNonStrokingColor = (color: Color): Operator =>
  Operator.of(fillColorOperator(color), ...colorToArray(color));

export const setStrokingColor = (color: Color): Operator =>
  Operator.of(fillColorOperator(color).toUpperCase(), ...colorToArray(color));

// Path construction

export const moveTo = (x: number, y: number): Operator => Operator.of("m", x, y);

export const lineTo = (x: number, y: number): Operator => Operator.of("l", x, y);

export const curveTo = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  x: number,
  y: number,
): Operator => Operator.of("c", x1, y1, x2, y2, x, y);

export const rectangle = (x: number, y: number, width: number, height: number): Operator =>
  Operator.of("re", x, y, width, height);

export const closePath = (): Operator => Operator.of("h");

// Path painting

export const fill = (): Operator => Operator.of("f");

export const fillEvenOdd = (): Operator => Operator.of("f*");

export const stroke = (): Operator => Operator.of("S");

export const fillAndStroke = (): Operator => Operator.of("B");

export const fillAndStrokeEvenOdd = (): Operator => Operator.of("B*");

export const clip = (): Operator => Operator.of("W");

export const clipEvenOdd = (): Operator => Operator.of("W*");

export const endPath = (): Operator => Operator.of("n");

// Text

export const beginText = (): Operator => Operator.of("BT");

export const endText = (): Operator => Operator.of("ET");

export const setFont = (name: string, size: number): Operator =>
  Operator.of("Tf", PdfName.of(name), size);

export const setTextMatrix = (matrix: Matrix): Operator => Operator.of("Tm", ...matrix);

export const showText = (codes: PdfString): Operator => Operator.of("Tj", codes);

export const showTextArray = (items: readonly TextArrayItem[]): Operator => Operator.of("TJ", items);

// XObjects

export const paintXObject = (name: string): Operator => Operator.of("Do", PdfName.of(name));
