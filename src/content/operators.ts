/**
 * Content stream operators.
 *
 * An operator is its operands followed by the operator keyword:
 * `1 0 0 1 72 720 cm`. Numbers are formatted when the stream is written,
 * with the precision of the stream, so one operator list always yields the
 * same bytes for the same precision.
 */

import { formatPdfNumber } from "#src/helpers/format";
import { ByteWriter } from "#src/io/byte-writer";
import type { PdfName } from "#src/objects/pdf-name";
import type { PdfString } from "#src/objects/pdf-string";

/** Decimal places for content stream numbers unless configured otherwise */
export const DEFAULT_CONTENT_PRECISION = 4;

/** Element of a `TJ` array: a string of codes or a position adjustment */
export type TextArrayItem = number | PdfString;

export type Operand = number | PdfName | PdfString | readonly TextArrayItem[];

function isTextArray(operand: Operand): operand is readonly TextArrayItem[] {
  return Array.isArray(operand);
}

function writeOperand(writer: ByteWriter, operand: Operand, precision: number): void {
  if (typeof operand === "number") {
    writer.writeAscii(formatPdfNumber(operand, precision));
    return;
  }

  if (isTextArray(operand)) {
    writer.writeAscii("[");

    operand.forEach((item, i) => {
      if (i > 0) {
        writer.writeAscii(" ");
      }

      writeOperand(writer, item, precision);
    });

    writer.writeAscii("]");
    return;
  }

  operand.toBytes(writer);
}

export class Operator {
  private constructor(
    readonly op: string,
    readonly operands: readonly Operand[],
  ) {}

  static of(op: string, ...operands: Operand[]): Operator {
    return new Operator(op, operands);
  }

  toBytes(writer: ByteWriter, precision: number = DEFAULT_CONTENT_PRECISION): void {
    for (const operand of this.operands) {
      writeOperand(writer, operand, precision);
      writer.writeAscii(" ");
    }

    writer.writeAscii(this.op);
  }

  toString(precision: number = DEFAULT_CONTENT_PRECISION): string {
    const writer = new ByteWriter({ initialSize: 64 });

    this.toBytes(writer, precision);

    return new TextDecoder("latin1").decode(writer.toBytes());
  }
}
