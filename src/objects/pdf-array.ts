import type { ByteWriter } from "#src/io/byte-writer";
import { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF array object.
 *
 * In PDF: `[1 2 3]`, `[/Name (string) 42]`
 */
export class PdfArray implements PdfPrimitive {
  get type(): "array" {
    return "array";
  }

  private items: PdfObject[] = [];

  constructor(items?: PdfObject[]) {
    if (items) {
      this.items = [...items];
    }
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Get item at index. Returns undefined if out of bounds.
   */
  at(index: number): PdfObject | undefined {
    return this.items.at(index);
  }

  push(...values: PdfObject[]): void {
    this.items.push(...values);
  }

  *[Symbol.iterator](): Iterator<PdfObject> {
    yield* this.items;
  }

  toArray(): PdfObject[] {
    return [...this.items];
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  /**
   * Create an array of numbers, e.g. a rectangle or matrix.
   */
  static ofNumbers(values: readonly number[]): PdfArray {
    return new PdfArray(values.map(value => PdfNumber.of(value)));
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("[");

    let first = true;

    for (const item of this.items) {
      if (!first) {
        writer.writeAscii(" ");
      }

      item.toBytes(writer);
      first = false;
    }

    writer.writeAscii("]");
  }
}
