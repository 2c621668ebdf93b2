import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * The PDF `null` object (singleton).
 */
export class PdfNull implements PdfPrimitive {
  static readonly instance = new PdfNull();

  get type(): "null" {
    return "null";
  }

  private constructor() {}

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("null");
  }
}
